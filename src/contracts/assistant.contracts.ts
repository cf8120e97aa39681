// src/contracts/assistant.contracts.ts
// Shared data model. Zod schemas double as the persisted-state validator.

import { z } from 'zod';

export const STATE_VERSION = 1 as const;

export const CoordinateSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export type Coordinate = z.infer<typeof CoordinateSchema>;

export interface LocationFix extends Coordinate {
  /** Horizontal accuracy in meters */
  accuracy: number;
  timestamp: number;
}

export const RestaurantRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  address: z.string(),
  phone: z.string().optional(),
  website: z.string().optional(),
  rating: z.number().min(0).max(5),
  priceLevel: z.number().int().min(1).max(4),
  cuisines: z.array(z.string()),
  coordinates: CoordinateSchema,
  imageUrl: z.string().optional(),
  hours: z.array(z.string()).optional(),
  description: z.string().optional(),
  distanceMeters: z.number().nonnegative().optional(),
});

export type RestaurantRecord = z.infer<typeof RestaurantRecordSchema>;

export const MessageSenderSchema = z.enum(['user', 'assistant']);
export type MessageSender = z.infer<typeof MessageSenderSchema>;

export const MessageKindSchema = z.enum(['text', 'restaurantList', 'locationRequest', 'error', 'welcome']);
export type MessageKind = z.infer<typeof MessageKindSchema>;

export const ChatMessageSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  sender: MessageSenderSchema,
  timestamp: z.number(),
  kind: MessageKindSchema,
  entities: z.array(RestaurantRecordSchema),
});

export type ChatMessage = Readonly<z.infer<typeof ChatMessageSchema>>;

export const SortOptionSchema = z.enum(['distance', 'rating', 'price']);
export type SortOption = z.infer<typeof SortOptionSchema>;

export const UserPreferencesSchema = z.object({
  favoriteRestaurantIds: z.array(z.string()),
  dietaryPreferences: z.array(z.string()),
  pricePreference: z.number().int().min(1).max(4).optional(),
  cuisinePreferences: z.array(z.string()),
  /** meters */
  distancePreference: z.number().positive().optional(),
  sortPreference: SortOptionSchema,
  recentSearches: z.array(z.string()),
});

export type UserPreferences = z.infer<typeof UserPreferencesSchema>;

export const DEFAULT_PREFERENCES: UserPreferences = {
  favoriteRestaurantIds: [],
  dietaryPreferences: [],
  cuisinePreferences: [],
  distancePreference: 5000,
  sortPreference: 'distance',
  recentSearches: [],
};

export const PersistedStateSchema = z.object({
  version: z.literal(STATE_VERSION),
  chatHistory: z.array(ChatMessageSchema),
  preferences: UserPreferencesSchema,
  favorites: z.array(RestaurantRecordSchema),
});

export type PersistedState = z.infer<typeof PersistedStateSchema>;
