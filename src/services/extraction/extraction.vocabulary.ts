/**
 * Fixed vocabularies for the restaurant entity heuristic
 */

export const VENUE_KEYWORDS = [
  'restaurant',
  'café',
  'cafe',
  'bistro',
  'diner',
  'eatery',
  'place',
  'bar',
  'grill'
] as const;

export const CUISINES = [
  'Italian',
  'Chinese',
  'Mexican',
  'Indian',
  'Japanese',
  'Thai',
  'French',
  'American',
  'Mediterranean',
  'Greek'
] as const;

export const NAME_DESCRIPTORS = ['Delight', 'Express', 'Garden', 'House', 'Palace', 'Bistro', 'Kitchen'] as const;

export const STREET_NAMES = ['Main', 'Oak', 'Pine', 'Maple', 'Cedar'] as const;

export const HIGHLIGHTS = ['signature dishes', 'fresh ingredients', 'vibrant atmosphere', 'chef specials'] as const;

export const DEFAULT_HOURS = ['Mon-Fri: 11:00 AM - 10:00 PM', 'Sat-Sun: 10:00 AM - 11:00 PM'] as const;

/** San Francisco; used when no fix exists */
export const DEFAULT_COORDINATE = { latitude: 37.7749, longitude: -122.4194 } as const;

export const MAX_ENTITIES = 5;

/** Degrees of jitter applied around the fix, each axis */
export const COORDINATE_JITTER_DEGREES = 0.01;
