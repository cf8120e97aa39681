import { randomUUID } from 'node:crypto';
import type { ChatMessage, MessageKind, MessageSender, RestaurantRecord } from '../../contracts/assistant.contracts.js';

export const WELCOME_TEXT =
  "Hello! I'm your restaurant assistant. I can help you find great places to eat. What type of food are you looking for today?";

export interface MessageInit {
  text: string;
  sender: MessageSender;
  kind?: MessageKind;
  entities?: RestaurantRecord[];
  timestamp?: number;
}

export function createMessage(init: MessageInit): ChatMessage {
  return Object.freeze({
    id: randomUUID(),
    text: init.text,
    sender: init.sender,
    timestamp: init.timestamp ?? Date.now(),
    kind: init.kind ?? 'text',
    entities: init.entities ?? []
  });
}

export const userMessage = (text: string): ChatMessage =>
  createMessage({ text, sender: 'user' });

export const welcomeMessage = (): ChatMessage =>
  createMessage({ text: WELCOME_TEXT, sender: 'assistant', kind: 'welcome' });

export const errorMessage = (text: string): ChatMessage =>
  createMessage({ text, sender: 'assistant', kind: 'error' });

export function assistantReply(text: string, entities: RestaurantRecord[]): ChatMessage {
  return createMessage({
    text,
    sender: 'assistant',
    kind: entities.length > 0 ? 'restaurantList' : 'text',
    entities
  });
}
