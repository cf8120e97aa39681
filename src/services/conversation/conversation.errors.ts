/**
 * Conversation error taxonomy
 * Each API failure maps to exactly one fallback chat message.
 */

export type ConversationErrorKind = 'transient' | 'empty_or_unsafe';

export class TransientAPIError extends Error {
  readonly kind = 'transient' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransientAPIError';
  }
}

export class EmptyOrUnsafeResponseError extends Error {
  readonly kind = 'empty_or_unsafe' as const;

  constructor(public readonly blocked: boolean) {
    super(blocked ? 'Response withheld by safety filter' : 'Response contained no text');
    this.name = 'EmptyOrUnsafeResponseError';
  }
}

export type ConversationError = TransientAPIError | EmptyOrUnsafeResponseError;

/** Thrown when send() is called while a request is still outstanding */
export class ConversationBusyError extends Error {
  constructor() {
    super('A request is already in flight for this conversation');
    this.name = 'ConversationBusyError';
  }
}

export class SessionNotStartedError extends Error {
  constructor() {
    super('No conversation session is active');
    this.name = 'SessionNotStartedError';
  }
}

export const FALLBACK_MESSAGES: Record<ConversationErrorKind, string> = {
  transient: 'Sorry, I encountered an error. Please try again.',
  empty_or_unsafe: "I couldn't find that information. Can you try asking in a different way?",
};

export function fallbackMessageFor(error: ConversationError): string {
  return FALLBACK_MESSAGES[error.kind];
}
