/**
 * ConversationClient
 * Wraps one logical conversation with the generative chat API.
 *
 * Invariants:
 * 1. At most one request in flight; a second send() rejects with ConversationBusyError
 * 2. The system prompt is transmitted at most once per session, before any user text
 * 3. `primed` flips only after the priming exchange succeeds
 * 4. Every outcome carries the session token captured at call time; if the session
 *    ended or restarted meanwhile the outcome is `stale` and must not be applied
 */

import { componentLogger } from '../../lib/logger/structured-logger.js';
import { withTimeout } from '../../lib/reliability/timeout-guard.js';
import type { ChatGenerationConfig, ChatReply, ChatSessionHandle, GenerativeChatAPI } from '../../llm/types.js';
import {
  ConversationBusyError,
  EmptyOrUnsafeResponseError,
  SessionNotStartedError,
  TransientAPIError,
  type ConversationError
} from './conversation.errors.js';
import { RESTAURANT_SYSTEM_PROMPT } from './system-prompt.js';

const log = componentLogger('ConversationClient');

export interface ConversationSession {
  primed: boolean;
  inFlight: boolean;
  sessionToken: number;
}

export type SendOutcome =
  | { status: 'ok'; text: string; sessionToken: number }
  | { status: 'error'; error: ConversationError; sessionToken: number }
  | { status: 'stale'; sessionToken: number };

export interface ConversationClientOptions {
  systemPrompt?: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class ConversationClient {
  private handle: ChatSessionHandle | null = null;
  private tokenCounter = 0;
  private session: ConversationSession = { primed: false, inFlight: false, sessionToken: 0 };
  private readonly systemPrompt: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly api: GenerativeChatAPI,
    options: ConversationClientOptions = {}
  ) {
    this.systemPrompt = options.systemPrompt ?? RESTAURANT_SYSTEM_PROMPT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get state(): Readonly<ConversationSession> {
    return { ...this.session };
  }

  get isActive(): boolean {
    return this.handle !== null;
  }

  /**
   * Open a fresh session. Any previous session is ended first.
   * Resolves false when endSession() superseded the start while it was pending.
   */
  async startSession(config: ChatGenerationConfig): Promise<boolean> {
    this.endSession();
    const token = this.session.sessionToken;

    let handle: ChatSessionHandle;
    try {
      handle = await this.api.startSession(config);
    } catch (error) {
      log.error({ err: error, model: config.model }, '[ConversationClient] session start failed');
      throw new TransientAPIError('Failed to start conversation session', error);
    }

    if (token !== this.session.sessionToken) {
      this.api.endSession(handle);
      log.info({ sessionToken: token }, '[ConversationClient] session start superseded');
      return false;
    }

    this.handle = handle;
    log.info({ sessionToken: token, model: config.model }, '[ConversationClient] session started');
    return true;
  }

  /**
   * Send user text. Primes the session on first use.
   */
  async send(text: string): Promise<SendOutcome> {
    const handle = this.handle;
    if (!handle) throw new SessionNotStartedError();
    if (this.session.inFlight) throw new ConversationBusyError();

    const token = this.session.sessionToken;
    this.session.inFlight = true;

    try {
      if (!this.session.primed) {
        try {
          await this.transmit(handle, this.systemPrompt);
        } catch (error) {
          log.warn({ sessionToken: token, err: error }, '[ConversationClient] priming failed');
          return this.settle(token, {
            status: 'error',
            error: new TransientAPIError('Priming exchange failed', error),
            sessionToken: token
          });
        }
        if (token !== this.session.sessionToken) return { status: 'stale', sessionToken: token };
        this.session.primed = true;
        log.debug({ sessionToken: token }, '[ConversationClient] session primed');
      }

      let reply: ChatReply;
      try {
        reply = await this.transmit(handle, text);
      } catch (error) {
        log.warn({ sessionToken: token, err: error }, '[ConversationClient] request failed');
        return this.settle(token, {
          status: 'error',
          error: new TransientAPIError('Conversation request failed', error),
          sessionToken: token
        });
      }

      if (reply.blocked || reply.text === null || reply.text.trim() === '') {
        return this.settle(token, {
          status: 'error',
          error: new EmptyOrUnsafeResponseError(reply.blocked),
          sessionToken: token
        });
      }

      return this.settle(token, { status: 'ok', text: reply.text, sessionToken: token });
    } finally {
      if (token === this.session.sessionToken) {
        this.session.inFlight = false;
      }
    }
  }

  /**
   * Tear down the session and invalidate its token
   */
  endSession(): void {
    if (this.handle) {
      this.api.endSession(this.handle);
      this.handle = null;
      log.info({ sessionToken: this.session.sessionToken }, '[ConversationClient] session ended');
    }
    this.tokenCounter++;
    this.session = { primed: false, inFlight: false, sessionToken: this.tokenCounter };
  }

  private settle(token: number, outcome: SendOutcome): SendOutcome {
    if (token !== this.session.sessionToken) {
      log.info({ sessionToken: token, discarded: outcome.status }, '[ConversationClient] stale result discarded');
      return { status: 'stale', sessionToken: token };
    }
    return outcome;
  }

  private transmit(handle: ChatSessionHandle, text: string): Promise<ChatReply> {
    const controller = new AbortController();
    return withTimeout(
      this.api.sendMessage(handle, text, { signal: controller.signal }),
      this.timeoutMs,
      'conversation.send',
      () => controller.abort()
    );
  }
}
