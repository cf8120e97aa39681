/**
 * Generative chat port
 * A stateful conversation with an external model. Adapters keep whatever
 * per-session state the vendor needs behind the handle.
 */

export interface ChatGenerationConfig {
  model: string;
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
}

export interface ChatSessionHandle {
  readonly id: string;
  readonly config: ChatGenerationConfig;
}

export interface ChatReply {
  /** null when the model produced no text */
  text: string | null;
  /** true when the provider withheld content (safety filter) */
  blocked: boolean;
}

export interface SendMessageOptions {
  signal?: AbortSignal | undefined;
}

export interface GenerativeChatAPI {
  startSession(config: ChatGenerationConfig): Promise<ChatSessionHandle>;
  sendMessage(handle: ChatSessionHandle, text: string, opts?: SendMessageOptions): Promise<ChatReply>;
  endSession(handle: ChatSessionHandle): void;
}
