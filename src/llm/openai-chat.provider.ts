import { randomUUID } from 'node:crypto';
import type OpenAI from 'openai';
import { componentLogger } from '../lib/logger/structured-logger.js';
import type {
    ChatGenerationConfig,
    ChatReply,
    ChatSessionHandle,
    GenerativeChatAPI,
    SendMessageOptions
} from './types.js';

const log = componentLogger('OpenAIChatProvider');

export interface ResponseRequest {
    model: string;
    input: string;
    temperature: number;
    top_p: number;
    max_output_tokens: number;
    previous_response_id?: string;
}

export interface ResponseLike {
    id: string;
    output_text: string;
    status?: string | undefined;
    incomplete_details?: { reason?: string | undefined } | null | undefined;
}

export type CreateResponse = (request: ResponseRequest, signal?: AbortSignal) => Promise<ResponseLike>;

/**
 * Bind the Responses API of an SDK client
 */
export function responsesApi(client: OpenAI): CreateResponse {
    return (request, signal) => client.responses.create(request, { signal });
}

/**
 * OpenAIChatProvider
 * Conversation state lives server-side: each turn chains onto the previous
 * response id. OpenAI has no top-k sampling, so config.topK is not sent.
 */
export class OpenAIChatProvider implements GenerativeChatAPI {
    private readonly liveSessions = new Set<string>();
    private readonly lastResponseIds = new Map<string, string>();

    constructor(private readonly createResponse: CreateResponse) {}

    /** Sessions with a stored response chain */
    get chainedSessionCount(): number {
        return this.lastResponseIds.size;
    }

    async startSession(config: ChatGenerationConfig): Promise<ChatSessionHandle> {
        const handle: ChatSessionHandle = { id: randomUUID(), config };
        this.liveSessions.add(handle.id);
        log.debug({ sessionId: handle.id, model: config.model }, '[OpenAIChatProvider] session started');
        return handle;
    }

    async sendMessage(handle: ChatSessionHandle, text: string, opts?: SendMessageOptions): Promise<ChatReply> {
        const previous = this.lastResponseIds.get(handle.id);
        const request: ResponseRequest = {
            model: handle.config.model,
            input: text,
            temperature: handle.config.temperature,
            top_p: handle.config.topP,
            max_output_tokens: handle.config.maxOutputTokens,
            ...(previous ? { previous_response_id: previous } : {})
        };

        const tStart = Date.now();
        const resp = await this.createResponse(request, opts?.signal);
        // A reply landing after endSession() must not revive the chain
        if (this.liveSessions.has(handle.id)) {
            this.lastResponseIds.set(handle.id, resp.id);
        }

        const blocked = resp.incomplete_details?.reason === 'content_filter';
        const output = resp.output_text.trim();

        log.debug({
            sessionId: handle.id,
            status: resp.status,
            blocked,
            chars: output.length,
            durMs: Date.now() - tStart
        }, '[OpenAIChatProvider] response received');

        return { text: output.length > 0 ? resp.output_text : null, blocked };
    }

    endSession(handle: ChatSessionHandle): void {
        this.liveSessions.delete(handle.id);
        this.lastResponseIds.delete(handle.id);
    }
}
