import OpenAI from 'openai';
import type { AppConfig } from '../config/env.js';
import type { GenerativeChatAPI } from './types.js';
import { OpenAIChatProvider, responsesApi } from './openai-chat.provider.js';

export function createChatProvider(config: AppConfig): GenerativeChatAPI | null {
    switch (config.llmProvider) {
        case 'openai': {
            if (!config.openaiApiKey) return null;
            // Retries are a user decision (resend); the SDK must not retry on its own
            const client = new OpenAI({ apiKey: config.openaiApiKey, maxRetries: 0 });
            return new OpenAIChatProvider(responsesApi(client));
        }
        case 'none':
            return null;
    }
}
