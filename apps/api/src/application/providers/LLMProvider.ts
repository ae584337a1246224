import type { ChatMessage } from '@doc-qa/types';

export interface LLMProvider {
    generateResponse(messages: ChatMessage[], signal?: AbortSignal): Promise<string>;
    generateStream(messages: ChatMessage[], signal?: AbortSignal): AsyncIterable<string>;
}
