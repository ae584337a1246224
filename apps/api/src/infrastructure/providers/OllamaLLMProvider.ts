import { ChatOllama } from '@langchain/ollama';
import { AIMessage, BaseMessage, HumanMessage, type MessageContent, SystemMessage } from '@langchain/core/messages';
import type { ChatMessage } from '@doc-qa/types';
import type { LLMProvider } from '../../application/providers/LLMProvider';

export interface OllamaLLMConfig {
    model: string;
    baseUrl: string;
}

function toLangChain(messages: ChatMessage[]): BaseMessage[] {
    return messages.map(m => {
        if (m.role === 'system') return new SystemMessage(m.content);
        if (m.role === 'assistant') return new AIMessage(m.content);
        return new HumanMessage(m.content);
    });
}

function contentToText(content: MessageContent): string {
    if (typeof content === 'string') return content;
    return content
        .map(part => ('text' in part && typeof part.text === 'string' ? part.text : ''))
        .join('');
}

export class OllamaLLMProvider implements LLMProvider {
    private model: ChatOllama;

    constructor(config: OllamaLLMConfig = {
        model: process.env.OLLAMA_MODEL || 'phi3:mini',
        baseUrl: process.env.OLLAMA_BASE_URL || 'http://127.0.0.1:11434',
    }) {
        this.model = new ChatOllama({ ...config, temperature: 0 });
    }

    async generateResponse(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
        const response = await this.model.invoke(toLangChain(messages), { signal });
        return contentToText(response.content);
    }

    async *generateStream(messages: ChatMessage[], signal?: AbortSignal): AsyncIterable<string> {
        const stream = await this.model.stream(toLangChain(messages), { signal });

        for await (const chunk of stream) {
            if (signal?.aborted) return;
            yield contentToText(chunk.content);
        }
    }
}
