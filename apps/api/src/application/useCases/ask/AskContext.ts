import type { AskResponse, ChatMessage, CitationDto } from '@doc-qa/types';
import { ContextWindow } from '../../../domain/entities/ContextWindow';

export interface AskOptions {
    k?: number;
    budget?: number;
    expandQuestions?: boolean;
    signal?: AbortSignal;
}

export class AskContext {
    constructor(
        public question: string,
        public options: AskOptions = {}
    ) {}

    questions: string[] = [];
    window?: ContextWindow;
    messages: ChatMessage[] = [];
    answer = '';

    citations(): CitationDto[] {
        return (this.window?.passages ?? []).map(passage => ({ ...passage.citation }));
    }

    toResponse(): AskResponse {
        return {
            answer: this.answer,
            citations: this.citations(),
            metadata: {
                totalSources: this.window?.documentIds().length ?? 0,
                totalChunksRetrieved: this.window?.passages.length ?? 0,
                questionsUsed: this.questions.length,
            },
        };
    }
}
