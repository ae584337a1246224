import { describe, it, expect, vi } from 'vitest';
import { RelatedQuestionService } from '../src/application/services/RelatedQuestionService';
import type { LLMProvider } from '../src/application/providers/LLMProvider';

function llmReturning(response: Promise<string>): LLMProvider {
    return {
        generateResponse: vi.fn(() => response),
        generateStream: vi.fn(),
    };
}

describe('RelatedQuestionService', () => {
    it('should put the original question first and strip list markers', async () => {
        const llm = llmReturning(Promise.resolve('1. ¿Qué comen los gatos?\n- ¿Dónde viven?\n3) ¿Cuánto duermen?'));
        const service = new RelatedQuestionService(llm);

        const questions = await service.expand('¿Qué son los gatos?');

        expect(questions).toEqual(['¿Qué son los gatos?', '¿Qué comen los gatos?', '¿Dónde viven?']);
    });

    it('should skip blank lines and repeats of the original', async () => {
        const llm = llmReturning(Promise.resolve('\n¿Qué son los gatos?\n\n• ¿Qué comen?\n'));
        const service = new RelatedQuestionService(llm);

        const questions = await service.expand('¿Qué son los gatos?');

        expect(questions).toEqual(['¿Qué son los gatos?', '¿Qué comen?']);
    });

    it('should fall back to the original question when generation fails', async () => {
        const llm = llmReturning(Promise.reject(new Error('model not loaded')));
        const service = new RelatedQuestionService(llm);

        await expect(service.expand('¿Qué son los gatos?')).resolves.toEqual(['¿Qué son los gatos?']);
    });

    it('should fall back when generation times out', async () => {
        const llm = llmReturning(new Promise<string>(() => {}));
        const service = new RelatedQuestionService(llm, 10);

        await expect(service.expand('¿Qué son los gatos?')).resolves.toEqual(['¿Qué son los gatos?']);
    });
});
