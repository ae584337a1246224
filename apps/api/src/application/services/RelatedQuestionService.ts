import type { ChatMessage } from '@doc-qa/types';
import logger from '../../infrastructure/logger';
import type { LLMProvider } from '../providers/LLMProvider';
import { withTimeout } from '../utils/withTimeout';

const MAX_RELATED_QUESTIONS = 2;

/**
 * Asks the generation model for a couple of related questions so retrieval
 * can cover complementary passages. The original question always comes
 * first; any failure falls back to it alone.
 */
export class RelatedQuestionService {
    constructor(
        private llmProvider: LLMProvider,
        private timeoutMs: number = 5000
    ) {}

    async expand(question: string): Promise<string[]> {
        const systemPrompt = `Basándote en la pregunta original, genera exactamente ${MAX_RELATED_QUESTIONS} preguntas adicionales relacionadas que podrían ayudar a encontrar información complementaria en los documentos.

Las preguntas adicionales deben:
- Abordar aspectos diferentes pero relacionados con la pregunta original
- Ser específicas y útiles para búsqueda de información

Responde ÚNICAMENTE con las preguntas adicionales, una por línea, sin explicaciones.`;

        const messages: ChatMessage[] = [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: `Pregunta original: ${question}` },
        ];

        try {
            const response = await withTimeout(
                signal => this.llmProvider.generateResponse(messages, signal),
                { timeoutMs: this.timeoutMs, label: 'Related question generation' }
            );
            const related = this.parseQuestions(response, question);
            logger.debug('Related questions generated', { question: question.substring(0, 50), related });
            return [question, ...related];
        } catch (error) {
            logger.warn('Could not generate related questions', {
                error: error instanceof Error ? error.message : String(error),
                question: question.substring(0, 50),
            });
            return [question];
        }
    }

    private parseQuestions(response: string, original: string): string[] {
        const questions: string[] = [];
        for (const line of response.split('\n')) {
            const cleaned = line
                .trim()
                .replace(/^\d+[.)\-:]\s*/, '')
                .replace(/^[•\-*]\s*/, '')
                .trim();
            if (cleaned.length === 0 || cleaned === original.trim() || questions.includes(cleaned)) continue;
            questions.push(cleaned);
        }
        return questions.slice(0, MAX_RELATED_QUESTIONS);
    }
}
