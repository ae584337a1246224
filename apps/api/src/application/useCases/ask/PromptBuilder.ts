import type { ChatMessage } from '@doc-qa/types';
import { ContextWindow } from '../../../domain/entities/ContextWindow';

export class PromptBuilder {
    formatContext(window: ContextWindow): string {
        return window.passages
            .map((passage, i) => {
                const { sourceName, startChar, endChar } = passage.citation;
                return `[Fuente ${i + 1}: ${sourceName}, caracteres ${startChar}-${endChar}]\n${passage.text}`;
            })
            .join('\n\n');
    }

    build(question: string, window: ContextWindow): ChatMessage[] {
        return [
            {
                role: 'system',
                content: `Eres un asistente que responde preguntas basándose ÚNICAMENTE en los documentos cargados.

INFORMACIÓN DISPONIBLE EN LOS DOCUMENTOS:
${this.formatContext(window)}

INSTRUCCIONES:
- Si encuentras información relevante, responde de forma clara y cita las fuentes como [Fuente N].
- Si la información es parcial, indica qué falta.
- Si no hay información relevante, dilo honestamente.`,
            },
            { role: 'user', content: question },
        ];
    }
}
