import type { AskStreamEvent } from '@doc-qa/types';
import type { LLMProvider } from '../../providers/LLMProvider';
import { RelatedQuestionService } from '../../services/RelatedQuestionService';
import { RetrievalEngine } from '../../services/RetrievalEngine';
import { AskContext } from './AskContext';
import { PromptBuilder } from './PromptBuilder';

export const NO_CONTEXT_ANSWER = 'No encontré información relevante en los documentos cargados para responder a esa pregunta.';

export class AskPipeline {
    constructor(
        private engine: RetrievalEngine,
        private llm: LLMProvider,
        private promptBuilder: PromptBuilder,
        private relatedQuestions?: RelatedQuestionService
    ) {}

    private async retrieve(ctx: AskContext) {
        ctx.questions = ctx.options.expandQuestions && this.relatedQuestions
            ? await this.relatedQuestions.expand(ctx.question)
            : [ctx.question];

        ctx.window = await this.engine.queryMany(
            ctx.questions,
            ctx.options.k,
            ctx.options.budget,
            { signal: ctx.options.signal }
        );
    }

    async execute(ctx: AskContext): Promise<void> {
        await this.retrieve(ctx);

        if (!ctx.window || ctx.window.isEmpty) {
            ctx.answer = NO_CONTEXT_ANSWER;
            return;
        }

        ctx.messages = this.promptBuilder.build(ctx.question, ctx.window);
        ctx.answer = await this.llm.generateResponse(ctx.messages, ctx.options.signal);
    }

    async *executeStream(ctx: AskContext): AsyncGenerator<AskStreamEvent> {
        await this.retrieve(ctx);
        if (ctx.options.signal?.aborted) return;

        if (!ctx.window || ctx.window.isEmpty) {
            ctx.answer = NO_CONTEXT_ANSWER;
            yield { type: 'token', content: NO_CONTEXT_ANSWER };
            yield { type: 'done' };
            return;
        }

        yield { type: 'meta', citations: ctx.citations(), questions: ctx.questions };

        ctx.messages = this.promptBuilder.build(ctx.question, ctx.window);

        for await (const token of this.llm.generateStream(ctx.messages, ctx.options.signal)) {
            if (ctx.options.signal?.aborted) return;
            ctx.answer += token;
            yield { type: 'token', content: token };
        }

        yield { type: 'done' };
    }
}
