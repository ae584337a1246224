import type { AskResponse, AskStreamEvent } from '@doc-qa/types';
import { AskContext, type AskOptions } from './AskContext';
import { AskPipeline } from './AskPipeline';

export class Ask {
    constructor(private pipeline: AskPipeline) {}

    async execute(question: string, options?: AskOptions): Promise<AskResponse> {
        const ctx = new AskContext(question, options);

        await this.pipeline.execute(ctx);

        return ctx.toResponse();
    }

    async *executeStream(
        question: string,
        options?: AskOptions
    ): AsyncGenerator<AskStreamEvent> {
        const ctx = new AskContext(question, options);

        for await (const event of this.pipeline.executeStream(ctx)) {
            yield event;
        }
    }
}
