import { type SConstructor, UseCaseProvider } from '../application/useCases/UseCaseProvider';
import { type EngineConfig, loadEngineConfig } from '../application/config/engineConfig';
import type { EmbeddingProvider } from '../application/providers/EmbeddingProvider';
import type { LLMProvider } from '../application/providers/LLMProvider';
import { RetrievalEngine } from '../application/services/RetrievalEngine';
import { RelatedQuestionService } from '../application/services/RelatedQuestionService';
import { IngestDocument } from '../application/useCases/IngestDocument';
import { RemoveDocument } from '../application/useCases/RemoveDocument';
import { GetDocuments } from '../application/useCases/GetDocuments';
import { QueryDocuments } from '../application/useCases/QueryDocuments';
import { GetIndexStats } from '../application/useCases/GetIndexStats';
import { Ask } from '../application/useCases/ask/Ask';
import { AskPipeline } from '../application/useCases/ask/AskPipeline';
import { PromptBuilder } from '../application/useCases/ask/PromptBuilder';
import { OllamaEmbeddingProvider } from './providers/OllamaEmbeddingProvider';
import { OllamaLLMProvider } from './providers/OllamaLLMProvider';

export interface CoreDependencies {
    config?: EngineConfig;
    embeddingProvider?: EmbeddingProvider;
    llmProvider?: LLMProvider;
}

export class Core {
    public useCases = new UseCaseProvider();
    public readonly engine: RetrievalEngine;
    private llmProvider: LLMProvider;

    constructor(dependencies: CoreDependencies = {}) {
        const config = dependencies.config ?? loadEngineConfig();
        this.llmProvider = dependencies.llmProvider ?? new OllamaLLMProvider();
        this.engine = new RetrievalEngine(config, dependencies.embeddingProvider ?? new OllamaEmbeddingProvider());

        this.initializeServices(config);
    }

    private initializeServices(config: EngineConfig) {
        this.useCases.register(IngestDocument, () => new IngestDocument(this.engine));
        this.useCases.register(RemoveDocument, () => new RemoveDocument(this.engine));
        this.useCases.register(GetDocuments, () => new GetDocuments(this.engine));
        this.useCases.register(QueryDocuments, () => new QueryDocuments(this.engine));
        this.useCases.register(GetIndexStats, () => new GetIndexStats(this.engine));
        this.useCases.register(Ask, () => new Ask(new AskPipeline(
            this.engine,
            this.llmProvider,
            new PromptBuilder(),
            new RelatedQuestionService(this.llmProvider, config.embeddingTimeoutMs)
        )));
    }

    public getUseCase<T>(serviceType: SConstructor<T>): T {
        return this.useCases.get(serviceType);
    }
}
