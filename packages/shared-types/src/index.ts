export * from './schemas';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * A document as listed by the API (without its text)
 */
export interface DocumentSummary {
  id: string;
  sourceName: string;
  ingestedAt: string;
  sections: number;
  length: number;
  chunkCount: number;
  metadata: Record<string, string>;
}

export interface CitationDto {
  documentId: string;
  sourceName: string;
  startChar: number;
  endChar: number;
  section: number;
}

export interface ContextPassageDto {
  chunkId: string;
  text: string;
  score: number;
  rank: number;
  citation: CitationDto;
}

/**
 * Bounded, cited context handed to the generation step
 */
export interface ContextWindowResponse {
  questions: string[];
  budget: number;
  totalSize: number;
  passages: ContextPassageDto[];
}

export interface AskResponse {
  answer: string;
  citations: CitationDto[];
  metadata: {
    totalSources: number;
    totalChunksRetrieved: number;
    questionsUsed: number;
  };
}

export type AskStreamEvent =
  | { type: 'meta'; citations: CitationDto[]; questions: string[] }
  | { type: 'token'; content: string }
  | { type: 'done' };

export interface IndexStatsResponse {
  documents: number;
  chunks: number;
  lexicalChunks: number;
  vectorChunks: number;
  vocabularySize: number;
  embeddingDimension: number;
  averageChunkLength: number;
  fusionStrategy: 'weighted' | 'rrf';
}
