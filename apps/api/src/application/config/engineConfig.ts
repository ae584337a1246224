/**
 * Retrieval engine configuration, read from environment variables and
 * validated once. Invalid values or combinations raise ConfigurationError.
 */
import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../../domain/errors/AppError';

const STOPWORDS_DIR = new URL('../../../data/stopwords/', import.meta.url);
const SUPPORTED_STOPWORD_LANGUAGES = ['en', 'es'] as const;

export const engineConfigSchema = z
    .object({
        chunkSize: z.number().int().positive().default(1000),
        chunkOverlap: z.number().int().nonnegative().default(200),
        separators: z.array(z.string().min(1)).default(['\n\n', '\n', '. ', ' ']),
        separatorLookback: z.number().int().positive().optional(),
        normalizeWhitespace: z.boolean().default(false),

        bm25K1: z.number().nonnegative().default(1.5),
        bm25B: z.number().min(0).max(1).default(0.75),
        stopwords: z.array(z.string()).default([]),

        embeddingDimension: z.number().int().positive().default(768),
        embeddingTimeoutMs: z.number().int().positive().default(10_000),
        embeddingBatchSize: z.number().int().positive().default(16),
        minVectorSimilarity: z.number().min(-1).max(1).default(0),

        fusionStrategy: z.enum(['weighted', 'rrf']).default('weighted'),
        lexicalWeight: z.number().nonnegative().default(0.4),
        vectorWeight: z.number().nonnegative().default(0.6),
        rrfK: z.number().int().positive().default(60),
        overFetchFactor: z.number().min(1).default(3),

        defaultTopK: z.number().int().positive().default(8),
        contextBudget: z.number().int().nonnegative().default(4000),
        overlapTolerance: z.number().min(0).max(1).default(0.5),

        lexicalFallbackOnProviderError: z.boolean().default(false),
    })
    .superRefine((config, ctx) => {
        if (config.chunkOverlap >= config.chunkSize) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['chunkOverlap'],
                message: `chunkOverlap (${config.chunkOverlap}) must be smaller than chunkSize (${config.chunkSize})`,
            });
        }
        if (config.lexicalWeight + config.vectorWeight <= 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['lexicalWeight'],
                message: 'Fusion weights must sum to a positive number',
            });
        }
    });

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export function parseEngineConfig(input: EngineConfigInput = {}): EngineConfig {
    const result = engineConfigSchema.safeParse(input);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid engine configuration: ${details}`);
    }
    return result.data;
}

export function loadStopwords(languages: readonly string[]): string[] {
    const words = new Set<string>();
    for (const language of languages) {
        if (!SUPPORTED_STOPWORD_LANGUAGES.some(supported => supported === language)) {
            throw new ConfigurationError(`Unsupported stopword language: ${language}`);
        }
        const raw: unknown = JSON.parse(readFileSync(new URL(`${language}.json`, STOPWORDS_DIR), 'utf-8'));
        const list = z.array(z.string()).parse(raw);
        list.forEach(word => words.add(word));
    }
    return [...words];
}

type Env = Record<string, string | undefined>;

function numberFrom(env: Env, key: string): number | undefined {
    const value = env[key];
    if (value === undefined || value.trim() === '') return undefined;
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
        throw new ConfigurationError(`${key} must be a number, got "${value}"`);
    }
    return parsed;
}

function booleanFrom(env: Env, key: string): boolean | undefined {
    const value = env[key];
    if (value === undefined || value.trim() === '') return undefined;
    return value === 'true';
}

function separatorsFrom(env: Env): string[] | undefined {
    const value = env.CHUNK_SEPARATORS;
    if (value === undefined || value.trim() === '') return undefined;
    try {
        return z.array(z.string()).parse(JSON.parse(value));
    } catch {
        throw new ConfigurationError('CHUNK_SEPARATORS must be a JSON array of strings');
    }
}

export function loadEngineConfig(env: Env = process.env): EngineConfig {
    const languages = (env.STOPWORD_LANGUAGES ?? 'en,es')
        .split(',')
        .map(language => language.trim())
        .filter(Boolean);

    const strategy = env.FUSION_STRATEGY;
    if (strategy !== undefined && strategy !== 'weighted' && strategy !== 'rrf') {
        throw new ConfigurationError(`FUSION_STRATEGY must be "weighted" or "rrf", got "${strategy}"`);
    }

    return parseEngineConfig({
        chunkSize: numberFrom(env, 'CHUNK_SIZE'),
        chunkOverlap: numberFrom(env, 'CHUNK_OVERLAP'),
        separators: separatorsFrom(env),
        separatorLookback: numberFrom(env, 'CHUNK_SEPARATOR_LOOKBACK'),
        normalizeWhitespace: booleanFrom(env, 'NORMALIZE_WHITESPACE'),
        bm25K1: numberFrom(env, 'BM25_K1'),
        bm25B: numberFrom(env, 'BM25_B'),
        stopwords: loadStopwords(languages),
        embeddingDimension: numberFrom(env, 'EMBEDDING_DIMENSION'),
        embeddingTimeoutMs: numberFrom(env, 'EMBEDDING_TIMEOUT_MS'),
        embeddingBatchSize: numberFrom(env, 'EMBEDDING_BATCH_SIZE'),
        minVectorSimilarity: numberFrom(env, 'MIN_VECTOR_SIMILARITY'),
        fusionStrategy: strategy,
        lexicalWeight: numberFrom(env, 'FUSION_WEIGHT_LEXICAL'),
        vectorWeight: numberFrom(env, 'FUSION_WEIGHT_VECTOR'),
        rrfK: numberFrom(env, 'RRF_K'),
        overFetchFactor: numberFrom(env, 'OVER_FETCH_FACTOR'),
        defaultTopK: numberFrom(env, 'DEFAULT_TOP_K'),
        contextBudget: numberFrom(env, 'CONTEXT_BUDGET'),
        overlapTolerance: numberFrom(env, 'OVERLAP_TOLERANCE'),
        lexicalFallbackOnProviderError: booleanFrom(env, 'LEXICAL_FALLBACK_ON_PROVIDER_ERROR'),
    });
}
