import { z } from 'zod';

export const ingestDocumentSchema = z.object({
  id: z.string().min(1).max(200).optional(),
  sourcePath: z.string().min(1).optional(),
  sourceName: z.string().min(1).optional(),
  content: z.union([
    z.string().min(1, 'Document content cannot be empty'),
    z.array(z.string()).min(1, 'Document must have at least one section'),
  ]),
  metadata: z.record(z.string()).optional(),
});

export const queryDocumentsSchema = z.object({
  question: z.string().min(1, 'Question cannot be empty'),
  k: z.number().int().positive().max(100).optional(),
  budget: z.number().int().nonnegative().optional(),
});

export const askQuestionSchema = z.object({
  question: z.string().min(1, 'Question cannot be empty'),
  k: z.number().int().positive().max(100).optional(),
  budget: z.number().int().nonnegative().optional(),
  expandQuestions: z.boolean().optional(),
});

export type IngestDocumentRequest = z.infer<typeof ingestDocumentSchema>;
export type QueryDocumentsRequest = z.infer<typeof queryDocumentsSchema>;
export type AskQuestionRequest = z.infer<typeof askQuestionSchema>;
