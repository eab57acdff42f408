import { z } from 'zod';
import { providerNameSchema } from '../lib/config.js';
import { isSupportedLanguage } from '../lib/languages.js';
import type { JobInput } from './types.js';

export const documentInputSchema = z.object({
  format: z.string().min(1).max(20),
  content: z.string(),
  filename: z.string().max(255).optional(),
});

const questionsSchema = z.array(z.string().max(20_000)).min(1).max(500);

/**
 * What travels through the queue. Exactly one of `questions` or `document`
 * is present.
 */
export const jobPayloadSchema = z.object({
  sessionId: z.string().uuid(),
  language: z.string().refine(isSupportedLanguage, { message: 'Unsupported language' }),
  providerPreference: providerNameSchema.nullable().optional(),
  questions: questionsSchema.optional(),
  document: documentInputSchema.optional(),
}).refine((p) => (p.questions === undefined) !== (p.document === undefined), {
  message: 'Provide either questions or document, not both',
});

export type JobPayload = z.infer<typeof jobPayloadSchema>;

/** Enough of a payload to find its session when the rest is unreadable. */
export const payloadSessionSchema = z.object({ sessionId: z.string().uuid() });

export function toJobInput(payload: JobPayload): JobInput {
  return {
    sessionId: payload.sessionId,
    language: payload.language,
    providerPreference: payload.providerPreference ?? null,
    questions: payload.questions,
    document: payload.document,
  };
}
