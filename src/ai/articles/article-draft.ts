/**
 * Article Draft Schema
 *
 * Structure the writer asks the model to return. Used as the `schema` of
 * `generateObject`, so the model output is validated before it reaches the pipeline.
 */

import { z } from 'zod';

import { WRITER_CONFIG } from './config';

export const ArticleDraftSchema = z.object({
  title: z.string().min(1).describe('Article title, without markdown'),
  summary: z
    .string()
    .min(1)
    .describe(`Two or three sentence abstract, at most ${WRITER_CONFIG.SUMMARY_MAX_LENGTH} characters`),
  introduction: z.string().min(1).describe('Introduction: one or two paragraphs'),
  body: z.string().min(1).describe('Development: several paragraphs separated by blank lines'),
  conclusion: z.string().min(1).describe('Conclusion: one or two paragraphs'),
  // Length targets live in the prompt; toGeneratedArticle enforces the caps
  keywords: z
    .array(z.string())
    .describe(`${WRITER_CONFIG.MIN_KEYWORDS} to ${WRITER_CONFIG.MAX_KEYWORDS} lowercase keywords describing the article`),
});

export type ArticleDraft = z.infer<typeof ArticleDraftSchema>;
