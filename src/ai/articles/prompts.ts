/**
 * Writer Prompts
 */

import { WRITER_CONFIG } from './config';
import type { ResearchContext } from './types';

export interface WriterPromptContext {
  readonly topic: string;
  readonly research: ResearchContext;
  readonly minWordCount: number;
}

export function getWriterSystemPrompt(): string {
  return `You are an experienced article writer.

You turn encyclopedia research into clear, engaging articles for a general audience.

Rules:
- Ground every factual claim in the research provided. If the research does not cover something, write around it instead of inventing details.
- Write plain prose. No markdown headings, bullet lists or links inside the text fields.
- Separate paragraphs with a blank line.
- Write in the same language as the topic and the research.`;
}

function buildResearchSection(research: ResearchContext): string {
  if (!research.found) {
    return `No encyclopedia article was found for this topic.
Write from well-established general knowledge and keep claims cautious.`;
  }
  return `Source: ${research.title ?? research.topic}${research.url ? ` (${research.url})` : ''}

${research.extract}`;
}

export function getWriterUserPrompt(ctx: WriterPromptContext): string {
  return `Write an article about "${ctx.topic}".

=== RESEARCH ===
${buildResearchSection(ctx.research)}

=== REQUIREMENTS ===
- Length: at least ${ctx.minWordCount} words across introduction, body and conclusion combined.
- Structure: title, introduction, body (development) and conclusion.
- Summary: two or three sentences, at most ${WRITER_CONFIG.SUMMARY_MAX_LENGTH} characters.
- Keywords: ${WRITER_CONFIG.MIN_KEYWORDS} to ${WRITER_CONFIG.MAX_KEYWORDS} lowercase keywords.`;
}
