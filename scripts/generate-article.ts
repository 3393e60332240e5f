/**
 * Generate one article from the command line.
 *
 * Usage:
 *   npm run generate:article -- "Artificial Intelligence"
 *   npm run generate:article -- "Alan Turing" --markdown
 *
 * Requirements:
 *   - OPENROUTER_API_KEY and WIKIPEDIA_CONTACT_EMAIL in .env or the environment
 *
 * Prints the ArticleResult as JSON (or as markdown with --markdown).
 * Exit code 1 on failure, 2 on bad usage.
 */

import { config } from 'dotenv';

import { createArticleWriter } from '../src/ai/articles/generate-article';
import { isArticleWriterError, type ArticleResult } from '../src/ai/articles/types';
import { ConfigValidationError } from '../src/ai/articles/config';
import { loadArticleWriterConfig } from '../src/ai/config';

config();

function toMarkdown(article: ArticleResult): string {
  const lines = [
    `# ${article.title}`,
    '',
    `> ${article.summary}`,
    '',
    '## Introduction',
    '',
    article.sections.introduction,
    '',
    '## Development',
    '',
    article.sections.body,
    '',
    '## Conclusion',
    '',
    article.sections.conclusion,
    '',
    `Keywords: ${article.keywords.join(', ')}`,
    `Words: ${article.wordCount} (minimum ${article.minWordCount})`,
  ];
  if (article.source) {
    lines.push('', '## Reference', '', article.source.citation);
  }
  return lines.join('\n');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const markdown = args.includes('--markdown');
  const topic = args.filter((arg) => !arg.startsWith('--')).join(' ').trim();

  if (!topic) {
    console.error('Usage: npm run generate:article -- "<topic>" [--markdown]');
    process.exitCode = 2;
    return;
  }

  const writer = createArticleWriter(loadArticleWriterConfig());
  const article = await writer.generate({ topic });
  console.log(markdown ? toMarkdown(article) : JSON.stringify(article, null, 2));
}

main().catch((error: unknown) => {
  if (isArticleWriterError(error)) {
    console.error(`❌ ${error.stage} failed: ${error.message}`);
  } else if (error instanceof ConfigValidationError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error('❌ Unexpected error:', error);
  }
  process.exitCode = 1;
});
