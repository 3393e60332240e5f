import React from 'react';
import {
  Main,
  Box,
  Typography,
  Button,
  Field,
  TextInput,
  Flex,
  Loader,
  Badge,
  Divider,
} from '@strapi/design-system';
import { Play, Cross } from '@strapi/icons';

import type { ArticleResult } from '../../ai/articles/types';

// ============================================================================
// Response Parsing
// ============================================================================

interface RequestError {
  message: string;
  stage?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isArticleResult(value: unknown): value is ArticleResult {
  return (
    isRecord(value) &&
    typeof value.title === 'string' &&
    typeof value.content === 'string' &&
    isRecord(value.sections) &&
    Array.isArray(value.keywords) &&
    typeof value.wordCount === 'number' &&
    typeof value.minWordCount === 'number'
  );
}

function readRequestError(json: unknown, status: number): RequestError {
  if (isRecord(json) && isRecord(json.error) && typeof json.error.message === 'string') {
    return {
      message: json.error.message,
      stage: typeof json.error.stage === 'string' ? json.error.stage : undefined,
    };
  }
  return { message: `Request failed with HTTP ${status}` };
}

function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

// ============================================================================
// Article View
// ============================================================================

interface SectionProps {
  heading: string;
  text: string;
}

const Section: React.FC<SectionProps> = ({ heading, text }) => (
  <Box marginTop={6}>
    <Typography variant="delta" tag="h2">
      {heading}
    </Typography>
    {splitParagraphs(text).map((paragraph, index) => (
      <Box key={index} marginTop={3}>
        <Typography variant="omega">{paragraph}</Typography>
      </Box>
    ))}
  </Box>
);

const ArticleView: React.FC<{ article: ArticleResult }> = ({ article }) => (
  <Box background="neutral0" padding={8} hasRadius shadow="filterShadow">
    <Typography variant="alpha" tag="h1">
      {article.title}
    </Typography>

    <Flex gap={2} marginTop={3} wrap="wrap">
      <Badge active={article.meetsMinWordCount}>
        {article.wordCount} words
      </Badge>
      {!article.meetsMinWordCount && (
        <Badge>below the {article.minWordCount}-word minimum</Badge>
      )}
      <Badge>{article.model}</Badge>
    </Flex>

    <Box marginTop={6}>
      <Typography variant="sigma" textColor="neutral600">
        SUMMARY
      </Typography>
      <Box marginTop={2}>
        <Typography variant="epsilon">{article.summary}</Typography>
      </Box>
    </Box>

    <Section heading="Introduction" text={article.sections.introduction} />
    <Section heading="Development" text={article.sections.body} />
    <Section heading="Conclusion" text={article.sections.conclusion} />

    <Box marginTop={6}>
      <Divider />
    </Box>

    <Box marginTop={4}>
      <Typography variant="sigma" textColor="neutral600">
        KEYWORDS
      </Typography>
      <Flex gap={2} marginTop={2} wrap="wrap">
        {article.keywords.map((keyword) => (
          <Badge key={keyword}>{keyword}</Badge>
        ))}
      </Flex>
    </Box>

    <Box marginTop={4}>
      <Typography variant="sigma" textColor="neutral600">
        REFERENCE
      </Typography>
      <Box marginTop={2}>
        {article.source ? (
          <Typography variant="pi">{article.source.citation}</Typography>
        ) : (
          <Typography variant="pi" textColor="neutral500">
            No Wikipedia page was found for this topic; the article was written without a source.
          </Typography>
        )}
      </Box>
    </Box>
  </Box>
);

// ============================================================================
// Main Component
// ============================================================================

const ArticleWriter: React.FC = () => {
  const [topic, setTopic] = React.useState('');
  const [isGenerating, setIsGenerating] = React.useState(false);
  const [error, setError] = React.useState<RequestError | null>(null);
  const [article, setArticle] = React.useState<ArticleResult | null>(null);

  const handleGenerate = async () => {
    const trimmed = topic.trim();
    if (!trimmed) {
      setError({ message: 'Please enter a topic.' });
      return;
    }

    setIsGenerating(true);
    setError(null);
    setArticle(null);

    try {
      const response = await fetch('/api/article-writer/generate', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ topic: trimmed }),
      });
      const json: unknown = await response.json().catch(() => null);

      if (!response.ok) {
        setError(readRequestError(json, response.status));
        return;
      }

      const data = isRecord(json) ? json.data : null;
      if (!isArticleResult(data)) {
        setError({ message: 'The server returned an unexpected response.' });
        return;
      }
      setArticle(data);
    } catch (err) {
      setError({ message: err instanceof Error ? err.message : 'Network error' });
    } finally {
      setIsGenerating(false);
    }
  };

  const handleSubmit = (event: React.FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    void handleGenerate();
  };

  return (
    <Main>
      <Box paddingLeft={10} paddingRight={10} paddingTop={8} paddingBottom={4}>
        <Typography variant="alpha" tag="h1">
          Article Writer
        </Typography>
        <Box marginTop={1}>
          <Typography variant="epsilon" textColor="neutral600">
            Enter a topic. It is researched on Wikipedia and turned into an article.
          </Typography>
        </Box>
      </Box>

      <Box paddingLeft={10} paddingRight={10} paddingBottom={10}>
        <Box background="neutral0" padding={6} hasRadius shadow="filterShadow">
          <form onSubmit={handleSubmit}>
            <Flex gap={4} alignItems="flex-end">
              <Box flex="1">
                <Field.Root name="topic" error={error?.message}>
                  <Field.Label>Topic</Field.Label>
                  <TextInput
                    placeholder="e.g. Artificial Intelligence"
                    value={topic}
                    disabled={isGenerating}
                    onChange={(e: React.ChangeEvent<HTMLInputElement>) => setTopic(e.target.value)}
                  />
                  <Field.Error />
                  <Field.Hint>Research and writing take up to a couple of minutes.</Field.Hint>
                </Field.Root>
              </Box>
              <Button
                type="submit"
                size="L"
                disabled={isGenerating}
                startIcon={isGenerating ? <Loader small /> : <Play />}
              >
                {isGenerating ? 'Generating...' : 'Generate'}
              </Button>
            </Flex>
          </form>

          {error?.stage && (
            <Flex gap={2} marginTop={3} alignItems="center">
              <Cross width={12} height={12} />
              <Typography variant="pi" textColor="danger600">
                Failed during {error.stage}
              </Typography>
            </Flex>
          )}
        </Box>

        {isGenerating && (
          <Flex justifyContent="center" padding={8}>
            <Loader>Researching and writing...</Loader>
          </Flex>
        )}

        {article && (
          <Box marginTop={6}>
            <ArticleView article={article} />
          </Box>
        )}
      </Box>
    </Main>
  );
};

export default ArticleWriter;
