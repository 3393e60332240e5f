import {
  ArticleRequestSchema,
  createArticleWriter,
  type ArticleWriter,
} from '../../../ai/articles/generate-article';
import { isArticleWriterError, type ArticleWriterError } from '../../../ai/articles/types';
import { describeArticleWriterConfig, resolveArticleWriterConfig } from '../../../ai/config';
import type { ArticleWriterStatus } from '../../../ai/config/types';
import { createPrefixedLogger, type StructuredLogger } from '../../../utils/logger';
import type {
  ArticleWriterContext,
  ArticleWriterErrorBody,
  ArticleWriterStatusBody,
  ArticleWriterSuccessBody,
} from '../types';

export interface ArticleWriterControllerDeps {
  /** Null when the environment is incomplete */
  readonly writer: ArticleWriter | null;
  readonly status: ArticleWriterStatus;
  readonly logger?: StructuredLogger;
}

function errorBody(status: number, error: ArticleWriterError): ArticleWriterErrorBody {
  return {
    data: null,
    error: {
      status,
      name: error.name,
      code: error.code,
      stage: error.stage,
      message: error.message,
    },
  };
}

function notConfiguredBody(issues: readonly string[]): ArticleWriterErrorBody {
  return {
    data: null,
    error: {
      status: 500,
      name: 'ArticleWriterError',
      code: 'CONFIG_ERROR',
      stage: 'config',
      message:
        issues.length > 0
          ? `Article writer is not configured: ${issues.join('; ')}`
          : 'Article writer is not configured',
      details: { issues },
    },
  };
}

export function createArticleWriterController(deps: ArticleWriterControllerDeps) {
  const log = deps.logger ?? createPrefixedLogger('[ArticleWriterAPI]');

  return {
    /**
     * Research a topic and write an article about it.
     * POST /api/article-writer/generate
     * Body: { topic: string }
     */
    async generate(ctx: ArticleWriterContext) {
      const parsed = ArticleRequestSchema.safeParse(ctx.request.body ?? {});
      if (!parsed.success) {
        return ctx.badRequest('Invalid request body', { issues: parsed.error.issues });
      }

      if (!deps.writer) {
        ctx.status = 500;
        ctx.body = notConfiguredBody(deps.status.issues);
        return;
      }

      try {
        const article = await deps.writer.generate(parsed.data);
        const body: ArticleWriterSuccessBody = { data: article };
        ctx.status = 200;
        ctx.body = body;
      } catch (error) {
        if (!isArticleWriterError(error)) {
          throw error;
        }
        if (error.code === 'VALIDATION_FAILED') {
          return ctx.badRequest(error.message, { issues: error.details });
        }
        const status = error.code === 'CONFIG_ERROR' ? 500 : 502;
        log.warn(`Request for "${parsed.data.topic}" failed at ${error.stage}: ${error.message}`);
        ctx.status = status;
        ctx.body = errorBody(status, error);
      }
    },

    /**
     * Report whether the writer can run. Never includes secrets.
     * GET /api/article-writer/status
     */
    async status(ctx: ArticleWriterContext) {
      const body: ArticleWriterStatusBody = { data: deps.status };
      ctx.status = 200;
      ctx.body = body;
    },
  };
}

export default () => {
  const resolution = resolveArticleWriterConfig();
  const status = describeArticleWriterConfig(resolution);

  return createArticleWriterController({
    writer: resolution.ok ? createArticleWriter(resolution.config) : null,
    status,
  });
};
