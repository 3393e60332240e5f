import type { ArticleResult, ArticleWriterErrorCode, ArticleWriterStage } from '../../ai/articles/types';
import type { ArticleWriterStatus } from '../../ai/config/types';

/**
 * The part of Strapi's Koa context the article writer controller touches.
 */
export interface ArticleWriterContext {
  request: { body?: unknown };
  status: number;
  body: unknown;
  badRequest: (message: string, details?: unknown) => unknown;
}

export interface ArticleWriterSuccessBody {
  data: ArticleResult;
}

export interface ArticleWriterStatusBody {
  data: ArticleWriterStatus;
}

/**
 * Error envelope for failures Strapi would otherwise reduce to a bare
 * "Internal Server Error": not configured (500), research or generation (502).
 */
export interface ArticleWriterErrorBody {
  data: null;
  error: {
    status: number;
    name: string;
    code: ArticleWriterErrorCode;
    stage: ArticleWriterStage;
    message: string;
    details?: { issues: readonly string[] };
  };
}
