import type { Core } from '@strapi/strapi';

import { SERVER_CONFIG, RESEARCH_CONFIG, WRITER_CONFIG } from './ai/articles/config';
import { describeArticleWriterConfig, resolveArticleWriterConfig } from './ai/config';
import type { ArticleWriterConfigResolution } from './ai/config/types';

/**
 * HTTP request timeout for POST /api/article-writer/generate.
 *
 * One request runs the Wikipedia lookup and then the LLM call, each bounded by its
 * own timeout. Node's default request timeout (5 minutes) can be shorter than the
 * configured generation timeout, so the server waits for both plus some slack.
 */
export function getRequestTimeoutMs(resolution: ArticleWriterConfigResolution): number {
  const research = resolution.ok ? resolution.config.wikipedia.timeoutMs : RESEARCH_CONFIG.DEFAULT_TIMEOUT_MS;
  const generation = resolution.ok ? resolution.config.generationTimeoutMs : WRITER_CONFIG.DEFAULT_TIMEOUT_MS;
  return research + generation + SERVER_CONFIG.REQUEST_TIMEOUT_SLACK_MS;
}

export default {
  /**
   * An asynchronous register function that runs before
   * your application is initialized.
   */
  register(/* { strapi }: { strapi: Core.Strapi } */) {},

  /**
   * An asynchronous bootstrap function that runs before
   * your application gets started.
   */
  async bootstrap({ strapi }: { strapi: Core.Strapi }) {
    const resolution = resolveArticleWriterConfig();
    const status = describeArticleWriterConfig(resolution);

    if (status.configured) {
      strapi.log.info(
        `[ArticleWriter] Ready: model=${status.model} language=${status.language} minWords=${status.minWordCount}`
      );
    } else {
      strapi.log.warn(`[ArticleWriter] Not configured: ${status.issues.join('; ')}`);
    }

    // headersTimeout must stay below requestTimeout
    const httpServer = strapi.server?.httpServer;
    if (httpServer) {
      const requestTimeoutMs = getRequestTimeoutMs(resolution);
      httpServer.requestTimeout = requestTimeoutMs;
      httpServer.headersTimeout = Math.min(httpServer.headersTimeout, requestTimeoutMs - 1000);
      httpServer.timeout = requestTimeoutMs;

      strapi.log.info(`HTTP request timeout set to ${requestTimeoutMs}ms`);
    }
  },
};
