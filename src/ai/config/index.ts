export {
  describeArticleWriterConfig,
  loadArticleWriterConfig,
  resolveArticleWriterConfig,
} from './article-writer';
export { AI_DEFAULT_MODELS, AI_ENV_KEYS, getModel } from './utils';
export type { AIEnvKey, AITaskKey, EnvSource } from './utils';
export type {
  ArticleWriterConfig,
  ArticleWriterConfigResolution,
  ArticleWriterStatus,
  WikipediaConfig,
} from './types';
