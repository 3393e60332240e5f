/**
 * AI Configuration Utilities
 *
 * Environment variable names and default models for each AI task.
 */

/**
 * Environment variables that override the default model for a task.
 */
export const AI_ENV_KEYS = {
  ARTICLE_WRITER: 'AI_MODEL_ARTICLE_WRITER',
} as const;

/**
 * Default OpenRouter models.
 *
 * Gemini Flash is fast and cheap for ~300-1000 word articles and follows
 * structured-output schemas reliably.
 */
export const AI_DEFAULT_MODELS = {
  ARTICLE_WRITER: 'google/gemini-2.0-flash-001',
} as const;

export type AITaskKey = keyof typeof AI_ENV_KEYS;
export type AIEnvKey = (typeof AI_ENV_KEYS)[AITaskKey];

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Get the model for an AI task: the env override when set, otherwise the default.
 *
 * @example
 * getModel('ARTICLE_WRITER', { AI_MODEL_ARTICLE_WRITER: 'openai/gpt-4o-mini' });
 * // 'openai/gpt-4o-mini'
 */
export function getModel(taskKey: AITaskKey, env: EnvSource = process.env): string {
  const override = env[AI_ENV_KEYS[taskKey]]?.trim();
  return override || AI_DEFAULT_MODELS[taskKey];
}
