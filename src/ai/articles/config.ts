/**
 * Article Writer Configuration
 *
 * Tuning constants for the research and writing steps. Anything that varies per
 * deployment (API keys, language, minimum words) is read from the environment by
 * `src/ai/config`; the values here are fixed limits and defaults.
 */

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Thrown at module load time if the constants below are inconsistent, and by
 * `loadArticleWriterConfig` when environment values are out of range.
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Article writer config error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

function validateMinMax(minValue: number, maxValue: number, minName: string, maxName: string): void {
  if (minValue > maxValue) {
    throw new ConfigValidationError(
      `${minName} (${minValue}) cannot be greater than ${maxName} (${maxValue})`
    );
  }
}

function validatePositive(value: number, name: string): void {
  if (value <= 0) {
    throw new ConfigValidationError(`${name} must be positive (got ${value})`);
  }
}

function validateTemperature(value: number, name: string): void {
  if (value < 0 || value > 2) {
    throw new ConfigValidationError(`${name} must be between 0 and 2 (got ${value})`);
  }
}

// ============================================================================
// Request Constraints
// ============================================================================

export const ARTICLE_REQUEST_CONSTRAINTS = {
  TOPIC_MIN_LENGTH: 1,
  TOPIC_MAX_LENGTH: 200,
} as const;

// ============================================================================
// Word Count
// ============================================================================

export const WORD_COUNT_CONSTRAINTS = {
  /** Default minimum word count requested from the model */
  DEFAULT_MIN_WORDS: 300,
  /** Lowest accepted ARTICLE_MIN_WORDS */
  MIN_WORDS_FLOOR: 50,
  /** Highest accepted ARTICLE_MIN_WORDS */
  MIN_WORDS_CEILING: 5000,
} as const;

// ============================================================================
// Research (Wikipedia)
// ============================================================================

export const RESEARCH_CONFIG = {
  DEFAULT_LANGUAGE: 'en',
  DEFAULT_TIMEOUT_MS: 15_000,
  MIN_TIMEOUT_MS: 1_000,
  MAX_TIMEOUT_MS: 60_000,
  /** Longest extract passed on to the writer prompt */
  MAX_EXTRACT_CHARS: 12_000,
  USER_AGENT_NAME: 'WikiArticleWriter',
  USER_AGENT_VERSION: '1.0',
} as const;

// ============================================================================
// Writer (LLM)
// ============================================================================

export const WRITER_CONFIG = {
  /**
   * Moderate temperature: the article should read naturally but stay close
   * to the Wikipedia facts it is given.
   */
  TEMPERATURE: 0.7,
  DEFAULT_TIMEOUT_MS: 120_000,
  MIN_TIMEOUT_MS: 5_000,
  MAX_TIMEOUT_MS: 600_000,
  /** Keywords requested from the model */
  MIN_KEYWORDS: 3,
  MAX_KEYWORDS: 8,
  SUMMARY_MAX_LENGTH: 600,
} as const;

// ============================================================================
// Server
// ============================================================================

export const SERVER_CONFIG = {
  /** Slack added on top of research + generation timeouts for the HTTP request timeout */
  REQUEST_TIMEOUT_SLACK_MS: 30_000,
} as const;

// ============================================================================
// Load-time Validation
// ============================================================================

function validateConfiguration(): void {
  validateMinMax(
    ARTICLE_REQUEST_CONSTRAINTS.TOPIC_MIN_LENGTH,
    ARTICLE_REQUEST_CONSTRAINTS.TOPIC_MAX_LENGTH,
    'ARTICLE_REQUEST_CONSTRAINTS.TOPIC_MIN_LENGTH',
    'ARTICLE_REQUEST_CONSTRAINTS.TOPIC_MAX_LENGTH'
  );

  validateMinMax(
    WORD_COUNT_CONSTRAINTS.MIN_WORDS_FLOOR,
    WORD_COUNT_CONSTRAINTS.DEFAULT_MIN_WORDS,
    'WORD_COUNT_CONSTRAINTS.MIN_WORDS_FLOOR',
    'WORD_COUNT_CONSTRAINTS.DEFAULT_MIN_WORDS'
  );
  validateMinMax(
    WORD_COUNT_CONSTRAINTS.DEFAULT_MIN_WORDS,
    WORD_COUNT_CONSTRAINTS.MIN_WORDS_CEILING,
    'WORD_COUNT_CONSTRAINTS.DEFAULT_MIN_WORDS',
    'WORD_COUNT_CONSTRAINTS.MIN_WORDS_CEILING'
  );

  validatePositive(RESEARCH_CONFIG.MAX_EXTRACT_CHARS, 'RESEARCH_CONFIG.MAX_EXTRACT_CHARS');
  validateMinMax(
    RESEARCH_CONFIG.MIN_TIMEOUT_MS,
    RESEARCH_CONFIG.DEFAULT_TIMEOUT_MS,
    'RESEARCH_CONFIG.MIN_TIMEOUT_MS',
    'RESEARCH_CONFIG.DEFAULT_TIMEOUT_MS'
  );
  validateMinMax(
    RESEARCH_CONFIG.DEFAULT_TIMEOUT_MS,
    RESEARCH_CONFIG.MAX_TIMEOUT_MS,
    'RESEARCH_CONFIG.DEFAULT_TIMEOUT_MS',
    'RESEARCH_CONFIG.MAX_TIMEOUT_MS'
  );

  validateTemperature(WRITER_CONFIG.TEMPERATURE, 'WRITER_CONFIG.TEMPERATURE');
  validateMinMax(
    WRITER_CONFIG.MIN_TIMEOUT_MS,
    WRITER_CONFIG.DEFAULT_TIMEOUT_MS,
    'WRITER_CONFIG.MIN_TIMEOUT_MS',
    'WRITER_CONFIG.DEFAULT_TIMEOUT_MS'
  );
  validateMinMax(
    WRITER_CONFIG.DEFAULT_TIMEOUT_MS,
    WRITER_CONFIG.MAX_TIMEOUT_MS,
    'WRITER_CONFIG.DEFAULT_TIMEOUT_MS',
    'WRITER_CONFIG.MAX_TIMEOUT_MS'
  );
  validateMinMax(
    WRITER_CONFIG.MIN_KEYWORDS,
    WRITER_CONFIG.MAX_KEYWORDS,
    'WRITER_CONFIG.MIN_KEYWORDS',
    'WRITER_CONFIG.MAX_KEYWORDS'
  );
}

validateConfiguration();
