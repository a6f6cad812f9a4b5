/**
 * Application Constants
 *
 * Fixed limits used across the query pipeline. Values that operators tune per
 * deployment live in settings.ts instead.
 */

/**
 * Conversation history formatting for prompts.
 */
export const HISTORY_LIMITS = {
  /**
   * Number of most recent exchanges included in any prompt.
   */
  TURNS_IN_PROMPT: 3,

  // SQL generation
  SQL_RECENT_ANSWER_CHARS: 600,
  SQL_OLDER_ANSWER_CHARS: 300,

  // Answer synthesis
  SYNTHESIS_RECENT_ANSWER_CHARS: 800,
  SYNTHESIS_OLDER_ANSWER_CHARS: 300,

  // Supervisor context lines
  SUPERVISOR_SNIPPET_CHARS: 100,
} as const;

/**
 * Per-field truncation applied to result rows before they are sent for synthesis.
 */
export const RESULT_FIELD_LIMITS = {
  DEFAULT_MAX_CHARS: 200,
  EMAIL_BODY_MAX_CHARS: 3000,
  RECORDING_SUMMARY_MAX_CHARS: 2000,

  /**
   * Classification fields are short labels and are passed through untouched.
   */
  UNTRUNCATED_FIELDS: ["classification_raw", "category", "call_intent"],
} as const;

/**
 * Deterministic fallback formatting.
 */
export const FALLBACK_LIMITS = {
  MAX_LISTED_ITEMS: 5,
  MAX_LISTED_MESSAGES: 10,
  MAX_LISTED_COLUMNS: 5,
  CALL_SUMMARY_CHARS: 300,
  SNIPPET_CHARS: 300,
} as const;

export const DATA_STORE_CONSTANTS = {
  /**
   * Extra time the client-side guard waits beyond the server statement timeout,
   * so the server error (with its SQLSTATE) normally wins the race.
   */
  CLIENT_GUARD_GRACE_MS: 2000,
} as const;

export const BACKOFF_CONSTANTS = {
  INITIAL_DELAY_MS: 500,
  MAX_DELAY_MS: 4000,
  MULTIPLIER: 2,
} as const;
