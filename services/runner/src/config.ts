export const RUNNER_CONFIG = {
  /** Max serialized answer size (bytes). Larger answers fail the `answer_size` check without parsing. */
  MAX_ANSWER_BYTES: 256 * 1024,
  /** Score when every check passes; any failure scores 0. */
  PASS_SCORE: 100,
  /** Max length kept from an internal error message. */
  MAX_ERROR_CHARS: 500
};

export const CHECK_NAMES = {
  ROWS_PRESENT: "rows_present",
  NON_EMPTY: "non_empty_submission",
  ANSWER_SIZE: "answer_size",
  EXCEPTION: "exception"
} as const;
