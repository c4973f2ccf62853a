/**
 * Exit codes used by the lingolayer CLI.
 *
 * | Code | Meaning                                                 |
 * |------|---------------------------------------------------------|
 * | 0    | Success                                                 |
 * | 1    | General error, missing language data                    |
 * | 2    | Configuration error (invalid config, unknown format)    |
 */
export const EXIT_CODES = {
  /** Success - command completed */
  SUCCESS: 0,
  /** General error (catch-all for exceptions) */
  ERROR: 1,
  /** Invalid configuration or engine setup */
  CONFIGURATION: 2,
} as const;
