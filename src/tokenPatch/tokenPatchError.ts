/**
 * Requirements addressed:
 * - Every failure is terminal for the run and carries enough context
 *   (vault/secret/version, file path) to debug manually.
 * - Failures are classified so callers can branch without string matching.
 */

/** Pipeline states, in order. `FAILED` is terminal. */
export type TokenPatchState =
  | 'START'
  | 'VALIDATED'
  | 'FETCHED'
  | 'PATCHED'
  | 'VERIFIED'
  | 'DONE'
  | 'FAILED';

export type TokenPatchErrorKind =
  | 'config-invalid'
  | 'tool-missing'
  | 'not-authenticated'
  | 'target-missing'
  | 'secret-fetch-failed'
  | 'patch-failed'
  | 'verification-failed';

export class TokenPatchError extends Error {
  readonly kind: TokenPatchErrorKind;
  /** Extra diagnostic lines, printed under the headline. */
  readonly details: string[];
  /** Last state reached before the failure, once the pipeline has started. */
  reachedState?: TokenPatchState;

  constructor(
    kind: TokenPatchErrorKind,
    message: string,
    { details = [], cause }: { details?: string[]; cause?: unknown } = {},
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TokenPatchError';
    this.kind = kind;
    this.details = details;
  }
}

export const isTokenPatchError = (err: unknown): err is TokenPatchError =>
  err instanceof TokenPatchError;

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
