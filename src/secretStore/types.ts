/**
 * Requirements addressed:
 * - A secret is addressed by (vault, secret name, version) and read once per run.
 * - Secret stores expose prerequisite checks and a single-value read; the
 *   pipeline never talks to a cloud SDK or CLI directly.
 */

/**
 * Console-like logger contract used across this package.
 *
 * Custom loggers must implement these methods (no internal polyfills are
 * applied).
 */
export type Logger = Pick<Console, 'debug' | 'error' | 'info' | 'warn'>;

/** Coordinates of a secret in a secret store. */
export type SecretReference = {
  /** Azure Key Vault name. */
  vault: string;
  /** Secret name (or secret id). */
  secretName: string;
  /** Secret version; omit to read the current version. */
  secretVersion?: string;
};

/** Supported secret store backends. */
export type SecretStoreProvider = 'azure-keyvault';

/**
 * A cloud secret store the token patch pipeline can read from.
 *
 * Prerequisite assertions throw a `TokenPatchError` describing the missing
 * condition; `getSecretValue` throws on transport or service errors and
 * returns the raw value otherwise (emptiness is judged by the caller).
 */
export interface SecretStore {
  /** Human-readable store name, e.g. `Azure Key Vault`. */
  readonly label: string;
  assertToolInstalled(): Promise<void>;
  assertAuthenticated(): Promise<void>;
  /** Diagnostic lines identifying a reference, for operator debugging. */
  describeReference(ref: SecretReference): string[];
  getSecretValue(ref: SecretReference): Promise<string>;
}

export const assertLogger = (candidate: unknown): Logger => {
  if (!candidate || typeof candidate !== 'object') {
    throw new Error(
      'logger must be an object with debug, info, warn, and error methods',
    );
  }
  const logger = candidate as Partial<Logger>;
  if (
    typeof logger.debug !== 'function' ||
    typeof logger.info !== 'function' ||
    typeof logger.warn !== 'function' ||
    typeof logger.error !== 'function'
  ) {
    throw new Error(
      'logger must implement debug, info, warn, and error methods; wrap/proxy your logger if needed',
    );
  }
  return logger as Logger;
};

const noop = (): void => undefined;

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: noop,
  error: noop,
  info: noop,
  warn: noop,
};
