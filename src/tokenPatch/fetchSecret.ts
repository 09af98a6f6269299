/**
 * Requirements addressed:
 * - Exactly one store call per run; no retry, no fallback.
 * - An error or an empty (all-whitespace) value fails the run with the vault/secret/version in
 *   the diagnostic.
 * - The value is returned to the caller and never printed.
 */

import type { SecretReference, SecretStore } from '../secretStore/types';
import type { StatusReporter } from './statusReporter';
import { errorMessage, TokenPatchError } from './tokenPatchError';

export const fetchSecret = async ({
  store,
  ref,
  reporter,
}: {
  store: SecretStore;
  ref: SecretReference;
  reporter: StatusReporter;
}): Promise<string> => {
  reporter.progress(`🔐 Fetching secret from ${store.label}...`);

  let value: string;
  try {
    value = await store.getSecretValue(ref);
  } catch (err) {
    throw new TokenPatchError(
      'secret-fetch-failed',
      `Failed to fetch secret from ${store.label}`,
      {
        details: [
          ...store.describeReference(ref),
          `Reason: ${errorMessage(err)}`,
        ],
        cause: err,
      },
    );
  }

  if (!value.trim()) {
    throw new TokenPatchError(
      'secret-fetch-failed',
      `Failed to fetch secret from ${store.label}`,
      {
        details: [
          ...store.describeReference(ref),
          'Reason: secret value is empty',
        ],
      },
    );
  }

  reporter.success(`✅ Successfully retrieved secret from ${store.label}`);
  return value;
};
