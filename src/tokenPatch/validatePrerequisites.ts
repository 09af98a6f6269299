/**
 * Requirements addressed:
 * - Check, in order: store CLI installed, caller authenticated, target file
 *   exists. Fail fast with a distinct message per condition; no retries.
 * - No side effects.
 */

import type { SecretStore } from '../secretStore/types';
import type { PatchFileSystem } from './patchFileSystem';
import type { StatusReporter } from './statusReporter';
import { TokenPatchError } from './tokenPatchError';

export const validatePrerequisites = async ({
  store,
  filePath,
  fs,
  reporter,
}: {
  store: SecretStore;
  filePath: string;
  fs: PatchFileSystem;
  reporter: StatusReporter;
}): Promise<void> => {
  reporter.progress('🔍 Validating prerequisites...');

  await store.assertToolInstalled();
  await store.assertAuthenticated();

  if (!(await fs.isFile(filePath))) {
    throw new TokenPatchError(
      'target-missing',
      `Configuration file not found: ${filePath}`,
    );
  }

  reporter.success('✅ Prerequisites validated successfully');
};
