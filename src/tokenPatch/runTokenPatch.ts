/**
 * Requirements addressed:
 * - Run START → VALIDATED → FETCHED → PATCHED → VERIFIED → DONE, top to
 *   bottom, stopping at the first failure.
 * - Failures carry the last state reached.
 * - An empty or failed fetch stops the run before the target is touched.
 */

import path from 'node:path';

import type { SecretStore } from '../secretStore/types';
import { fetchSecret } from './fetchSecret';
import {
  defaultPatchFileSystem,
  type PatchFileSystem,
} from './patchFileSystem';
import { patchConfigFile } from './patchConfigFile';
import type { StatusReporter } from './statusReporter';
import type { TokenPatchConfig } from './tokenPatchConfig';
import { isTokenPatchError, type TokenPatchState } from './tokenPatchError';
import { validatePrerequisites } from './validatePrerequisites';
import { verifyConfigFile } from './verifyConfigFile';

export type TokenPatchResult = {
  state: 'DONE';
  filePath: string;
  backupPath: string;
  replacements: number;
  tokenLineCount: number;
};

export type RunTokenPatchOptions = {
  config: Pick<
    TokenPatchConfig,
    | 'filePath'
    | 'vault'
    | 'secretName'
    | 'secretVersion'
    | 'placeholder'
    | 'tokenLinePrefix'
  >;
  store: SecretStore;
  reporter: StatusReporter;
  fs?: PatchFileSystem;
  /** Clock used for the backup timestamp. */
  now?: () => Date;
};

export const runTokenPatch = async ({
  config,
  store,
  reporter,
  fs = defaultPatchFileSystem,
  now = () => new Date(),
}: RunTokenPatchOptions): Promise<TokenPatchResult> => {
  const { filePath, placeholder, tokenLinePrefix } = config;
  let state: TokenPatchState = 'START';

  try {
    reporter.success('🚀 Starting token configuration update...');
    reporter.blank();

    await validatePrerequisites({ store, filePath, fs, reporter });
    state = 'VALIDATED';
    reporter.blank();

    const secretValue = await fetchSecret({
      store,
      ref: {
        vault: config.vault,
        secretName: config.secretName,
        secretVersion: config.secretVersion,
      },
      reporter,
    });
    state = 'FETCHED';
    reporter.blank();

    const { backupPath, replacements } = await patchConfigFile({
      filePath,
      placeholder,
      secretValue,
      fs,
      reporter,
      now: now(),
    });
    state = 'PATCHED';
    reporter.blank();

    const tokenLineCount = await verifyConfigFile({
      filePath,
      placeholder,
      tokenLinePrefix,
      fs,
      reporter,
    });
    state = 'VERIFIED';
    reporter.blank();

    reporter.success(
      `🎉 ${path.basename(filePath)} successfully updated with the secret token!`,
    );
    reporter.success(`📁 Configuration file: ${filePath}`);

    return {
      state: 'DONE',
      filePath,
      backupPath,
      replacements,
      tokenLineCount,
    };
  } catch (err) {
    if (isTokenPatchError(err)) err.reachedState = state;
    throw err;
  }
};
