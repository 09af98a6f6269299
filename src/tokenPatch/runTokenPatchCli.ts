/**
 * Requirements addressed:
 * - `vault-token-patch` runs with no arguments, reading its configuration from
 *   the environment and dotenv files; flags override individual fields.
 * - Exit code 0 on full success, 1 on any failure.
 * - Failures print a red headline plus diagnostic lines.
 * - `--debug` routes secret store debug output to the console.
 */

import { Command, CommanderError } from 'commander';

import {
  createSecretStore,
  type CreateSecretStoreOptions,
} from '../secretStore/createSecretStore';
import {
  assertLogger,
  type Logger,
  type SecretStore,
  silentLogger,
} from '../secretStore/types';
import type { PatchFileSystem } from './patchFileSystem';
import { runTokenPatch } from './runTokenPatch';
import { createStatusReporter, shouldUseColor } from './statusReporter';
import {
  loadTokenPatchEnv,
  resolveTokenPatchConfig,
  type TokenPatchConfigOverrides,
} from './tokenPatchConfig';
import { errorMessage, isTokenPatchError } from './tokenPatchError';

export const CLI_NAME = 'vault-token-patch';

type CliOptions = {
  file?: string;
  vault?: string;
  secretName?: string;
  secretVersion?: string;
  placeholder?: string;
  tokenPrefix?: string;
  provider?: string;
  azureMode?: string;
  commandTimeout?: string;
  paths?: string[];
  color: boolean;
  debug?: boolean;
};

export const createProgram = (): Command =>
  new Command()
    .name(CLI_NAME)
    .description(
      'Fetch a secret token from a cloud key vault and patch it into a configuration file.',
    )
    .option('-f, --file <path>', 'configuration file to patch')
    .option('--vault <name>', 'key vault name')
    .option('-s, --secret-name <name>', 'secret name (supports $VAR expansion)')
    .option('--secret-version <version>', 'secret version (default: latest)')
    .option('-p, --placeholder <token>', 'literal placeholder to replace')
    .option('--token-prefix <prefix>', 'prefix of token lines to verify')
    .option('--provider <provider>', 'secret store provider (azure-keyvault)')
    .option('--azure-mode <mode>', 'Azure Key Vault fetch mode: cli | sdk')
    .option('--command-timeout <ms>', 'timeout for store CLI commands')
    .option('--paths <paths...>', 'directories to load .env files from')
    .option('--no-color', 'disable coloured output')
    .option('--debug', 'log secret store debug output')
    .exitOverride();

const toOverrides = (opts: CliOptions): TokenPatchConfigOverrides => ({
  filePath: opts.file,
  vault: opts.vault,
  secretName: opts.secretName,
  secretVersion: opts.secretVersion,
  placeholder: opts.placeholder,
  tokenLinePrefix: opts.tokenPrefix,
  provider: opts.provider,
  azureMode: opts.azureMode,
  commandTimeoutMs: opts.commandTimeout,
});

export type RunTokenPatchCliOptions = {
  /** User arguments (without the node executable and script path). */
  args: string[];
  /** Pre-loaded environment; when omitted, dotenv files are loaded. */
  env?: Record<string, string | undefined>;
  cwd?: string;
  logger?: Logger;
  createStore?: (options: CreateSecretStoreOptions) => SecretStore;
  fs?: PatchFileSystem;
  now?: () => Date;
};

/**
 * Parse arguments, resolve configuration and run the token patch pipeline.
 *
 * @returns The process exit code.
 */
export const runTokenPatchCli = async ({
  args,
  env,
  cwd,
  logger = console,
  createStore = createSecretStore,
  fs,
  now,
}: RunTokenPatchCliOptions): Promise<number> => {
  assertLogger(logger);

  const program = createProgram();
  try {
    program.parse(args, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : 1;
    throw err;
  }
  const opts = program.opts<CliOptions>();

  const reporter = createStatusReporter({
    logger,
    color: opts.color && shouldUseColor(env ?? process.env),
  });

  try {
    const effectiveEnv =
      env ?? (await loadTokenPatchEnv({ paths: opts.paths }));
    const config = resolveTokenPatchConfig({
      env: effectiveEnv,
      overrides: toOverrides(opts),
      cwd,
    });

    const store = createStore({
      provider: config.provider,
      azureMode: config.azureMode,
      commandTimeoutMs: config.commandTimeoutMs,
      logger: opts.debug ? logger : silentLogger,
    });

    await runTokenPatch({ config, store, reporter, fs, now });
    return 0;
  } catch (err) {
    if (isTokenPatchError(err)) {
      reporter.failure(`❌ ${err.message}`);
      for (const line of err.details) reporter.failure(`   ${line}`);
    } else {
      reporter.failure(`❌ Unexpected error: ${errorMessage(err)}`);
    }
    return 1;
  }
};
