/**
 * Requirements addressed:
 * - Read a single secret value from Azure Key Vault by (vault, name, version).
 * - Prerequisites: Azure CLI installed (`az --version`) and, in `cli` mode,
 *   logged in (`az account show`). In `sdk` mode `DefaultAzureCredential`
 *   authenticates on its own.
 * - Two fetch modes chosen by configuration, never chained as a fallback:
 *   - `cli` (default): `az keyvault secret show ... --query value --output tsv`
 *   - `sdk`: `SecretClient.getSecret` with `DefaultAzureCredential`.
 * - Never log the secret value.
 */

import { DefaultAzureCredential } from '@azure/identity';
import { SecretClient } from '@azure/keyvault-secrets';

import { TokenPatchError } from '../tokenPatch/tokenPatchError';
import {
  COMMAND_NOT_FOUND,
  type CommandRunner,
  formatCommand,
  runCommand,
} from './commandRunner';
import {
  assertLogger,
  type Logger,
  type SecretReference,
  type SecretStore,
} from './types';

/** Azure Key Vault fetch mode. */
export type AzureKeyVaultMode = 'cli' | 'sdk';

type KeyVaultSecretClientLike = {
  getSecret: (
    name: string,
    options?: { version?: string },
  ) => Promise<{ value?: string }>;
};

export type AzureKeyVaultSecretStoreOptions = {
  /** Logger instance (must implement debug/info/warn/error). Defaults to `console`. */
  logger?: Logger;
  /** Fetch mode. Defaults to `cli`. */
  mode?: AzureKeyVaultMode;
  /** Per-command timeout for `az` invocations (omit for none). */
  commandTimeoutMs?: number;
  /** Injection seam for tests: replaces child-process execution of `az`. */
  runner?: CommandRunner;
  /**
   * Injection seam for tests and advanced consumers: builds the SDK client for
   * a vault URL. Only used in `sdk` mode.
   */
  createClient?: (vaultUrl: string) => KeyVaultSecretClientLike;
};

export const toVaultUrl = (vault: string): string =>
  `https://${vault}.vault.azure.net/`;

const defaultCreateClient = (vaultUrl: string): KeyVaultSecretClientLike =>
  new SecretClient(vaultUrl, new DefaultAzureCredential());

/**
 * Azure Key Vault secret store.
 */
export class AzureKeyVaultSecretStore implements SecretStore {
  readonly label = 'Azure Key Vault';
  readonly mode: AzureKeyVaultMode;

  readonly #logger: Logger;
  readonly #runner: CommandRunner;
  readonly #timeoutMs: number | undefined;
  readonly #createClient: (vaultUrl: string) => KeyVaultSecretClientLike;

  constructor({
    logger = console,
    mode = 'cli',
    commandTimeoutMs,
    runner = runCommand,
    createClient = defaultCreateClient,
  }: AzureKeyVaultSecretStoreOptions = {}) {
    this.#logger = assertLogger(logger);
    this.mode = mode;
    this.#runner = runner;
    this.#timeoutMs = commandTimeoutMs;
    this.#createClient = createClient;
  }

  async #az(args: string[]) {
    const options = { cmd: 'az', args, timeoutMs: this.#timeoutMs };
    this.#logger.debug(`Running ${formatCommand(options)}`);
    return await this.#runner(options);
  }

  async assertToolInstalled(): Promise<void> {
    const res = await this.#az(['--version']);
    if (res.code !== 0) {
      const reason = res.stderr.trim();
      throw new TokenPatchError(
        'tool-missing',
        'Azure CLI is not installed. Please install it first.',
        res.code !== COMMAND_NOT_FOUND && reason ? { details: [reason] } : {},
      );
    }
  }

  async assertAuthenticated(): Promise<void> {
    if (this.mode === 'sdk') {
      this.#logger.debug('Skipping az login check; SDK credentials are used.');
      return;
    }

    const res = await this.#az(['account', 'show']);
    if (res.code !== 0) {
      throw new TokenPatchError(
        'not-authenticated',
        "Not logged in to Azure. Please run 'az login' first.",
      );
    }
  }

  describeReference({
    vault,
    secretName,
    secretVersion,
  }: SecretReference): string[] {
    return [
      `Vault: ${toVaultUrl(vault)}`,
      `Secret: ${secretName}`,
      `Version: ${secretVersion ?? 'latest'}`,
    ];
  }

  async getSecretValue(ref: SecretReference): Promise<string> {
    if (!ref.vault) throw new Error('vault is required');
    if (!ref.secretName) throw new Error('secretName is required');

    return this.mode === 'sdk'
      ? await this.#getViaSdk(ref)
      : await this.#getViaCli(ref);
  }

  async #getViaCli({
    vault,
    secretName,
    secretVersion,
  }: SecretReference): Promise<string> {
    const res = await this.#az([
      'keyvault',
      'secret',
      'show',
      '--vault-name',
      vault,
      '--name',
      secretName,
      ...(secretVersion ? ['--version', secretVersion] : []),
      '--query',
      'value',
      '--output',
      'tsv',
    ]);

    if (res.code !== 0) {
      const reason = res.stderr.trim();
      throw new Error(
        `az exited with code ${String(res.code)}${reason ? `: ${reason}` : ''}`,
      );
    }

    return res.stdout.trim();
  }

  async #getViaSdk({
    vault,
    secretName,
    secretVersion,
  }: SecretReference): Promise<string> {
    const vaultUrl = toVaultUrl(vault);
    this.#logger.debug('Getting secret value via Key Vault SDK...', {
      vaultUrl,
      secretName,
      secretVersion,
    });

    const client = this.#createClient(vaultUrl);
    const secret = await client.getSecret(
      secretName,
      secretVersion ? { version: secretVersion } : {},
    );

    return secret.value ?? '';
  }
}
