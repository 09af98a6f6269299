import { describe, expect, it, vi } from 'vitest';

import {
  AzureKeyVaultSecretStore,
  toVaultUrl,
} from './AzureKeyVaultSecretStore';
import type { RunCommandOptions, RunResult } from './commandRunner';
import { assertLogger, silentLogger } from './types';

const ok = (stdout = ''): RunResult => ({ code: 0, stdout, stderr: '' });

const ref = {
  vault: 'kv-test',
  secretName: 'hub-token',
  secretVersion: 'v1',
};

describe('AzureKeyVaultSecretStore', () => {
  it('reads the secret via az and trims the tsv output', async () => {
    const runner = vi.fn(async (_opts: RunCommandOptions) => ok('abc123\n'));
    const store = new AzureKeyVaultSecretStore({ runner, logger: silentLogger });

    await expect(store.getSecretValue(ref)).resolves.toBe('abc123');
    expect(runner).toHaveBeenCalledWith({
      cmd: 'az',
      args: [
        'keyvault',
        'secret',
        'show',
        '--vault-name',
        'kv-test',
        '--name',
        'hub-token',
        '--version',
        'v1',
        '--query',
        'value',
        '--output',
        'tsv',
      ],
      timeoutMs: undefined,
    });
  });

  it('omits --version to read the latest version', async () => {
    const runner = vi.fn(async (_opts: RunCommandOptions) => ok('abc123'));
    const store = new AzureKeyVaultSecretStore({ runner, logger: silentLogger });

    await store.getSecretValue({ vault: 'kv-test', secretName: 'hub-token' });
    expect(runner.mock.calls[0]?.[0].args).not.toContain('--version');
  });

  it('passes the command timeout through', async () => {
    const runner = vi.fn(async (_opts: RunCommandOptions) => ok());
    const store = new AzureKeyVaultSecretStore({
      runner,
      logger: silentLogger,
      commandTimeoutMs: 5000,
    });

    await store.assertToolInstalled();
    expect(runner).toHaveBeenCalledWith({
      cmd: 'az',
      args: ['--version'],
      timeoutMs: 5000,
    });
  });

  it('rejects with the az error output on failure', async () => {
    const runner = vi.fn(
      async (_opts: RunCommandOptions): Promise<RunResult> => ({
        code: 1,
        stdout: '',
        stderr: 'ERROR: SecretNotFound\n',
      }),
    );
    const store = new AzureKeyVaultSecretStore({ runner, logger: silentLogger });

    await expect(store.getSecretValue(ref)).rejects.toThrow(
      'az exited with code 1: ERROR: SecretNotFound',
    );
  });

  it('reports a missing Azure CLI', async () => {
    const runner = vi.fn(
      async (_opts: RunCommandOptions): Promise<RunResult> => ({
        code: 127,
        stdout: '',
        stderr: 'spawn az ENOENT',
      }),
    );
    const store = new AzureKeyVaultSecretStore({ runner, logger: silentLogger });

    await expect(store.assertToolInstalled()).rejects.toMatchObject({
      kind: 'tool-missing',
      message: 'Azure CLI is not installed. Please install it first.',
      details: [],
    });
  });

  it('reports a missing login', async () => {
    const runner = vi.fn(
      async (opts: RunCommandOptions): Promise<RunResult> =>
        opts.args[0] === 'account'
          ? { code: 1, stdout: '', stderr: "Please run 'az login'" }
          : ok(),
    );
    const store = new AzureKeyVaultSecretStore({ runner, logger: silentLogger });

    await expect(store.assertAuthenticated()).rejects.toMatchObject({
      kind: 'not-authenticated',
      message: "Not logged in to Azure. Please run 'az login' first.",
    });
  });

  it('reads the secret via the SDK in sdk mode', async () => {
    const getSecret = vi.fn(
      async (_name: string, _options?: { version?: string }) => ({
        value: 'abc123',
      }),
    );
    const createClient = vi.fn((_vaultUrl: string) => ({ getSecret }));
    const runner = vi.fn(async (_opts: RunCommandOptions) => ok());
    const store = new AzureKeyVaultSecretStore({
      mode: 'sdk',
      runner,
      createClient,
      logger: silentLogger,
    });

    await expect(store.getSecretValue(ref)).resolves.toBe('abc123');
    expect(createClient).toHaveBeenCalledWith(
      'https://kv-test.vault.azure.net/',
    );
    expect(getSecret).toHaveBeenCalledWith('hub-token', { version: 'v1' });
    expect(runner).not.toHaveBeenCalled();
  });

  it('returns an empty string when the SDK secret has no value', async () => {
    const store = new AzureKeyVaultSecretStore({
      mode: 'sdk',
      createClient: () => ({ getSecret: async () => ({}) }),
      logger: silentLogger,
    });

    await expect(store.getSecretValue(ref)).resolves.toBe('');
  });

  it('returns the SDK value without trimming it', async () => {
    const store = new AzureKeyVaultSecretStore({
      mode: 'sdk',
      createClient: () => ({
        getSecret: async () => ({ value: '  p@ss word  ' }),
      }),
      logger: silentLogger,
    });

    await expect(store.getSecretValue(ref)).resolves.toBe('  p@ss word  ');
  });

  it('skips the az login check in sdk mode', async () => {
    const runner = vi.fn(
      async (_opts: RunCommandOptions): Promise<RunResult> => ({
        code: 1,
        stdout: '',
        stderr: "Please run 'az login'",
      }),
    );
    const store = new AzureKeyVaultSecretStore({
      mode: 'sdk',
      runner,
      logger: silentLogger,
    });

    await expect(store.assertAuthenticated()).resolves.toBeUndefined();
    expect(runner).not.toHaveBeenCalled();
  });

  it('describes the reference for diagnostics', () => {
    const store = new AzureKeyVaultSecretStore({ logger: silentLogger });
    expect(
      store.describeReference({ vault: 'kv-test', secretName: 'hub-token' }),
    ).toEqual([
      'Vault: https://kv-test.vault.azure.net/',
      'Secret: hub-token',
      'Version: latest',
    ]);
    expect(toVaultUrl('kv-a')).toBe('https://kv-a.vault.azure.net/');
  });

  it('rejects incomplete loggers', () => {
    const noop = () => undefined;
    expect(() =>
      assertLogger({ debug: noop, info: noop, error: noop }),
    ).toThrow(
      'logger must implement debug, info, warn, and error methods; wrap/proxy your logger if needed',
    );
  });
});
