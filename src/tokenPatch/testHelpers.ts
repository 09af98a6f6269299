/**
 * Shared fakes for unit tests: an in-memory secret store and a logger that
 * records every line.
 */

import os from 'node:os';
import path from 'node:path';

import fs from 'fs-extra';
import { vi } from 'vitest';

import type { Logger, SecretStore } from '../secretStore/types';
import { TokenPatchError } from './tokenPatchError';

export const createRecordingLogger = () => {
  const info: string[] = [];
  const errors: string[] = [];
  const debug: string[] = [];
  const logger: Logger = {
    debug: (...data: unknown[]) => {
      debug.push(data.map(String).join(' '));
    },
    info: (...data: unknown[]) => {
      info.push(data.map(String).join(' '));
    },
    warn: (...data: unknown[]) => {
      errors.push(data.map(String).join(' '));
    },
    error: (...data: unknown[]) => {
      errors.push(data.map(String).join(' '));
    },
  };
  return { logger, info, errors, debug };
};

export const createFakeStore = ({
  value = 'abc123',
  error,
  toolInstalled = true,
  authenticated = true,
}: {
  value?: string;
  error?: Error;
  toolInstalled?: boolean;
  authenticated?: boolean;
} = {}) => {
  const getSecretValue = vi.fn(async () => {
    if (error) throw error;
    return value;
  });

  const store: SecretStore = {
    label: 'Fake Vault',
    assertToolInstalled: async () => {
      if (!toolInstalled) {
        throw new TokenPatchError('tool-missing', 'Fake CLI is not installed.');
      }
    },
    assertAuthenticated: async () => {
      if (!authenticated) {
        throw new TokenPatchError('not-authenticated', 'Not logged in.');
      }
    },
    describeReference: ({ vault, secretName, secretVersion }) => [
      `Vault: ${vault}`,
      `Secret: ${secretName}`,
      `Version: ${secretVersion ?? 'latest'}`,
    ],
    getSecretValue,
  };

  return { store, getSecretValue };
};

export const makeTempDir = async (): Promise<string> =>
  await fs.mkdtemp(path.join(os.tmpdir(), 'vault-token-patch-'));
