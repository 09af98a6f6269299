import {
  type AzureKeyVaultMode,
  AzureKeyVaultSecretStore,
} from './AzureKeyVaultSecretStore';
import type { CommandRunner } from './commandRunner';
import type { Logger, SecretStore, SecretStoreProvider } from './types';

export type CreateSecretStoreOptions = {
  provider: SecretStoreProvider;
  /** Azure Key Vault fetch mode. */
  azureMode?: AzureKeyVaultMode;
  commandTimeoutMs?: number;
  logger?: Logger;
  /** Injection seam for tests: replaces child-process execution. */
  runner?: CommandRunner;
};

export const createSecretStore = ({
  provider,
  azureMode,
  commandTimeoutMs,
  logger,
  runner,
}: CreateSecretStoreOptions): SecretStore => {
  switch (provider) {
    case 'azure-keyvault':
      return new AzureKeyVaultSecretStore({
        mode: azureMode,
        commandTimeoutMs,
        logger,
        runner,
      });
  }
};
