/**
 * This is the main entry point for the library.
 *
 * @packageDocumentation
 */

/**
 * Requirements addressed:
 * - Export the token patch pipeline and its steps for programmatic use.
 * - Export the Azure Key Vault secret store and its command runner.
 */

export {
  type AzureKeyVaultMode,
  AzureKeyVaultSecretStore,
  type AzureKeyVaultSecretStoreOptions,
  toVaultUrl,
} from './secretStore/AzureKeyVaultSecretStore';
export {
  type CommandRunner,
  runCommand,
  type RunResult,
} from './secretStore/commandRunner';
export {
  createSecretStore,
  type CreateSecretStoreOptions,
} from './secretStore/createSecretStore';
export type {
  Logger,
  SecretReference,
  SecretStore,
  SecretStoreProvider,
} from './secretStore/types';
export {
  defaultPatchFileSystem,
  type PatchFileSystem,
} from './tokenPatch/patchFileSystem';
export { patchConfigFile, type PatchResult } from './tokenPatch/patchConfigFile';
export {
  runTokenPatch,
  type RunTokenPatchOptions,
  type TokenPatchResult,
} from './tokenPatch/runTokenPatch';
export { runTokenPatchCli } from './tokenPatch/runTokenPatchCli';
export {
  createStatusReporter,
  type StatusReporter,
} from './tokenPatch/statusReporter';
export {
  loadTokenPatchEnv,
  resolveTokenPatchConfig,
  type TokenPatchConfig,
  tokenPatchConfigSchema,
} from './tokenPatch/tokenPatchConfig';
export {
  TokenPatchError,
  type TokenPatchErrorKind,
  type TokenPatchState,
} from './tokenPatch/tokenPatchError';
export { verifyConfigFile } from './tokenPatch/verifyConfigFile';
