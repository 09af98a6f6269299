/**
 * Requirements addressed:
 * - Secret coordinates and the target file are explicit configuration values
 *   injected at startup, not compile-time literals.
 * - Values come from `{ ...process.env, ...dotenv }` (dotenv files loaded with
 *   get-dotenv), with CLI flags taking precedence.
 * - Coordinates and the file path support $VAR expansion against the same env.
 * - The merged config is validated; every issue is reported at once.
 */

import path from 'node:path';

import { dotenvExpand, getDotenv } from '@karmaniverous/get-dotenv';
import { z } from 'zod';

import { TokenPatchError } from './tokenPatchError';

export const DEFAULT_PLACEHOLDER = '{{Hub_token}}';
export const DEFAULT_TOKEN_LINE_PREFIX = 'token=';
export const DEFAULT_FILE_PATH = 'ansible.cfg';

export const tokenPatchConfigSchema = z.object({
  filePath: z.string().min(1).default(DEFAULT_FILE_PATH),
  vault: z
    .string({ required_error: 'vault is required' })
    .min(1, 'vault is required'),
  secretName: z
    .string({ required_error: 'secretName is required' })
    .min(1, 'secretName is required'),
  secretVersion: z.string().min(1).optional(),
  placeholder: z.string().min(1).default(DEFAULT_PLACEHOLDER),
  tokenLinePrefix: z.string().min(1).default(DEFAULT_TOKEN_LINE_PREFIX),
  provider: z.enum(['azure-keyvault']).default('azure-keyvault'),
  azureMode: z.enum(['cli', 'sdk']).default('cli'),
  commandTimeoutMs: z.coerce.number().int().nonnegative().optional(),
});

/** Validated configuration for one token patch run. */
export type TokenPatchConfig = z.infer<typeof tokenPatchConfigSchema>;

export type TokenPatchConfigKey = keyof TokenPatchConfig;

/** Environment variable backing each configuration field. */
export const TOKEN_PATCH_ENV_KEYS = {
  filePath: 'VAULT_TOKEN_PATCH_FILE',
  vault: 'VAULT_TOKEN_PATCH_VAULT',
  secretName: 'VAULT_TOKEN_PATCH_SECRET_NAME',
  secretVersion: 'VAULT_TOKEN_PATCH_SECRET_VERSION',
  placeholder: 'VAULT_TOKEN_PATCH_PLACEHOLDER',
  tokenLinePrefix: 'VAULT_TOKEN_PATCH_TOKEN_PREFIX',
  provider: 'VAULT_TOKEN_PATCH_PROVIDER',
  azureMode: 'VAULT_TOKEN_PATCH_AZURE_MODE',
  commandTimeoutMs: 'VAULT_TOKEN_PATCH_COMMAND_TIMEOUT_MS',
} as const satisfies Record<TokenPatchConfigKey, string>;

// Placeholders and prefixes are literal text and are never expanded.
const EXPANDED_KEYS = new Set<TokenPatchConfigKey>([
  'filePath',
  'vault',
  'secretName',
  'secretVersion',
]);

export type TokenPatchConfigOverrides = Partial<
  Record<TokenPatchConfigKey, string>
>;

export const buildExpansionEnv = (
  dotenv: Record<string, string | undefined>,
  base: Record<string, string | undefined> = process.env,
): Record<string, string | undefined> => ({
  ...base,
  ...dotenv,
});

/**
 * Load `.env` / `.env.local` from the given directories and layer them over
 * `process.env`.
 */
export const loadTokenPatchEnv = async ({
  paths = ['./'],
}: {
  paths?: string[];
} = {}): Promise<Record<string, string | undefined>> => {
  const dotenv = await getDotenv({
    paths,
    dotenvToken: '.env',
    privateToken: 'local',
    loadProcess: false,
  });
  return buildExpansionEnv(dotenv);
};

const blankToUndefined = (v: string | undefined): string | undefined =>
  v?.trim() ? v : undefined;

/**
 * Merge env values and CLI overrides into a validated config.
 *
 * @throws TokenPatchError (`config-invalid`) listing every schema issue.
 */
export const resolveTokenPatchConfig = ({
  env,
  overrides = {},
  cwd = process.cwd(),
}: {
  env: Record<string, string | undefined>;
  overrides?: TokenPatchConfigOverrides;
  cwd?: string;
}): TokenPatchConfig => {
  const raw: Partial<Record<TokenPatchConfigKey, string>> = {};

  for (const key of tokenPatchConfigSchema.keyof().options) {
    const value = blankToUndefined(
      overrides[key] ?? env[TOKEN_PATCH_ENV_KEYS[key]],
    );
    if (value === undefined) continue;
    const expanded = blankToUndefined(
      EXPANDED_KEYS.has(key) ? (dotenvExpand(value, env) ?? value) : value,
    );
    if (expanded !== undefined) raw[key] = expanded;
  }

  const parsed = tokenPatchConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TokenPatchError('config-invalid', 'Invalid configuration', {
      details: parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    });
  }

  return {
    ...parsed.data,
    filePath: path.resolve(cwd, parsed.data.filePath),
  };
};
