import path from 'node:path';

import type { PatchFileSystem } from './patchFileSystem';
import type { StatusReporter } from './statusReporter';
import { errorMessage, TokenPatchError } from './tokenPatchError';

/** Count lines that start with `prefix` (`^token=` semantics). */
export const countTokenLines = (content: string, prefix: string): number =>
  content.split(/\r?\n/).filter((line) => line.startsWith(prefix)).length;

/**
 * Read-only check of the patched file: the placeholder must be gone and at
 * least one token line must be present.
 *
 * @returns The number of token lines found.
 */
export const verifyConfigFile = async ({
  filePath,
  placeholder,
  tokenLinePrefix,
  fs,
  reporter,
}: {
  filePath: string;
  placeholder: string;
  tokenLinePrefix: string;
  fs: Pick<PatchFileSystem, 'readFile'>;
  reporter: StatusReporter;
}): Promise<number> => {
  const fileName = path.basename(filePath);
  reporter.progress('🔍 Verifying configuration update...');

  let content: string;
  try {
    content = await fs.readFile(filePath);
  } catch (err) {
    throw new TokenPatchError(
      'verification-failed',
      'Failed to read configuration file for verification',
      { details: [`Reason: ${errorMessage(err)}`], cause: err },
    );
  }

  if (content.includes(placeholder)) {
    throw new TokenPatchError(
      'verification-failed',
      'Token placeholder still found in configuration file',
    );
  }

  const tokenLineCount = countTokenLines(content, tokenLinePrefix);
  if (tokenLineCount === 0) {
    throw new TokenPatchError(
      'verification-failed',
      `No token configurations found in ${fileName}`,
    );
  }

  reporter.success('✅ Configuration verification successful');
  reporter.success(
    `📊 Found ${String(tokenLineCount)} token configurations in ${fileName}`,
  );
  return tokenLineCount;
};
