/**
 * Requirements addressed:
 * - Back up the target to `<path>.backup.<YYYYMMDD_HHMMSS>` before any
 *   mutation, unconditionally. Backups are never pruned.
 * - Replace every literal occurrence of the placeholder with the secret value;
 *   nothing in the value is interpreted as a pattern.
 * - If the replace step fails, restore the target from the backup and fail.
 */

import path from 'node:path';

import type { PatchFileSystem } from './patchFileSystem';
import type { StatusReporter } from './statusReporter';
import { errorMessage, TokenPatchError } from './tokenPatchError';

export type PatchResult = {
  backupPath: string;
  /** Number of placeholder occurrences replaced. */
  replacements: number;
};

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** Local-time `YYYYMMDD_HHMMSS`. */
export const formatBackupTimestamp = (date: Date): string =>
  `${String(date.getFullYear())}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
  `_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;

/**
 * Pick a backup path for `filePath` at `now`. Two runs within the same second
 * get `_1`, `_2`, ... suffixes so an earlier backup is never overwritten.
 */
export const resolveBackupPath = async (
  filePath: string,
  now: Date,
  fs: Pick<PatchFileSystem, 'pathExists'>,
): Promise<string> => {
  const base = `${filePath}.backup.${formatBackupTimestamp(now)}`;
  let candidate = base;
  for (let i = 1; await fs.pathExists(candidate); i++) {
    candidate = `${base}_${String(i)}`;
  }
  return candidate;
};

export const countOccurrences = (content: string, needle: string): number =>
  needle ? content.split(needle).length - 1 : 0;

export const replacePlaceholder = (
  content: string,
  placeholder: string,
  value: string,
): string => content.replaceAll(placeholder, () => value);

export const patchConfigFile = async ({
  filePath,
  placeholder,
  secretValue,
  fs,
  reporter,
  now = new Date(),
}: {
  filePath: string;
  placeholder: string;
  secretValue: string;
  fs: PatchFileSystem;
  reporter: StatusReporter;
  now?: Date;
}): Promise<PatchResult> => {
  const fileName = path.basename(filePath);
  reporter.progress(`📝 Updating ${fileName} with secret token...`);

  const backupPath = await resolveBackupPath(filePath, now, fs);
  try {
    await fs.copyFile(filePath, backupPath);
  } catch (err) {
    throw new TokenPatchError('patch-failed', 'Failed to create backup', {
      details: [`Backup: ${backupPath}`, `Reason: ${errorMessage(err)}`],
      cause: err,
    });
  }
  reporter.success(`📋 Backup created: ${backupPath}`);

  let replacements: number;
  try {
    const content = await fs.readFile(filePath);
    replacements = countOccurrences(content, placeholder);
    if (replacements > 0) {
      await fs.writeFile(
        filePath,
        replacePlaceholder(content, placeholder, secretValue),
      );
    }
  } catch (err) {
    const details = [`Reason: ${errorMessage(err)}`];
    try {
      await fs.copyFile(backupPath, filePath);
      reporter.progress('🔄 Restored original configuration from backup');
      details.push(`Restored from: ${backupPath}`);
    } catch (restoreErr) {
      details.push(`Failed to restore backup: ${errorMessage(restoreErr)}`);
      details.push(`Backup kept at: ${backupPath}`);
    }
    throw new TokenPatchError('patch-failed', `Failed to update ${fileName}`, {
      details,
      cause: err,
    });
  }

  reporter.success(
    `✅ Successfully updated ${fileName} (${String(replacements)} placeholder${replacements === 1 ? '' : 's'} replaced)`,
  );
  return { backupPath, replacements };
};
