/**
 * Requirements addressed:
 * - Provide the `vault-token-patch` CLI; no arguments are required.
 * - Ctrl-C cancels the run with exit code 1.
 */

import {
  colorize,
  shouldUseColor,
} from '../../tokenPatch/statusReporter';
import { runTokenPatchCli } from '../../tokenPatch/runTokenPatchCli';

process.once('SIGINT', () => {
  console.error(
    colorize('progress', '🛑 Operation cancelled by user', shouldUseColor()),
  );
  process.exit(1);
});

process.exitCode = await runTokenPatchCli({ args: process.argv.slice(2) });
