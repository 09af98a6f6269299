/**
 * Requirements addressed:
 * - Run external CLI tools (`az`) and capture their output.
 * - A non-zero exit is a result, not an exception; a missing binary maps to
 *   exit code 127.
 * - Optional per-command timeout; none by default.
 */

import { spawn } from 'node:child_process';

export type RunResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type RunCommandOptions = {
  cmd: string;
  args: string[];
  /** Kill the process after this many milliseconds (0 or omitted: never). */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
};

/** Injection seam: stores take a runner so tests never spawn real CLIs. */
export type CommandRunner = (options: RunCommandOptions) => Promise<RunResult>;

export const COMMAND_NOT_FOUND = 127;

export const runCommand: CommandRunner = async ({
  cmd,
  args,
  timeoutMs,
  env,
}) =>
  await new Promise<RunResult>((resolve) => {
    let settled = false;
    const settle = (result: RunResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const child = spawn(cmd, args, {
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
      ...(timeoutMs ? { timeout: timeoutMs } : {}),
    });

    let stdout = '';
    let stderr = '';
    child.stdout.on('data', (d) => (stdout += String(d)));
    child.stderr.on('data', (d) => (stderr += String(d)));

    child.on('error', (err: NodeJS.ErrnoException) => {
      settle({
        code: err.code === 'ENOENT' ? COMMAND_NOT_FOUND : 1,
        stdout,
        stderr: stderr || err.message,
      });
    });
    child.on('close', (code) => {
      settle({ code: typeof code === 'number' ? code : 1, stdout, stderr });
    });
  });

export const formatCommand = ({ cmd, args }: RunCommandOptions): string =>
  [cmd, ...args].join(' ');
