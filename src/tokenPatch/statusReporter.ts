/**
 * Requirements addressed:
 * - One coloured status line per step: progress (yellow), success (green),
 *   failure (red).
 * - Colour can be disabled (`--no-color`, `NO_COLOR`).
 * - Failures go to the logger's error channel; everything else to info.
 */

import type { Logger } from '../secretStore/types';

export type StatusTone = 'progress' | 'success' | 'failure';

export interface StatusReporter {
  progress(message: string): void;
  success(message: string): void;
  failure(message: string): void;
  /** Separator line between pipeline steps. */
  blank(): void;
}

const ANSI: Record<StatusTone, string> = {
  progress: '\u001b[1;33m',
  success: '\u001b[0;32m',
  failure: '\u001b[0;31m',
};
const ANSI_RESET = '\u001b[0m';

export const colorize = (
  tone: StatusTone,
  message: string,
  color: boolean,
): string => (color ? `${ANSI[tone]}${message}${ANSI_RESET}` : message);

export const shouldUseColor = (
  env: Record<string, string | undefined> = process.env,
): boolean => env.NO_COLOR === undefined || env.NO_COLOR === '';

export const createStatusReporter = ({
  logger = console,
  color = shouldUseColor(),
}: {
  logger?: Pick<Logger, 'error' | 'info'>;
  color?: boolean;
} = {}): StatusReporter => ({
  progress(message) {
    logger.info(colorize('progress', message, color));
  },
  success(message) {
    logger.info(colorize('success', message, color));
  },
  failure(message) {
    logger.error(colorize('failure', message, color));
  },
  blank() {
    logger.info('');
  },
});
