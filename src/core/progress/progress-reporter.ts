/**
 * ProgressReporter
 * Rate-limited status line for the batch pipeline. Purely observational.
 */

import chalk from 'chalk';
import * as logger from '../../utils/logger';
import { formatDuration } from '../../utils/format-utils';

const BAR_WIDTH = 40;

export interface ProgressReporterOptions {
  verbosity?: number;
  /** Minimum time between two status lines. */
  intervalMs?: number;
  now?: () => number;
  write?: (text: string) => void;
}

/**
 * Render the status line (pure computation, no I/O). The ETA is a linear
 * extrapolation of the completion rate so far.
 */
export function renderProgressLine(
  processed: number,
  total: number,
  elapsedSeconds: number,
): string {
  const percentage = total > 0 ? Math.floor((processed / total) * 100) : 0;
  const completeWidth = Math.floor((percentage / 100) * BAR_WIDTH);
  const bar =
    '█'.repeat(completeWidth) + '░'.repeat(BAR_WIDTH - completeWidth);

  const eta =
    processed > 0 && elapsedSeconds > 0
      ? formatDuration((total - processed) / (processed / elapsedSeconds))
      : '--';

  return `[${bar}] ${percentage}% | ${processed}/${total} | Elapsed: ${formatDuration(elapsedSeconds)} | ETA: ${eta}`;
}

export function createProgressReporter(options: ProgressReporterOptions = {}) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const intervalMs = options.intervalMs ?? 1000;
  const now = options.now ?? Date.now;
  const write =
    options.write ?? ((text: string) => void process.stdout.write(text));

  let totalCount = 0;
  let processedCount = 0;
  let startedAt = 0;
  let lastRenderAt: number | null = null;
  let finished = false;

  const render = (timestamp: number): void => {
    lastRenderAt = timestamp;
    if (verbosity === logger.Verbosity.Quiet) {
      return;
    }
    const elapsedSeconds = (timestamp - startedAt) / 1000;
    write(
      '\r' +
        chalk.cyan(renderProgressLine(processedCount, totalCount, elapsedSeconds)) +
        '\x1B[K',
    );
  };

  const initialize = (total: number): void => {
    totalCount = total;
    processedCount = 0;
    startedAt = now();
    lastRenderAt = null;
    finished = false;
  };

  const update = (count: number): void => {
    processedCount = Math.min(totalCount, processedCount + count);
    const timestamp = now();
    if (lastRenderAt === null || timestamp - lastRenderAt >= intervalMs) {
      render(timestamp);
    }
  };

  /**
   * Draw the final line regardless of the rate limit. Safe to call twice.
   */
  const finish = (): void => {
    if (finished) {
      return;
    }
    finished = true;
    render(now());
    if (verbosity !== logger.Verbosity.Quiet) {
      write('\n');
    }
  };

  const getProgressPercentage = (): number =>
    totalCount > 0 ? Math.floor((processedCount / totalCount) * 100) : 0;

  const isComplete = (): boolean =>
    totalCount > 0 && processedCount === totalCount;

  return { initialize, update, finish, getProgressPercentage, isComplete };
}

export type ProgressReporter = ReturnType<typeof createProgressReporter>;
