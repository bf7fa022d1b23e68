/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { RunSummary, ProgressSnapshot } from '@transcode-kit/processing';
import { formatClock } from '@transcode-kit/utils';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * Spinner suffix: `42.0% (ETA 01:10) | total 12.5% (ETA 09:30)`.
 * Without a known duration the file part shows the output time instead.
 */
export function formatProgress(progress: ProgressSnapshot): string {
  const file =
    progress.filePercent === null ? formatClock(progress.outTime) : `${progress.filePercent.toFixed(1)}%`;
  return (
    `${file} (ETA ${formatClock(progress.fileEta)})` +
    ` | total ${progress.totalPercent.toFixed(1)}% (ETA ${formatClock(progress.totalEta)})`
  );
}

export function formatSummary(summary: RunSummary): string {
  const parts = [`${summary.completed}/${summary.total} completed`];
  if (summary.failed > 0) parts.push(`${summary.failed} failed`);
  if (summary.cancelled > 0) parts.push(`${summary.cancelled} cancelled`);
  return parts.join(', ');
}
