/**
 * Convert Command
 *
 * Runs the queue and renders its events: log lines are persisted through the
 * spinner, status and progress update the spinner text. Ctrl+C asks the
 * runner to stop after terminating the current ffmpeg process.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { DEFAULT_SETTINGS, PreconditionError, PresetStore } from '@transcode-kit/core';
import { ConversionRunner, type ConversionEvent, type RunLogLevel } from '@transcode-kit/processing';
import { expandHome } from '@transcode-kit/utils';
import { config } from '../config/index.js';
import { createEngine, runnerDependencies } from '../lib/engine.js';
import { collectTasks } from '../lib/inputs.js';
import {
  formatProgress,
  formatSummary,
  printError,
  printInfo,
  printSuccess,
  printWarning,
} from '../lib/output.js';
import { optionsToSettings, type ConvertOptions } from '../lib/settingsInput.js';

function persist(spinner: Ora, level: RunLogLevel, message: string): void {
  const wasSpinning = spinner.isSpinning;
  const text = spinner.text;
  switch (level) {
    case 'ok':
      spinner.succeed(message);
      break;
    case 'warn':
      spinner.warn(chalk.yellow(message));
      break;
    case 'error':
      spinner.fail(chalk.red(message));
      break;
    case 'info':
      spinner.info(message);
      break;
  }
  if (wasSpinning) {
    spinner.start(text);
  }
}

/**
 * Consume a run's events until the channel closes
 */
export async function renderEvents(events: AsyncIterable<ConversionEvent>, spinner: Ora): Promise<void> {
  let status = '';
  for await (const event of events) {
    switch (event.type) {
      case 'log':
        persist(spinner, event.level, event.message);
        break;
      case 'status':
        status = event.message;
        spinner.start(status);
        break;
      case 'progress':
        spinner.text = `${status} ${chalk.cyan(formatProgress(event))}`;
        break;
      case 'run-failed':
        spinner.fail(chalk.red(event.message));
        break;
      case 'run-completed':
        spinner.stop();
        break;
      case 'probe':
      case 'file-done':
        break;
    }
  }
}

export async function convertCommand(inputs: string[], options: ConvertOptions): Promise<void> {
  const store = new PresetStore(config.presetFile);

  let base = DEFAULT_SETTINGS;
  if (options.preset) {
    const preset = await store.get(options.preset);
    if (!preset) {
      printError(`Unknown preset: ${options.preset}`);
      process.exitCode = 1;
      return;
    }
    base = preset;
  }

  const settings = optionsToSettings(options, base, printWarning, existsSync);
  if (options.savePreset) {
    await store.put(options.savePreset, settings);
    printSuccess(`Saved preset "${options.savePreset}"`);
  }

  const { tasks, skipped } = await collectTasks(inputs);
  for (const input of skipped) {
    printWarning(`Skipping ${input}: not found or not a supported media file`);
  }

  const runner = new ConversionRunner(runnerDependencies(createEngine(), existsSync));
  const outDir = resolve(expandHome(options.output ?? config.defaultOutputDir));
  const spinner = ora({ text: 'Preparing', discardStdin: false });

  const onInterrupt = (): void => {
    spinner.text = 'Stopping...';
    runner.stop();
  };
  process.on('SIGINT', onInterrupt);

  try {
    const [summary] = await Promise.all([
      runner.start(tasks, settings, outDir),
      renderEvents(runner.events, spinner),
    ]);

    const line = formatSummary(summary);
    if (summary.fatalError || summary.failed > 0) {
      printError(line);
      process.exitCode = 1;
    } else if (summary.stoppedByUser) {
      printWarning(`Stopped: ${line}`);
      process.exitCode = 130;
    } else {
      printSuccess(line);
    }
    printInfo(`Output folder: ${outDir}`);
  } catch (error) {
    spinner.stop();
    if (error instanceof PreconditionError) {
      printError(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
