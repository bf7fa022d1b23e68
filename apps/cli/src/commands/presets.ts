/**
 * Presets Command
 *
 * List presets, show one, or delete a saved one.
 */

import chalk from 'chalk';
import {
  BUILTIN_PRESETS,
  DEFAULT_SETTINGS,
  PresetStore,
  type ConversionSettings,
} from '@transcode-kit/core';
import { config } from '../config/index.js';
import {
  printError,
  printHeader,
  printInfo,
  printJson,
  printKeyValue,
  printSuccess,
} from '../lib/output.js';

interface PresetsOptions {
  delete?: string;
  json?: boolean;
}

/**
 * Fields whose value differs from the defaults
 */
export function changedFields(settings: ConversionSettings): [string, unknown][] {
  return Object.entries(settings).filter(([key, value]) => {
    const defaults: Record<string, unknown> = DEFAULT_SETTINGS;
    return defaults[key] !== value;
  });
}

export async function presetsCommand(name: string | undefined, options: PresetsOptions): Promise<void> {
  const store = new PresetStore(config.presetFile);

  if (options.delete) {
    if (options.delete in BUILTIN_PRESETS) {
      printError(`"${options.delete}" is a built-in preset and cannot be deleted`);
      process.exitCode = 1;
    } else if (await store.remove(options.delete)) {
      printSuccess(`Deleted preset "${options.delete}"`);
    } else {
      printError(`No saved preset named "${options.delete}"`);
      process.exitCode = 1;
    }
    return;
  }

  if (name) {
    const preset = await store.get(name);
    if (!preset) {
      printError(`Unknown preset: ${name}`);
      process.exitCode = 1;
      return;
    }
    if (options.json) {
      printJson(preset);
      return;
    }
    printHeader(name);
    const fields = changedFields(preset);
    if (fields.length === 0) {
      printInfo('Same as the defaults');
    }
    for (const [key, value] of fields) {
      printKeyValue(key, value);
    }
    return;
  }

  const presets = await store.load();
  if (options.json) {
    printJson(presets);
    return;
  }
  printHeader('Presets');
  for (const presetName of Object.keys(presets)) {
    const tag = presetName in BUILTIN_PRESETS ? chalk.gray(' (built-in)') : '';
    console.log(`  ${chalk.cyan(presetName)}${tag}`);
  }
  console.log();
  printInfo(`Preset file: ${store.path}`);
}
