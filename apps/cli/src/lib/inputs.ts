/**
 * Input Collection
 *
 * Expands the `convert` arguments into tasks. Folders are scanned one level
 * deep; files with unsupported extensions inside a folder are passed over
 * silently, explicitly named ones are reported.
 */

import { readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { createTaskItem, type TaskItem } from '@transcode-kit/core';
import { expandHome } from '@transcode-kit/utils';

export interface CollectedInputs {
  tasks: TaskItem[];
  /** Named inputs that are missing or not a supported media file */
  skipped: string[];
}

export async function collectTasks(inputs: readonly string[]): Promise<CollectedInputs> {
  const tasks: TaskItem[] = [];
  const skipped: string[] = [];
  const seen = new Set<string>();

  const add = (task: TaskItem): void => {
    if (!seen.has(task.path)) {
      seen.add(task.path);
      tasks.push(task);
    }
  };

  for (const input of inputs) {
    const fullPath = resolve(expandHome(input));
    const info = await stat(fullPath).catch(() => null);

    if (info?.isDirectory()) {
      const entries = await readdir(fullPath, { withFileTypes: true });
      const names = entries
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort((a, b) => a.localeCompare(b));
      for (const name of names) {
        const task = createTaskItem(join(fullPath, name));
        if (task) add(task);
      }
      continue;
    }

    const task = info?.isFile() ? createTaskItem(fullPath) : null;
    if (task) {
      add(task);
    } else {
      skipped.push(input);
    }
  }

  return { tasks, skipped };
}
