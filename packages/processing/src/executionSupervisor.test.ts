/**
 * Execution Supervisor Tests
 *
 * A small Node script stands in for ffmpeg.
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { BinaryNotFoundError } from '@transcode-kit/core';
import {
  ExecutionSupervisor,
  withProgressFlags,
  type ExecutionRequest,
} from './executionSupervisor.js';
import type { ProgressSnapshot } from './progressParser.js';

const FAKE_FFMPEG = fileURLToPath(new URL('../test/fixtures/fake-ffmpeg.mjs', import.meta.url));

describe('Execution Supervisor', () => {
  let dir: string;
  let supervisor: ExecutionSupervisor;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'transcode-kit-supervisor-'));
    supervisor = new ExecutionSupervisor(process.execPath, {
      leadingArgs: [FAKE_FFMPEG],
      killGraceMs: 1000,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function request(mode: string, overrides: Partial<ExecutionRequest> = {}): ExecutionRequest {
    const outputPath = join(dir, 'out.mp4');
    return {
      args: ['-y', '-i', '/in/a.mp4', '-fake-mode', mode, outputPath],
      outputPath,
      fileDuration: 2,
      run: { totalFiles: 1, totalDuration: 2, doneFiles: 0, doneDuration: 0, runStartedAt: Date.now() },
      signal: new AbortController().signal,
      onProgress: () => undefined,
      onWarning: () => undefined,
      ...overrides,
    };
  }

  describe('withProgressFlags', () => {
    it('should insert the flags after the overwrite flag', () => {
      expect(withProgressFlags(['-n', '-i', 'a.mp4', 'b.mp4'])).toEqual([
        '-n', '-progress', 'pipe:1', '-nostats', '-hide_banner', '-i', 'a.mp4', 'b.mp4',
      ]);
    });
  });

  it('should relay progress and advisory lines and report success', async () => {
    const snapshots: ProgressSnapshot[] = [];
    const warnings: string[] = [];
    const req = request('ok', {
      onProgress: (snapshot) => snapshots.push(snapshot),
      onWarning: (line) => warnings.push(line),
    });

    const result = await supervisor.run(req);

    expect(result.exitCode).toBe(0);
    expect(result.outputExists).toBe(true);
    expect(result.success).toBe(true);
    expect(result.cancelled).toBe(false);
    expect(snapshots.map((s) => s.filePercent)).toEqual([50, 100]);
    expect(warnings).toEqual(['[h264 @ 0x1] Invalid NAL unit size']);

    const seenArgs: unknown = JSON.parse(await readFile(req.outputPath, 'utf8'));
    expect(seenArgs).toEqual(withProgressFlags(req.args));
  });

  it('should report a failed exit without an output', async () => {
    const warnings: string[] = [];
    const result = await supervisor.run(request('fail', { onWarning: (line) => warnings.push(line) }));

    expect(result.exitCode).toBe(1);
    expect(result.outputExists).toBe(false);
    expect(result.success).toBe(false);
    expect(warnings).toEqual(['Conversion failed!']);
  });

  it('should terminate the process when the signal aborts', async () => {
    const controller = new AbortController();
    const result = await supervisor.run(
      request('hang', {
        signal: controller.signal,
        onProgress: () => controller.abort(),
      })
    );

    expect(result.cancelled).toBe(true);
    expect(result.success).toBe(false);
    expect(result.outputExists).toBe(false);
  });

  it('should reject with BinaryNotFoundError for a missing executable', async () => {
    const missing = new ExecutionSupervisor(join(dir, 'no-such-ffmpeg'));
    await expect(missing.run(request('ok'))).rejects.toBeInstanceOf(BinaryNotFoundError);
  });
});
