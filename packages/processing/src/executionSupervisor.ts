/**
 * Execution Supervisor
 *
 * Runs one assembled ffmpeg command with a machine-readable progress stream,
 * relays progress and advisory stderr lines, and reports how the process
 * ended. Cancellation comes in through an AbortSignal.
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import { BinaryNotFoundError, CommandExecutionError } from '@transcode-kit/core';
import {
  createLogger,
  formatCommand,
  isMissingExecutableError,
  pathExists,
} from '@transcode-kit/utils';
import {
  FFmpegProgressParser,
  type Clock,
  type ProgressSnapshot,
  type RunPosition,
} from './progressParser.js';

const log = createLogger({ module: 'supervisor' });

/** stderr lines worth surfacing; they never stop the run */
const ADVISORY_PATTERN = /error|invalid|failed/i;

export interface ExecutionRequest {
  /** Arguments without the binary; the first one is the overwrite flag */
  args: string[];
  outputPath: string;
  fileDuration: number | null;
  run: RunPosition;
  signal: AbortSignal;
  onProgress: (snapshot: ProgressSnapshot) => void;
  onWarning: (line: string) => void;
}

export interface ExecutionResult {
  exitCode: number | null;
  outputExists: boolean;
  /** Exit code 0 and the output file on disk */
  success: boolean;
  cancelled: boolean;
  durationMs: number;
}

export interface CommandSupervisor {
  run(request: ExecutionRequest): Promise<ExecutionResult>;
}

export interface SupervisorOptions {
  /** Arguments placed before the ffmpeg arguments (e.g. a script for an interpreter) */
  leadingArgs?: string[];
  /** Delay before a process that ignored SIGTERM is killed */
  killGraceMs?: number;
  clock?: Clock;
}

/**
 * Insert the progress-reporting flags right after the overwrite flag
 */
export function withProgressFlags(args: readonly string[]): string[] {
  const [overwrite, ...rest] = args;
  const flags = ['-progress', 'pipe:1', '-nostats', '-hide_banner'];
  return overwrite === undefined ? flags : [overwrite, ...flags, ...rest];
}

export class ExecutionSupervisor implements CommandSupervisor {
  private readonly leadingArgs: string[];
  private readonly killGraceMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly ffmpegPath: string,
    options: SupervisorOptions = {}
  ) {
    this.leadingArgs = options.leadingArgs ?? [];
    this.killGraceMs = options.killGraceMs ?? 5000;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Execute one command.
   *
   * Rejects with BinaryNotFoundError when the executable is missing and with
   * CommandExecutionError for any other launch failure. Everything else,
   * including a non-zero exit, is reported through the result.
   */
  async run(request: ExecutionRequest): Promise<ExecutionResult> {
    const argv = [...this.leadingArgs, ...withProgressFlags(request.args)];
    log.debug({ command: formatCommand(this.ffmpegPath, argv) }, 'Launching ffmpeg');

    const startedAt = Date.now();
    const exitCode = await this.spawnAndWatch(argv, request);
    const cancelled = request.signal.aborted;
    const outputExists = await pathExists(request.outputPath);
    const durationMs = Date.now() - startedAt;

    log.debug({ exitCode, outputExists, cancelled, durationMs }, 'ffmpeg finished');

    return {
      exitCode,
      outputExists,
      success: exitCode === 0 && outputExists && !cancelled,
      cancelled,
      durationMs,
    };
  }

  private spawnAndWatch(argv: string[], request: ExecutionRequest): Promise<number | null> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.ffmpegPath, argv, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      const parser = new FFmpegProgressParser(request.fileDuration, request.run, this.clock);
      let killTimer: NodeJS.Timeout | null = null;
      let settled = false;

      const terminate = (): void => {
        if (child.exitCode !== null || child.signalCode !== null || killTimer) {
          return;
        }
        log.info({ pid: child.pid }, 'Stopping ffmpeg');
        child.kill('SIGTERM');
        killTimer = setTimeout(() => child.kill('SIGKILL'), this.killGraceMs);
      };

      const cleanup = (): void => {
        settled = true;
        if (killTimer) clearTimeout(killTimer);
        request.signal.removeEventListener('abort', terminate);
      };

      if (request.signal.aborted) {
        terminate();
      } else {
        request.signal.addEventListener('abort', terminate, { once: true });
      }

      const progress = createInterface({ input: child.stdout, crlfDelay: Infinity });
      progress.on('line', (line) => {
        // Checked on every line as well as through the abort listener
        if (request.signal.aborted) {
          terminate();
          return;
        }
        const snapshot = parser.parseLine(line);
        if (snapshot) {
          request.onProgress(snapshot);
        }
      });

      const diagnostics = createInterface({ input: child.stderr, crlfDelay: Infinity });
      diagnostics.on('line', (rawLine) => {
        const line = rawLine.trim();
        if (line && ADVISORY_PATTERN.test(line)) {
          request.onWarning(line);
        }
      });

      child.on('error', (error) => {
        if (settled) return;
        cleanup();
        if (isMissingExecutableError(error)) {
          reject(new BinaryNotFoundError(this.ffmpegPath));
        } else {
          reject(new CommandExecutionError(this.ffmpegPath, error.message));
        }
      });

      child.on('close', (code) => {
        if (settled) return;
        cleanup();
        resolve(code);
      });
    });
  }
}
