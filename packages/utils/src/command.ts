/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing short-lived external commands with:
 * - Timeout handling
 * - Output capture
 * - Abort signal forwarding
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

/**
 * Execute an external command and collect its output
 *
 * Rejects only when the process cannot be spawned (e.g. ENOENT);
 * a non-zero exit code is reported through `exitCode`.
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    let killTimer: NodeJS.Timeout | null = null;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
    }, timeout);

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      cleanup();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}

/**
 * Check whether an error thrown by spawn means the executable is missing
 */
export function isMissingExecutableError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Render an argv as a copy-pasteable shell line (for logs only)
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"']/.test(part) ? `"${part.replace(/"/g, '\\"')}"` : part))
    .join(' ');
}
