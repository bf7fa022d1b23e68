/**
 * Engine wiring shared by the commands: binary discovery plus the probing
 * and execution objects built on whatever was found.
 */

import { discoverBinaries, type BinariesConfig } from '@transcode-kit/core';
import { EncoderDetector, FFProbe } from '@transcode-kit/media';
import { ExecutionSupervisor, type RunnerDependencies } from '@transcode-kit/processing';

export interface Engine {
  binaries: BinariesConfig;
  ffmpegPath: string | null;
  prober: FFProbe | null;
  encoders: EncoderDetector | null;
}

export function createEngine(env: NodeJS.ProcessEnv = process.env): Engine {
  const binaries = discoverBinaries({ env });
  const ffmpegPath = binaries.ffmpeg.resolvedPath;
  const ffprobePath = binaries.ffprobe.resolvedPath;

  return {
    binaries,
    ffmpegPath,
    prober: ffprobePath ? new FFProbe(ffprobePath) : null,
    encoders: ffmpegPath ? new EncoderDetector(ffmpegPath) : null,
  };
}

/**
 * Runner dependencies for a discovered engine. A missing ffmpeg is left for
 * the runner's precondition check to report.
 */
export function runnerDependencies(
  engine: Engine,
  fileExists: (filePath: string) => boolean
): RunnerDependencies {
  return {
    ffmpegPath: engine.ffmpegPath,
    prober: engine.prober,
    supervisor: new ExecutionSupervisor(engine.ffmpegPath ?? 'ffmpeg'),
    encoders: engine.encoders ?? { detectEncoders: async () => new Set<string>() },
    fileExists,
  };
}
