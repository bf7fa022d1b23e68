/**
 * FFProbe Wrapper
 * 
 * Runs ffprobe with JSON output and reduces the result to the facts the
 * engine needs. Failures are logged and reported as `null`, never thrown.
 */

import { z } from 'zod';
import type { MediaInfo } from '@transcode-kit/core';
import { createLogger, executeCommand, getFileSizeBytes } from '@transcode-kit/utils';

const log = createLogger({ module: 'ffprobe' });

// ffprobe prints numbers inside "format" as strings
const numericString = z
  .union([z.string(), z.number()])
  .transform((value) => Number(value))
  .refine((value) => Number.isFinite(value));

const ffprobeOutputSchema = z.object({
  format: z
    .object({
      duration: numericString.optional().catch(undefined),
      size: numericString.optional().catch(undefined),
      format_name: z.string().optional().catch(undefined),
    })
    .default({}),
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
        width: z.number().int().optional(),
        height: z.number().int().optional(),
      })
    )
    .default([]),
});

export type FFProbeOutput = z.infer<typeof ffprobeOutputSchema>;

/**
 * Reduce ffprobe JSON to MediaInfo. The first video stream and the first
 * audio stream win; later streams of the same kind are ignored.
 *
 * Returns null when the text is not ffprobe JSON.
 */
export function parseProbeOutput(stdout: string): MediaInfo | null {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    return null;
  }

  const parsed = ffprobeOutputSchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }
  const { format, streams } = parsed.data;

  const video = streams.find((s) => s.codec_type === 'video');
  const audio = streams.find((s) => s.codec_type === 'audio');

  return {
    duration: format.duration ?? null,
    videoCodec: video?.codec_name ?? null,
    audioCodec: audio?.codec_name ?? null,
    width: video?.width ?? null,
    height: video?.height ?? null,
    formatName: format.format_name ?? null,
    sizeBytes: format.size !== undefined ? Math.trunc(format.size) : null,
  };
}

export class FFProbe {
  private ffprobePath: string;

  constructor(ffprobePath: string = 'ffprobe') {
    this.ffprobePath = ffprobePath;
  }

  /**
   * Probe a media file. Size falls back to a filesystem stat when the probe omits it.
   */
  async probeMedia(filePath: string): Promise<MediaInfo | null> {
    const args = [
      '-v', 'error',
      '-show_entries', 'format=duration,size,format_name:stream=codec_type,codec_name,width,height',
      '-of', 'json',
      filePath,
    ];

    let stdout: string;
    try {
      const result = await executeCommand(this.ffprobePath, args, {
        timeout: 60000, // 1 minute timeout
      });
      if (result.exitCode !== 0) {
        log.warn({ filePath, exitCode: result.exitCode, stderr: result.stderr.trim() }, 'ffprobe failed');
        return null;
      }
      stdout = result.stdout;
    } catch (error) {
      log.warn({ filePath, error }, 'ffprobe could not be started');
      return null;
    }

    const info = parseProbeOutput(stdout);
    if (!info) {
      log.warn({ filePath, output: stdout.substring(0, 200) }, 'Failed to parse ffprobe output');
      return null;
    }

    if (info.sizeBytes === null) {
      return { ...info, sizeBytes: await getFileSizeBytes(filePath) };
    }
    return info;
  }
}
