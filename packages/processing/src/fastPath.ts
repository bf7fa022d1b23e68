/**
 * Fast-Path Eligibility
 *
 * Decides whether an output can be produced by stream copy (`-c copy`)
 * instead of a re-encode. A refusal always carries the reason.
 */

import type { MediaInfo } from '@transcode-kit/core';
import { getExtension } from '@transcode-kit/utils';
import { containerSupportsCodec } from './codecResolver.js';

export type FastCopyDecision = { allowed: true } | { allowed: false; reason: string };

export interface SingleCopyCheck {
  inputPath: string;
  outExt: string;
  info: MediaInfo | null | undefined;
  /** A video filter spec other than `none` was built */
  videoFiltersUsed: boolean;
  /** An audio speed filter was built */
  audioFilterUsed: boolean;
}

export interface MergeCopyCheck {
  inputs: readonly string[];
  outExt: string;
  infos: ReadonlyMap<string, MediaInfo>;
  videoFiltersUsed: boolean;
  audioFilterUsed: boolean;
  trimUsed: boolean;
}

const ALLOWED: FastCopyDecision = { allowed: true };

function refuse(reason: string): FastCopyDecision {
  return { allowed: false, reason };
}

function normalizeExt(ext: string): string {
  return ext.replace(/^\./, '').toLowerCase();
}

/** MOV, MP4 and M4V are one container format under different extensions */
const ISO_MEDIA_EXTENSIONS: ReadonlySet<string> = new Set(['mp4', 'm4v', 'mov']);

/**
 * Whether two extensions name the same container format
 */
export function sameContainer(a: string, b: string): boolean {
  const left = normalizeExt(a);
  const right = normalizeExt(b);
  return left === right || (ISO_MEDIA_EXTENSIONS.has(left) && ISO_MEDIA_EXTENSIONS.has(right));
}

export function fastCopyAllowed(check: SingleCopyCheck): FastCopyDecision {
  const outExt = normalizeExt(check.outExt);

  if (outExt === 'gif') {
    return refuse('GIF output requires re-encoding');
  }
  if (check.videoFiltersUsed || check.audioFilterUsed) {
    return refuse('filters or speed change are active');
  }
  if (!sameContainer(getExtension(check.inputPath), outExt)) {
    return refuse('container differs from the input');
  }
  const videoCodec = check.info?.videoCodec;
  if (videoCodec && !containerSupportsCodec(outExt, videoCodec)) {
    return refuse(`codec ${videoCodec} is not compatible with ${outExt}`);
  }
  return ALLOWED;
}

/**
 * Concatenation by stream copy needs identical streams in every input
 */
export function mergeCopyAllowed(check: MergeCopyCheck): FastCopyDecision {
  const outExt = normalizeExt(check.outExt);
  const [first] = check.inputs;

  if (outExt === 'gif') {
    return refuse('GIF output requires re-encoding');
  }
  if (check.videoFiltersUsed || check.audioFilterUsed || check.trimUsed) {
    return refuse('filters or trim are active');
  }
  if (first === undefined || !sameContainer(getExtension(first), outExt)) {
    return refuse('container differs from the input');
  }

  const videoCodecs = new Set<string>();
  const audioCodecs = new Set<string>();
  for (const input of check.inputs) {
    const info = check.infos.get(input);
    if (!info?.videoCodec) {
      return refuse(`no probe data for ${input}`);
    }
    videoCodecs.add(info.videoCodec);
    if (info.audioCodec) {
      audioCodecs.add(info.audioCodec);
    }
  }

  if (videoCodecs.size > 1 || audioCodecs.size > 1) {
    return refuse('different codecs across inputs');
  }
  const [videoCodec] = videoCodecs;
  if (videoCodec !== undefined && !containerSupportsCodec(outExt, videoCodec)) {
    return refuse(`codec ${videoCodec} is not compatible with ${outExt}`);
  }
  return ALLOWED;
}
