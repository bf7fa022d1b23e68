/**
 * @transcode-kit/media
 * 
 * Capability probing layer.
 * 
 * Responsibilities:
 * - List the encoders the installed ffmpeg provides
 * - Probe per-file facts (duration, codecs, resolution, size) with ffprobe
 * - Cache probe results for the lifetime of a run
 */

export { FFProbe, parseProbeOutput, type FFProbeOutput } from './probes/ffprobe.js';
export { EncoderDetector, parseEncoderList } from './probes/encoders.js';
export { MediaInfoCache, type MediaProber } from './cache.js';
