/**
 * @transcode-kit/processing
 * 
 * Command-synthesis and execution engine.
 * 
 * Responsibilities:
 * - Translate settings into ffmpeg filter graphs
 * - Resolve container/codec/encoder combinations
 * - Decide when stream copy is safe
 * - Assemble argument vectors for video, image and merge commands
 * - Supervise ffmpeg with live progress and cancellation
 * - Run a whole queue and report typed events
 */

// Filter graphs
export {
  buildVideoFilterSpec,
  buildImageFilterSpec,
  buildAudioSpeedFilter,
  buildAtempoChain,
  buildResizeFilter,
  buildCropFilter,
  buildRotateFilter,
  buildTextFilter,
  effectiveSpeed,
  escapeDrawtext,
  escapeFilterPath,
  type FilterSpec,
  type FilterBuildOptions,
  type WarnFn,
} from './filterGraph.js';

// Codec / encoder resolution
export {
  resolveCodec,
  selectEncoder,
  encoderQualityArgs,
  containerSupportsCodec,
  allowedCodecFamilies,
  usesYuv420,
  takesSpeedPreset,
  isHardwareEncoder,
  type CodecFamily,
  type EncodableCodec,
  type EncoderSelection,
} from './codecResolver.js';

// Fast path
export {
  fastCopyAllowed,
  mergeCopyAllowed,
  type FastCopyDecision,
  type SingleCopyCheck,
  type MergeCopyCheck,
  sameContainer,
} from './fastPath.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  type InputOptions,
  type OutputOptions,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type FilterArgument,
  type MetadataEntry,
} from './commandBuilder.js';

// Command assembly
export {
  planVideo,
  buildTrimArgs,
  buildVideoCommand,
  buildImageCommand,
  buildMergeCommand,
  jpegQualityScale,
  concatManifestLine,
  writeConcatManifest,
  type VideoPlan,
  type VideoCommandOptions,
} from './commands.js';

// Progress Parser
export {
  FFmpegProgressParser,
  estimateEta,
  type ProgressSnapshot,
  type RunPosition,
  type Clock,
} from './progressParser.js';

// Execution
export {
  ExecutionSupervisor,
  withProgressFlags,
  type CommandSupervisor,
  type ExecutionRequest,
  type ExecutionResult,
  type SupervisorOptions,
} from './executionSupervisor.js';

// Events
export { EventChannel } from './eventChannel.js';
export {
  isSupersedable,
  type ConversionEvent,
  type ConversionEventType,
  type RunLogLevel,
} from './events.js';

// Queue runner
export {
  ConversionRunner,
  describeMedia,
  type RunnerDependencies,
  type RunSummary,
  type EncoderSource,
} from './conversionRunner.js';
