/**
 * @transcode-kit/core
 * 
 * Core domain package containing:
 * - Settings, media and task types
 * - Closed option sets (formats, codecs, positions, ...)
 * - Task state machine
 * - Error hierarchy
 * - External binary discovery
 * - Preset persistence
 */

// Constants
export * from './constants.js';

// Types
export {
  detectMediaKind,
  createTaskItem,
  type MediaInfo,
  type MediaKind,
  type TaskItem,
} from './types/media.js';

// Settings
export {
  conversionSettingsSchema,
  DEFAULT_SETTINGS,
  createSettings,
  decodeSettings,
  type ConversionSettings,
} from './settings.js';

// State machine
export {
  TASK_STATES,
  TaskStateMachine,
  isValidTransition,
  type TaskState,
  type TaskStateTransition,
} from './taskState.js';

// Errors
export { 
  TranscodeKitError,
  ValidationError,
  PreconditionError,
  BinaryNotFoundError,
  CommandExecutionError,
  StateTransitionError,
} from './errors/index.js';

// Binary Configuration
export {
  discoverBinaries,
  findOnPath,
  getBinaryFolders,
  type BinaryConfig,
  type BinariesConfig,
  type DiscoveryOptions,
} from './config/binaries.js';

// Presets
export {
  PresetStore,
  BUILTIN_PRESETS,
  PRESET_FILE_VERSION,
  parsePresetFile,
  serializePresets,
  type PresetMap,
} from './presets.js';
