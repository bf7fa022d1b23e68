/**
 * @transcode-kit/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Time / size formatting
 * - Type guards
 */

// Command execution
export {
  executeCommand,
  isMissingExecutableError,
  formatCommand,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  pathExists,
  removeFile,
  getFileSizeBytes,
} from './file.js';

// Path utilities
export {
  getExtension,
  getBasename,
  expandHome,
  safeOutputName,
} from './path.js';

// Type guards
export {
  isString,
  isNumber,
  isObject,
  isNonEmptyString,
  isDefined,
  parseOptionalInt,
  parseOptionalFloat,
} from './guards.js';

// Time utilities
export {
  sleep,
  formatClock,
  formatBytes,
  parseTimeToSeconds,
  parseFFmpegTime,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
