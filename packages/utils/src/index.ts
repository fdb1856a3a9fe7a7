/**
 * @tubemux/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path and filename helpers
 * - Logger
 */

// Command execution
export {
  executeCommand,
  TailBuffer,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  pathExists,
  removeFile,
} from './file.js';

// Path utilities
export {
  slugify,
  sanitizeFilename,
} from './path.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
