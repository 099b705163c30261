/**
 * Utility exports
 */

// Formatting utilities
export { formatBytes, formatDuration, formatTimestamp } from "./format";
export type { LogLevel } from "./logger";
// Logger
export { debug, error, getLogLevel, info, isLogLevel, logger, setLogLevel, warn } from "./logger";
export type { ParsedArchiveName } from "./naming";
// Naming utilities
export {
  ARCHIVE_EXTENSION,
  archiveNamePattern,
  DEFAULT_ARCHIVE_PREFIX,
  generateArchiveName,
  isValidArchiveName,
  parseArchiveName,
} from "./naming";
// Path utilities
export { isPathWithinDir, toArchiveEntryName } from "./path";
