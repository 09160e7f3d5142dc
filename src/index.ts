export * from './types/index.js';
export { FileSystemService, type FileSystemServiceOptions } from './services/file-system-service.js';
export { PathResolver } from './services/path-resolver.js';
export { DirectoryGuard } from './services/directory-guard.js';
export { RecursiveCopier, defaultPermissionAdvisor } from './services/recursive-copier.js';
export { RecursiveDeleter } from './services/recursive-deleter.js';
export { PatternGlobber } from './services/pattern-globber.js';
export {
  FilesystemTypeProbe,
  execCommandRunner,
  quoteShellArgument,
} from './services/filesystem-type-probe.js';
export { UpdateCacheInvalidator } from './services/update-cache-invalidator.js';
export { nodeFileSystem } from './services/node-file-system.js';
export {
  createToolkitConfig,
  DEFAULT_EXCLUDED_EXTENSIONS,
  DENY_ALL_MARKER_CONTENT,
} from './services/toolkit-config.js';
export { createLogger, type Logger, type LogContext } from './services/logger.js';
