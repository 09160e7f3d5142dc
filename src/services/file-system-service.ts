import type {
  BestEffortResult,
  CommandRunner,
  CopyFileResult,
  CopyTreeResult,
  DeleteResult,
  DirectoryResult,
  FileSystemPrimitives,
  MarkerResult,
  PermissionAdvisor,
  SessionDirectoryProvider,
  ToolkitConfig,
  ToolkitConfigOverrides,
  UpdateCacheHook,
  WebServerDetector,
} from '../types/index.js';
import { DirectoryGuard } from './directory-guard.js';
import { execCommandRunner, FilesystemTypeProbe } from './filesystem-type-probe.js';
import { nodeFileSystem } from './node-file-system.js';
import { PathResolver } from './path-resolver.js';
import { PatternGlobber } from './pattern-globber.js';
import { defaultPermissionAdvisor, RecursiveCopier } from './recursive-copier.js';
import { RecursiveDeleter } from './recursive-deleter.js';
import { createToolkitConfig } from './toolkit-config.js';
import { UpdateCacheInvalidator } from './update-cache-invalidator.js';

export interface FileSystemServiceOptions {
  /** Overrides for the defaults; a complete config from `createToolkitConfig` is accepted as is. */
  config?: ToolkitConfigOverrides;
  fileSystem?: FileSystemPrimitives;
  /** `null` means the host cannot run external programs. */
  commandRunner?: CommandRunner | null;
  permissionAdvisor?: PermissionAdvisor;
  honoursAccessMarker?: WebServerDetector;
  sessionDirectory?: SessionDirectoryProvider;
  cacheHooks?: readonly UpdateCacheHook[];
}

/**
 * Filesystem operations used by the installer and updater
 */
export class FileSystemService {
  readonly config: ToolkitConfig;
  readonly paths: PathResolver;
  readonly directories: DirectoryGuard;
  readonly copier: RecursiveCopier;
  readonly deleter: RecursiveDeleter;
  readonly globber: PatternGlobber;
  readonly probe: FilesystemTypeProbe;
  readonly caches: UpdateCacheInvalidator;

  constructor(options: FileSystemServiceOptions = {}) {
    this.config = createToolkitConfig(options.config);

    const fileSystem = options.fileSystem ?? nodeFileSystem;
    const commandRunner = options.commandRunner === undefined ? execCommandRunner : options.commandRunner;

    this.paths = new PathResolver(this.config, fileSystem);
    this.directories = new DirectoryGuard(this.config, fileSystem, options.honoursAccessMarker);
    this.copier = new RecursiveCopier(
      this.config,
      fileSystem,
      this.directories,
      this.paths,
      options.permissionAdvisor ?? defaultPermissionAdvisor
    );
    this.deleter = new RecursiveDeleter(fileSystem);
    this.globber = new PatternGlobber(fileSystem);
    this.probe = new FilesystemTypeProbe(this.config, commandRunner, options.sessionDirectory);
    this.caches = new UpdateCacheInvalidator(options.cacheHooks);
  }

  canonicalize(path: string): Promise<string> {
    return this.paths.canonicalize(path);
  }

  getRootPath(): Promise<string> {
    return this.paths.getRootPath();
  }

  isValidFilename(filename: string): boolean {
    return this.paths.isValidFilename(filename);
  }

  ensureDirectory(path: string, denyAccess: boolean = true): Promise<DirectoryResult> {
    return this.directories.ensureDirectory(path, denyAccess);
  }

  writeAccessMarker(path: string, overwrite: boolean = true, content?: string): Promise<MarkerResult> {
    return this.directories.writeAccessMarker(path, overwrite, content);
  }

  copyFile(source: string, dest: string, exclude: boolean = false): Promise<CopyFileResult> {
    return this.copier.copyFile(source, dest, exclude);
  }

  copyTree(sourceDir: string, targetDir: string, exclude: boolean = false): Promise<CopyTreeResult> {
    return this.copier.copyTree(sourceDir, targetDir, exclude);
  }

  deleteTree(dir: string, deleteRoot: boolean): Promise<DeleteResult> {
    return this.deleter.deleteTree(dir, deleteRoot);
  }

  matchRecursive(baseDir: string, pattern: string): Promise<string[]> {
    return this.globber.matchRecursive(baseDir, pattern);
  }

  isNetworkFilesystem(path: string): Promise<boolean> {
    return this.probe.isNetworkFilesystem(path);
  }

  isSessionStorageOnNetworkFilesystem(): Promise<boolean> {
    return this.probe.isSessionStorageOnNetworkFilesystem();
  }

  clearCachesOnUpdate(): Promise<BestEffortResult> {
    return this.caches.clearCachesOnUpdate();
  }
}
