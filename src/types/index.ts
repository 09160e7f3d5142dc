/**
 * Base error for the toolkit. `code` is a stable identifier callers can switch on.
 */
export class ToolkitError extends Error {
  constructor(
    public code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ToolkitError';
  }
}

/**
 * Raised when a file could not be copied even after relaxing the destination permissions.
 * This is the only error the toolkit throws during tree operations.
 */
export class CopyError extends ToolkitError {
  constructor(
    public source: string,
    public dest: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('COPY_FAILED', message, options);
    this.name = 'CopyError';
  }
}

export type FailedOperation =
  | 'mkdir'
  | 'chmod'
  | 'write'
  | 'readdir'
  | 'unlink'
  | 'rmdir'
  | 'hook';

export interface OperationFailure {
  path: string;
  operation: FailedOperation;
  code?: string;
  message: string;
}

/**
 * Outcome of a best-effort operation. Nothing is thrown; failures are collected instead.
 */
export interface BestEffortResult {
  ok: boolean;
  path: string;
  failures: OperationFailure[];
}

export interface DirectoryResult extends BestEffortResult {
  created: boolean;
  writable: boolean;
  markerWritten: boolean;
}

export interface MarkerResult extends BestEffortResult {
  written: boolean;
}

export interface DeleteResult extends BestEffortResult {
  removed: number;
}

export type CopyStatus = 'copied' | 'copied-after-retry' | 'skipped';

export interface CopyFileResult {
  source: string;
  dest: string;
  status: CopyStatus;
}

export interface CopyTreeResult {
  source: string;
  target: string;
  copied: number;
  skipped: number;
  directories: number;
  failures: OperationFailure[];
}

export interface EntryStats {
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

/**
 * The filesystem calls the toolkit relies on. The default implementation lives in
 * `services/node-file-system.ts`; tests replace individual methods to simulate failures.
 */
export interface FileSystemPrimitives {
  /** Follows symbolic links. Resolves to null when the path does not exist. */
  stat(path: string): Promise<EntryStats | null>;
  /** Does not follow symbolic links. Resolves to null when the path does not exist. */
  lstat(path: string): Promise<EntryStats | null>;
  pathExists(path: string): Promise<boolean>;
  ensureDir(path: string, mode: number): Promise<void>;
  chmod(path: string, mode: number): Promise<void>;
  isWritable(path: string): Promise<boolean>;
  copyFile(source: string, dest: string): Promise<void>;
  writeFile(path: string, content: string): Promise<void>;
  readdir(path: string): Promise<string[]>;
  unlink(path: string): Promise<void>;
  rmdir(path: string): Promise<void>;
  realpath(path: string): Promise<string>;
  /** Matches `pattern` relative to `cwd` without descending further than the pattern says. */
  glob(pattern: string, cwd: string): Promise<string[]>;
}

export interface CommandOutput {
  exitCode: number;
  output: string[];
}

export interface CommandRunner {
  run(command: string): Promise<CommandOutput>;
}

/** Produces remediation text for missing write permissions under the application root. */
export type PermissionAdvisor = (rootPath: string) => string;

/** Whether the serving web server honours access markers such as `.htaccess`. */
export type WebServerDetector = () => boolean;

export type SessionDirectoryProvider = () => string | Promise<string>;

export interface UpdateCacheHook {
  name: string;
  clear(): void | Promise<void>;
}

export interface AccessMarkerConfig {
  readonly filename: string;
  readonly content: string;
}

export interface ToolkitConfig {
  readonly rootPath: string;
  readonly excludedExtensions: readonly string[];
  readonly accessMarker: AccessMarkerConfig;
  readonly directoryMode: number;
  readonly permissionEscalationModes: readonly number[];
  readonly copyRetryMode: number;
  readonly networkFilesystemTypes: readonly string[];
}

export type ToolkitConfigOverrides = Partial<Omit<ToolkitConfig, 'accessMarker'>> & {
  accessMarker?: Partial<AccessMarkerConfig>;
};
