import type { FileSystemPrimitives, ToolkitConfig } from '../types/index.js';
import { createLogger, type Logger } from './logger.js';

const VALID_FILENAME = /^[a-zA-Z0-9]+[a-zA-Z_0-9.-]*$/;

/**
 * Resolves paths against the filesystem without ever throwing
 */
export class PathResolver {
  private logger: Logger;

  constructor(
    private config: ToolkitConfig,
    private fileSystem: FileSystemPrimitives
  ) {
    this.logger = createLogger('PathResolver');
  }

  /**
   * Canonical absolute form of `path` when it exists, otherwise `path` as given
   */
  async canonicalize(path: string): Promise<string> {
    try {
      if (!(await this.fileSystem.pathExists(path))) {
        return path;
      }
      return await this.fileSystem.realpath(path);
    } catch (error) {
      this.logger.debug('Could not canonicalize path, returning it unchanged', { path, error });
      return path;
    }
  }

  /**
   * Application root, without trailing slash
   */
  async getRootPath(): Promise<string> {
    return this.canonicalize(this.config.rootPath);
  }

  /**
   * Names must start with a letter or digit and contain only letters, digits, `_`, `.` and `-`.
   * Dot files such as `.htaccess` are rejected.
   */
  isValidFilename(filename: string): boolean {
    return VALID_FILENAME.test(filename);
  }
}
