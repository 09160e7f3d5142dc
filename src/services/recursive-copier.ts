import * as path from 'path';
import {
  CopyError,
  type CopyFileResult,
  type CopyTreeResult,
  type FileSystemPrimitives,
  type PermissionAdvisor,
  type ToolkitConfig,
} from '../types/index.js';
import { DirectoryGuard } from './directory-guard.js';
import { errorMessage, toFailure } from './failures.js';
import { createLogger, type Logger } from './logger.js';
import { PathResolver } from './path-resolver.js';

interface CopyFrame {
  source: string;
  target: string;
  entries: string[];
  next: number;
}

export const defaultPermissionAdvisor: PermissionAdvisor = (rootPath) =>
  `Please make sure the web server can write to "${rootPath}", for example:\n` +
  `  chown -R <web-server-user>:<web-server-group> ${rootPath}\n` +
  `  chmod -R 0755 ${rootPath}`;

/**
 * Copies files and whole trees during an upgrade.
 */
export class RecursiveCopier {
  private logger: Logger;
  private excluded: ReadonlySet<string>;

  constructor(
    private config: ToolkitConfig,
    private fileSystem: FileSystemPrimitives,
    private guard: DirectoryGuard,
    private resolver: PathResolver,
    private advisePermissions: PermissionAdvisor = defaultPermissionAdvisor
  ) {
    this.logger = createLogger('RecursiveCopier');
    this.excluded = new Set(config.excludedExtensions);
  }

  /**
   * Whether `exclude` would make `copyFile` skip this source
   */
  isExcluded(source: string): boolean {
    const name = path.basename(source);
    // A bare `.php` has extension `php`
    const dot = name.lastIndexOf('.');
    const extension = dot === -1 ? '' : name.slice(dot + 1);
    return extension !== '' && this.excluded.has(extension);
  }

  /**
   * Copy one file. With `exclude`, files whose extension is in the exclusion set are
   * reported as skipped and left alone. A failed copy is retried once after relaxing the
   * destination's permissions; if that fails too a CopyError is thrown.
   */
  async copyFile(source: string, dest: string, exclude: boolean = false): Promise<CopyFileResult> {
    if (exclude && this.isExcluded(source)) {
      this.logger.debug('Skipping excluded file', { source, dest });
      return { source, dest, status: 'skipped' };
    }

    try {
      await this.fileSystem.copyFile(source, dest);
      return { source, dest, status: 'copied' };
    } catch (firstError) {
      this.logger.debug('Copy failed, relaxing destination permissions and retrying', {
        source,
        dest,
        error: errorMessage(firstError),
      });
    }

    try {
      await this.fileSystem.chmod(dest, this.config.copyRetryMode);
    } catch (error) {
      this.logger.debug('chmod before copy retry failed', { dest, error: errorMessage(error) });
    }

    try {
      await this.fileSystem.copyFile(source, dest);
      return { source, dest, status: 'copied-after-retry' };
    } catch (error) {
      const rootPath = await this.resolver.getRootPath();
      const message =
        `Error while creating/copying file to ${dest}.\n` + this.advisePermissions(rootPath);
      this.logger.error('Copy failed after permission retry', error, { source, dest });
      throw new CopyError(source, dest, message, { cause: error });
    }
  }

  /**
   * Mirror `sourceDir` into `targetDir`, creating directories as needed.
   * When `sourceDir` is a file it is copied to `targetDir` directly.
   */
  async copyTree(sourceDir: string, targetDir: string, exclude: boolean = false): Promise<CopyTreeResult> {
    this.logger.debug('Copy tree requested', { sourceDir, targetDir, exclude });
    const result: CopyTreeResult = {
      source: sourceDir,
      target: targetDir,
      copied: 0,
      skipped: 0,
      directories: 0,
      failures: [],
    };

    const tally = (copy: CopyFileResult): void => {
      if (copy.status === 'skipped') {
        result.skipped++;
      } else {
        result.copied++;
      }
    };

    if (!(await this.fileSystem.stat(sourceDir))?.isDirectory()) {
      tally(await this.copyFile(sourceDir, targetDir, exclude));
      return result;
    }

    const stack: CopyFrame[] = [];
    const enter = async (source: string, target: string): Promise<void> => {
      const prepared = await this.guard.ensureDirectory(target, false);
      result.directories++;
      result.failures.push(...prepared.failures);

      try {
        stack.push({ source, target, entries: await this.fileSystem.readdir(source), next: 0 });
      } catch (error) {
        this.logger.warn('Cannot read source directory, skipping it', { source, error: errorMessage(error) });
        result.failures.push(toFailure(source, 'readdir', error));
      }
    };

    await enter(sourceDir, targetDir);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.entries.length) {
        stack.pop();
        continue;
      }

      const entry = frame.entries[frame.next++];
      const sourcePath = `${frame.source}/${entry}`;
      const targetPath = `${frame.target}/${entry}`;

      if ((await this.fileSystem.stat(sourcePath))?.isDirectory()) {
        await enter(sourcePath, targetPath);
        continue;
      }
      tally(await this.copyFile(sourcePath, targetPath, exclude));
    }

    this.logger.debug('Copy tree finished', {
      sourceDir,
      targetDir,
      copied: result.copied,
      skipped: result.skipped,
      directories: result.directories,
    });
    return result;
  }
}
