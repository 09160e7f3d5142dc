import type { DeleteResult, FileSystemPrimitives, OperationFailure } from '../types/index.js';
import { errorCode, toFailure } from './failures.js';
import { createLogger, type Logger } from './logger.js';

interface DeleteFrame {
  dir: string;
  removeSelf: boolean;
  entries: string[];
  next: number;
}

/**
 * Best-effort removal of directory trees
 */
export class RecursiveDeleter {
  private logger: Logger;

  constructor(private fileSystem: FileSystemPrimitives) {
    this.logger = createLogger('RecursiveDeleter');
  }

  /**
   * Remove everything below `dir`, and `dir` itself when `deleteRoot` is set.
   * An entry that cannot be unlinked is assumed to be a directory and emptied in turn.
   */
  async deleteTree(dir: string, deleteRoot: boolean): Promise<DeleteResult> {
    this.logger.debug('Delete tree requested', { dir, deleteRoot });
    const failures: OperationFailure[] = [];
    const stack: DeleteFrame[] = [];
    let removed = 0;

    const enter = async (path: string, removeSelf: boolean, unlinkError?: unknown): Promise<void> => {
      try {
        stack.push({ dir: path, removeSelf, entries: await this.fileSystem.readdir(path), next: 0 });
      } catch (error) {
        // A file that refused to be unlinked: report why the unlink failed
        if (unlinkError !== undefined && errorCode(error) === 'ENOTDIR') {
          failures.push(toFailure(path, 'unlink', unlinkError));
        } else {
          failures.push(toFailure(path, 'readdir', error));
        }
      }
    };

    await enter(dir, deleteRoot);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.next < frame.entries.length) {
        const entryPath = `${frame.dir}/${frame.entries[frame.next++]}`;
        try {
          await this.fileSystem.unlink(entryPath);
          removed++;
        } catch (error) {
          // Not a file: empty it and remove it as a directory
          await enter(entryPath, true, error);
        }
        continue;
      }

      stack.pop();
      if (frame.removeSelf) {
        try {
          await this.fileSystem.rmdir(frame.dir);
          if (frame.dir !== dir) removed++;
        } catch (error) {
          failures.push(toFailure(frame.dir, 'rmdir', error));
        }
      }
    }

    if (failures.length > 0) {
      this.logger.debug('Delete tree finished with failures', { dir, failures: failures.length });
    }

    return { ok: failures.length === 0, path: dir, failures, removed };
  }
}
