import type { FileSystemPrimitives } from '../types/index.js';
import { errorMessage } from './failures.js';
import { createLogger, type Logger } from './logger.js';

interface GlobFrame {
  subdirectories: string[];
  next: number;
}

/**
 * Recursive glob that never follows symbolic links to directories
 */
export class PatternGlobber {
  private logger: Logger;

  constructor(private fileSystem: FileSystemPrimitives) {
    this.logger = createLogger('PatternGlobber');
  }

  /**
   * Paths under `baseDir` matching `pattern` at any depth. Each directory contributes its own
   * matches first, followed by the matches of its subdirectories. Hidden directories and
   * symlinked directories are not searched.
   */
  async matchRecursive(baseDir: string, pattern: string): Promise<string[]> {
    const matches: string[] = [];
    const stack: GlobFrame[] = [];

    const enter = async (dir: string): Promise<void> => {
      matches.push(...(await this.matchIn(dir, pattern)));
      stack.push({ subdirectories: await this.listSubdirectories(dir), next: 0 });
    };

    await enter(baseDir);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.subdirectories.length) {
        stack.pop();
        continue;
      }
      await enter(frame.subdirectories[frame.next++]);
    }

    this.logger.debug('Recursive match finished', { baseDir, pattern, matches: matches.length });
    return matches;
  }

  private async matchIn(dir: string, pattern: string): Promise<string[]> {
    try {
      const found = await this.fileSystem.glob(pattern, dir);
      return found.sort().map((match) => `${dir}/${match}`);
    } catch (error) {
      this.logger.debug('Pattern match failed in directory', { dir, pattern, error: errorMessage(error) });
      return [];
    }
  }

  private async listSubdirectories(dir: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await this.fileSystem.readdir(dir);
    } catch (error) {
      this.logger.debug('Cannot enumerate directory', { dir, error: errorMessage(error) });
      return [];
    }

    const subdirectories: string[] = [];
    for (const entry of entries.filter((name) => !name.startsWith('.')).sort()) {
      const entryPath = `${dir}/${entry}`;
      if (!(await this.fileSystem.stat(entryPath))?.isDirectory()) continue;
      // Symlinked directories may point back up the tree
      if ((await this.fileSystem.lstat(entryPath))?.isSymbolicLink()) continue;
      subdirectories.push(entryPath);
    }
    return subdirectories;
  }
}
