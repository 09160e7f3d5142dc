import * as fs from 'fs/promises';
import { constants } from 'fs';
import fse from 'fs-extra';
import { glob } from 'glob';
import type { EntryStats, FileSystemPrimitives } from '../types/index.js';

async function statOrNull(read: () => Promise<EntryStats>): Promise<EntryStats | null> {
  try {
    return await read();
  } catch {
    // Missing, dangling or looping paths all count as "not there"
    return null;
  }
}

/**
 * Filesystem primitives backed by Node and fs-extra.
 */
export const nodeFileSystem: FileSystemPrimitives = {
  stat: (path) => statOrNull(() => fs.stat(path)),
  lstat: (path) => statOrNull(() => fs.lstat(path)),
  pathExists: (path) => fse.pathExists(path),
  ensureDir: (path, mode) => fse.ensureDir(path, { mode }),
  chmod: (path, mode) => fs.chmod(path, mode),

  async isWritable(path) {
    try {
      await fs.access(path, constants.W_OK);
      return true;
    } catch {
      return false;
    }
  },

  copyFile: (source, dest) => fs.copyFile(source, dest),
  writeFile: (path, content) => fs.writeFile(path, content, 'utf-8'),
  readdir: (path) => fs.readdir(path),
  unlink: (path) => fs.unlink(path),
  rmdir: (path) => fs.rmdir(path),
  realpath: (path) => fs.realpath(path),
  glob: (pattern, cwd) => glob(pattern, { cwd, dot: false }),
};
