import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { DirectoryGuard } from '@/services/directory-guard.js';
import { nodeFileSystem } from '@/services/node-file-system.js';
import { PathResolver } from '@/services/path-resolver.js';
import { RecursiveCopier } from '@/services/recursive-copier.js';
import { createToolkitConfig } from '@/services/toolkit-config.js';
import { CopyError, type FileSystemPrimitives, type PermissionAdvisor } from '@/types/index.js';

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

function permissionDenied(): Error {
  return Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
}

describe('RecursiveCopier', () => {
  let testDir: string;

  const createCopier = (
    fileSystem: FileSystemPrimitives = nodeFileSystem,
    advisor: PermissionAdvisor = (root) => `fix permissions under ${root}`
  ): RecursiveCopier => {
    const config = createToolkitConfig({ rootPath: testDir });
    return new RecursiveCopier(
      config,
      fileSystem,
      new DirectoryGuard(config, fileSystem),
      new PathResolver(config, fileSystem),
      advisor
    );
  };

  beforeEach(async () => {
    testDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'upgrade-fs-copy-')));
    await fs.mkdir(path.join(testDir, 'latest'));
    await fs.mkdir(path.join(testDir, 'install'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('copyFile', () => {
    it('should copy a file', async () => {
      const source = `${testDir}/latest/README.md`;
      const dest = `${testDir}/install/README.md`;
      await fs.writeFile(source, '# Release notes');

      const result = await createCopier().copyFile(source, dest);

      expect(result).toEqual({ source, dest, status: 'copied' });
      expect(await fs.readFile(dest, 'utf-8')).toBe('# Release notes');
    });

    it('should skip excluded extensions and report success', async () => {
      const source = `${testDir}/latest/index.php`;
      const dest = `${testDir}/install/index.php`;
      await fs.writeFile(source, '<?php // new');

      const result = await createCopier().copyFile(source, dest, true);

      expect(result).toEqual({ source, dest, status: 'skipped' });
      expect(await exists(dest)).toBe(false);
    });

    it('should leave an existing excluded destination untouched', async () => {
      const source = `${testDir}/latest/layout.twig`;
      const dest = `${testDir}/install/layout.twig`;
      await fs.writeFile(source, 'new template');
      await fs.writeFile(dest, 'customised template');

      await createCopier().copyFile(source, dest, true);

      expect(await fs.readFile(dest, 'utf-8')).toBe('customised template');
    });

    it('should copy excluded extensions when exclusion is off', async () => {
      const source = `${testDir}/latest/index.php`;
      const dest = `${testDir}/install/index.php`;
      await fs.writeFile(source, '<?php // new');

      const result = await createCopier().copyFile(source, dest);

      expect(result.status).toBe('copied');
      expect(await fs.readFile(dest, 'utf-8')).toBe('<?php // new');
    });

    it('should treat a bare dot file name as its extension', async () => {
      const source = `${testDir}/latest/.php`;
      const dest = `${testDir}/install/.php`;
      await fs.writeFile(source, '<?php');

      const result = await createCopier().copyFile(source, dest, true);

      expect(result.status).toBe('skipped');
      expect(await exists(dest)).toBe(false);
    });

    it('should compare extensions case-sensitively', async () => {
      const source = `${testDir}/latest/LEGACY.PHP`;
      const dest = `${testDir}/install/LEGACY.PHP`;
      await fs.writeFile(source, 'upper');

      const result = await createCopier().copyFile(source, dest, true);

      expect(result.status).toBe('copied');
    });

    it('should relax destination permissions and retry once', async () => {
      const source = `${testDir}/latest/config.ini.php`;
      const dest = `${testDir}/install/config.ini.php`;
      await fs.writeFile(source, 'new');
      await fs.writeFile(dest, 'old');
      await fs.chmod(dest, 0o444);

      const copyFile = vi.fn(nodeFileSystem.copyFile);
      copyFile.mockRejectedValueOnce(permissionDenied());
      const chmod = vi.fn(nodeFileSystem.chmod);

      const result = await createCopier({ ...nodeFileSystem, copyFile, chmod }).copyFile(source, dest);

      expect(result).toEqual({ source, dest, status: 'copied-after-retry' });
      expect(chmod).toHaveBeenCalledWith(dest, 0o755);
      expect(copyFile).toHaveBeenCalledTimes(2);
      expect(await fs.readFile(dest, 'utf-8')).toBe('new');
    });

    it('should retry even when relaxing permissions fails', async () => {
      const source = `${testDir}/latest/a.txt`;
      const dest = `${testDir}/install/a.txt`;
      await fs.writeFile(source, 'a');

      const copyFile = vi.fn(nodeFileSystem.copyFile);
      copyFile.mockRejectedValueOnce(permissionDenied());
      const chmod = vi.fn(async (_path: string, _mode: number) => {
        throw Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
      });

      const result = await createCopier({ ...nodeFileSystem, copyFile, chmod }).copyFile(source, dest);

      expect(result.status).toBe('copied-after-retry');
      expect(await fs.readFile(dest, 'utf-8')).toBe('a');
    });

    it('should throw a CopyError when the retry fails too', async () => {
      const source = `${testDir}/latest/core.js`;
      const dest = `${testDir}/install/missing-dir/core.js`;
      await fs.writeFile(source, 'core');

      const copier = createCopier();
      const error = await copier.copyFile(source, dest).catch((thrown: unknown) => thrown);

      expect(error).toBeInstanceOf(CopyError);
      if (!(error instanceof CopyError)) return;
      expect(error.code).toBe('COPY_FAILED');
      expect(error.source).toBe(source);
      expect(error.dest).toBe(dest);
      expect(error.message).toBe(
        `Error while creating/copying file to ${dest}.\nfix permissions under ${testDir}`
      );
    });

    it('should mention the root in the default permission advice', async () => {
      const source = `${testDir}/latest/core.js`;
      await fs.writeFile(source, 'core');
      const config = createToolkitConfig({ rootPath: testDir });
      const copier = new RecursiveCopier(
        config,
        nodeFileSystem,
        new DirectoryGuard(config, nodeFileSystem),
        new PathResolver(config, nodeFileSystem)
      );

      await expect(copier.copyFile(source, `${testDir}/nowhere/core.js`)).rejects.toThrow(
        `chmod -R 0755 ${testDir}`
      );
    });
  });

  describe('copyTree', () => {
    beforeEach(async () => {
      const latest = `${testDir}/latest`;
      await fs.mkdir(`${latest}/lang/templates`, { recursive: true });
      await fs.mkdir(`${latest}/plugins/Goals`, { recursive: true });
      await fs.writeFile(`${latest}/index.php`, '<?php');
      await fs.writeFile(`${latest}/README.md`, 'readme');
      await fs.writeFile(`${latest}/lang/en.json`, '{"hello":"Hello"}');
      await fs.writeFile(`${latest}/lang/templates/view.twig`, '{{ hello }}');
      await fs.writeFile(`${latest}/plugins/Goals/Goals.php`, '<?php');
      await fs.writeFile(`${latest}/plugins/Goals/goals.svg`, '<svg/>');
    });

    it('should mirror the whole tree', async () => {
      const result = await createCopier().copyTree(`${testDir}/latest`, `${testDir}/install`);

      expect(result).toEqual({
        source: `${testDir}/latest`,
        target: `${testDir}/install`,
        copied: 6,
        skipped: 0,
        directories: 5,
        failures: [],
      });
      expect(await fs.readFile(`${testDir}/install/lang/templates/view.twig`, 'utf-8')).toBe('{{ hello }}');
      expect(await fs.readFile(`${testDir}/install/plugins/Goals/goals.svg`, 'utf-8')).toBe('<svg/>');
    });

    it('should apply exclusion at every depth', async () => {
      const result = await createCopier().copyTree(`${testDir}/latest`, `${testDir}/install`, true);

      expect(result.copied).toBe(3);
      expect(result.skipped).toBe(3);
      expect(await exists(`${testDir}/install/index.php`)).toBe(false);
      expect(await exists(`${testDir}/install/lang/templates/view.twig`)).toBe(false);
      expect(await exists(`${testDir}/install/plugins/Goals/Goals.php`)).toBe(false);
      expect(await exists(`${testDir}/install/README.md`)).toBe(true);
      expect(await exists(`${testDir}/install/lang/en.json`)).toBe(true);
      expect(await exists(`${testDir}/install/plugins/Goals/goals.svg`)).toBe(true);
      expect((await fs.stat(`${testDir}/install/lang/templates`)).isDirectory()).toBe(true);
    });

    it('should create a missing target without an access marker', async () => {
      await createCopier().copyTree(`${testDir}/latest/lang`, `${testDir}/install/new/lang`);

      expect(await fs.readFile(`${testDir}/install/new/lang/en.json`, 'utf-8')).toBe('{"hello":"Hello"}');
      expect(await exists(`${testDir}/install/new/lang/.htaccess`)).toBe(false);
    });

    it('should copy a single file when the source is not a directory', async () => {
      const result = await createCopier().copyTree(`${testDir}/latest/README.md`, `${testDir}/install/README.md`);

      expect(result.copied).toBe(1);
      expect(result.directories).toBe(0);
      expect(await fs.readFile(`${testDir}/install/README.md`, 'utf-8')).toBe('readme');
    });

    it('should stop on the first file that cannot be copied', async () => {
      const copyFile = vi.fn(async (_source: string, _dest: string) => {
        throw permissionDenied();
      });

      await expect(
        createCopier({ ...nodeFileSystem, copyFile }).copyTree(`${testDir}/latest`, `${testDir}/install`)
      ).rejects.toBeInstanceOf(CopyError);
      expect(copyFile).toHaveBeenCalledTimes(2);
    });
  });
});
