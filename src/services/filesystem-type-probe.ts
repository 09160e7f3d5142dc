import { exec } from 'child_process';
import { promisify } from 'util';
import type {
  CommandOutput,
  CommandRunner,
  SessionDirectoryProvider,
  ToolkitConfig,
} from '../types/index.js';
import { errorMessage } from './failures.js';
import { createLogger, type Logger } from './logger.js';

const execAsync = promisify(exec);

function splitLines(text: string): string[] {
  const trimmed = text.replace(/\s+$/, '');
  return trimmed === '' ? [] : trimmed.split('\n').map((line) => line.trimEnd());
}

/**
 * Runs commands through `/bin/sh`. A non-zero exit is reported, not thrown;
 * only a failure to start the shell rejects.
 */
export const execCommandRunner: CommandRunner = {
  async run(command: string): Promise<CommandOutput> {
    try {
      const { stdout } = await execAsync(command);
      return { exitCode: 0, output: splitLines(stdout) };
    } catch (error) {
      if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
        const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
        return { exitCode: error.code, output: splitLines(stdout) };
      }
      throw error;
    }
  },
};

export function quoteShellArgument(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Detects network filesystems with `df`. File locking on such mounts can make file-based
 * sessions and lock files very slow.
 */
export class FilesystemTypeProbe {
  private logger: Logger;

  /**
   * Pass `null` as the runner when the host cannot start processes; every probe then answers false.
   */
  constructor(
    private config: ToolkitConfig,
    private runner: CommandRunner | null = execCommandRunner,
    private sessionDirectory?: SessionDirectoryProvider
  ) {
    this.logger = createLogger('FilesystemTypeProbe');
  }

  /**
   * `df` filtered by filesystem type prints only its header (and exits 1) when the path
   * is on another type of filesystem, and the header plus a data line when it matches.
   */
  buildCommand(path: string): string {
    const typeFilters = this.config.networkFilesystemTypes.map((type) => `-t ${type}`).join(' ');
    return `df -T ${typeFilters} ${quoteShellArgument(path)} 2>&1`;
  }

  async isNetworkFilesystem(path: string): Promise<boolean> {
    if (!this.runner) {
      this.logger.debug('Process execution unavailable, assuming local filesystem', { path });
      return false;
    }

    const command = this.buildCommand(path);
    try {
      const { exitCode, output } = await this.runner.run(command);
      const isNetwork = exitCode === 0 && output.length > 1;
      this.logger.debug('Filesystem type probed', { path, exitCode, lines: output.length, isNetwork });
      return isNetwork;
    } catch (error) {
      this.logger.warn('Filesystem type probe could not run', { command, error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Probe the directory sessions are stored in, as reported by the session collaborator
   */
  async isSessionStorageOnNetworkFilesystem(): Promise<boolean> {
    if (!this.sessionDirectory) {
      return false;
    }
    try {
      return await this.isNetworkFilesystem(await this.sessionDirectory());
    } catch (error) {
      this.logger.warn('Could not determine the session directory', { error: errorMessage(error) });
      return false;
    }
  }
}
