import type {
  DirectoryResult,
  FileSystemPrimitives,
  MarkerResult,
  OperationFailure,
  ToolkitConfig,
  WebServerDetector,
} from '../types/index.js';
import { toFailure } from './failures.js';
import { createLogger, type Logger } from './logger.js';

/**
 * Creates directories for the installer and keeps them writable without ever opening them
 * to everyone. Every failure is reported in the result; nothing is thrown.
 */
export class DirectoryGuard {
  private logger: Logger;

  constructor(
    private config: ToolkitConfig,
    private fileSystem: FileSystemPrimitives,
    private honoursAccessMarker: WebServerDetector = () => true
  ) {
    this.logger = createLogger('DirectoryGuard');
  }

  /**
   * Create `path` and its missing ancestors, then make sure it is writable.
   * Permissions are escalated at most through the configured steps (0755, then 0775 by default).
   * With `denyAccess`, an access marker is added unless one is already there.
   */
  async ensureDirectory(path: string, denyAccess: boolean = true): Promise<DirectoryResult> {
    this.logger.debug('Ensure directory requested', { path, denyAccess });
    const failures: OperationFailure[] = [];
    let created = false;

    const existing = await this.fileSystem.stat(path);
    if (!existing?.isDirectory()) {
      try {
        // The effective mode is still filtered by the process umask
        await this.fileSystem.ensureDir(path, this.config.directoryMode);
        created = true;
      } catch (error) {
        this.logger.warn('Failed to create directory', { path, error });
        failures.push(toFailure(path, 'mkdir', error));
      }
    }

    let writable = await this.fileSystem.isWritable(path);
    for (const mode of this.config.permissionEscalationModes) {
      if (writable) break;
      try {
        await this.fileSystem.chmod(path, mode);
      } catch (error) {
        this.logger.debug('chmod failed while escalating permissions', { path, mode: mode.toString(8), error });
        failures.push(toFailure(path, 'chmod', error));
      }
      writable = await this.fileSystem.isWritable(path);
    }

    if (!writable) {
      this.logger.warn('Directory is not writable after permission escalation', { path });
    }

    let markerWritten = false;
    if (denyAccess) {
      const marker = await this.writeAccessMarker(path, false);
      markerWritten = marker.written;
      failures.push(...marker.failures);
    }

    return {
      ok: writable && failures.length === 0,
      path,
      failures,
      created,
      writable,
      markerWritten,
    };
  }

  /**
   * Write the access-deny marker into `path`. An existing marker is kept unless `overwrite` is set.
   * Does nothing when the web server is known not to read markers.
   */
  async writeAccessMarker(
    path: string,
    overwrite: boolean = true,
    content: string = this.config.accessMarker.content
  ): Promise<MarkerResult> {
    const markerPath = `${path}/${this.config.accessMarker.filename}`;

    if (!this.honoursAccessMarker()) {
      this.logger.debug('Web server ignores access markers, skipping', { markerPath });
      return { ok: true, path: markerPath, failures: [], written: false };
    }

    try {
      if (!overwrite && (await this.fileSystem.pathExists(markerPath))) {
        return { ok: true, path: markerPath, failures: [], written: false };
      }
      await this.fileSystem.writeFile(markerPath, content);
      this.logger.debug('Access marker written', { markerPath, overwrite });
      return { ok: true, path: markerPath, failures: [], written: true };
    } catch (error) {
      this.logger.debug('Failed to write access marker', { markerPath, error });
      return { ok: false, path: markerPath, failures: [toFailure(markerPath, 'write', error)], written: false };
    }
  }
}
