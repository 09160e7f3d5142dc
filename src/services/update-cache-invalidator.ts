import type { BestEffortResult, OperationFailure, UpdateCacheHook } from '../types/index.js';
import { toFailure } from './failures.js';
import { createLogger, type Logger } from './logger.js';

/**
 * Clears every cache that a core install, update or plugin toggle can invalidate
 * (merged assets, compiled templates, tracker cache, ...). Hooks run in registration order.
 */
export class UpdateCacheInvalidator {
  private logger: Logger;

  constructor(private hooks: readonly UpdateCacheHook[] = []) {
    this.logger = createLogger('UpdateCacheInvalidator');
  }

  async clearCachesOnUpdate(): Promise<BestEffortResult> {
    const failures: OperationFailure[] = [];

    for (const hook of this.hooks) {
      try {
        await hook.clear();
        this.logger.debug('Cache cleared', { hook: hook.name });
      } catch (error) {
        this.logger.warn('Cache hook failed, continuing with the remaining hooks', { hook: hook.name, error });
        failures.push(toFailure(hook.name, 'hook', error));
      }
    }

    return { ok: failures.length === 0, path: '', failures };
  }
}
