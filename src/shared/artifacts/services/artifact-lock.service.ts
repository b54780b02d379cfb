import { Injectable, Logger } from '@nestjs/common';
import pLimit from 'p-limit';

interface KeyedLock {
  limit: ReturnType<typeof pLimit>;
  holders: number;
}

/**
 * In-process per-artifact mutex. `put` and the reclaimer take the lock of the
 * post they touch; work on different posts never waits.
 *
 * Key format: post id
 */
@Injectable()
export class ArtifactLockService {
  private readonly logger = new Logger(ArtifactLockService.name);
  private readonly locks = new Map<string, KeyedLock>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = { limit: pLimit(1), holders: 0 };
      this.locks.set(key, lock);
    }
    const entry = lock;
    entry.holders++;

    try {
      return await entry.limit(() => {
        this.logger.verbose(`Lock acquired for ${key}`);
        return task();
      });
    } finally {
      entry.holders--;
      if (entry.holders === 0 && this.locks.get(key) === entry) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}
