import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { promises as fs, type Dirent } from 'fs';
import { errorCode, errorMessage } from '../../lib/util';
import type { SweepReport } from '../interfaces/artifact.interface';
import { ArtifactLockService } from './artifact-lock.service';
import { ArtifactStoreService } from './artifact-store.service';

type ReclaimOutcome = 'deleted' | 'skipped';

@Injectable()
export class ReclaimerService implements OnApplicationBootstrap {
  private readonly logger = new Logger(ReclaimerService.name);

  constructor(
    private readonly store: ArtifactStoreService,
    private readonly locks: ArtifactLockService,
  ) {}

  onApplicationBootstrap() {
    void this.scheduledSweep();
  }

  @Cron(CronExpression.EVERY_HOUR)
  async scheduledSweep(): Promise<void> {
    this.logger.log('Running artifact cleanup...');
    try {
      const report = await this.sweepOnce();
      this.logger.log(
        `Cleanup done: ${report.deleted} deleted, ${report.skipped} kept, ${report.failed} failed (${report.scanned} scanned)`,
      );
    } catch (error) {
      this.logger.error(`Artifact cleanup failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Deletes every artifact directory whose expiry marker is strictly in the
   * past. Directories without a readable marker are kept. Errors on one
   * directory are logged and do not stop the sweep.
   */
  async sweepOnce(now: Date = new Date()): Promise<SweepReport> {
    const report: SweepReport = { scanned: 0, deleted: 0, skipped: 0, failed: 0 };

    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.store.rootDirectory, {
        withFileTypes: true,
      });
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return report;
      throw error;
    }

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      report.scanned++;

      try {
        report[await this.reclaim(entry.name, now)]++;
      } catch (error) {
        report.failed++;
        this.logger.error(`Error processing ${entry.name}: ${errorMessage(error)}`);
      }
    }

    return report;
  }

  private async reclaim(postId: string, now: Date): Promise<ReclaimOutcome> {
    const expiry = await this.store.readExpiry(postId);

    if (expiry.state === 'missing') {
      this.logger.debug(`Skipping ${postId}: no expiry marker`);
      return 'skipped';
    }
    if (expiry.state === 'invalid') {
      this.logger.warn(`Skipping ${postId}: unparsable expiry marker "${expiry.raw.trim()}"`);
      return 'skipped';
    }
    if (now.getTime() <= expiry.expiresAt.getTime()) {
      return 'skipped';
    }

    return this.locks.runExclusive(postId, async () => {
      // a request may have refreshed the artifact while we waited for the lock
      const current = await this.store.readExpiry(postId);
      if (
        current.state !== 'set' ||
        now.getTime() <= current.expiresAt.getTime()
      ) {
        return 'skipped';
      }

      await this.store.remove(postId);
      this.logger.log(`Deleted expired directory: ${postId}`);
      return 'deleted';
    });
  }
}
