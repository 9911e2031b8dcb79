import fs from 'node:fs/promises';
import path from 'node:path';
import type {
  EntryStatus,
  ManifestEntry,
  ManifestSummary,
  RunStage,
} from '../types/manifest.js';
import { logger } from '../utils/logger.js';

/**
 * What every unit of a run (a target, a team/season extraction, the export)
 * ended as. A run is never reported as done without this list.
 */
export class RunManifest {
  readonly startedAt = new Date();
  private readonly entries: ManifestEntry[] = [];

  record(stage: RunStage, key: string, status: EntryStatus, message?: string): void {
    this.entries.push(message === undefined ? { key, stage, status } : { key, stage, status, message });
  }

  get all(): readonly ManifestEntry[] {
    return this.entries;
  }

  byStatus(status: EntryStatus): ManifestEntry[] {
    return this.entries.filter((e) => e.status === status);
  }

  summary(stage?: RunStage): ManifestSummary {
    const summary: ManifestSummary = { succeeded: 0, skipped: 0, warning: 0, failed: 0 };
    for (const entry of this.entries) {
      if (stage === undefined || entry.stage === stage) summary[entry.status]++;
    }
    return summary;
  }

  hasFailures(): boolean {
    return this.entries.some((e) => e.status === 'failed');
  }

  async write(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    const body = {
      startedAt: this.startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
      summary: this.summary(),
      entries: this.entries,
    };
    await fs.writeFile(filePath, JSON.stringify(body, null, 2), 'utf-8');
    logger.info({ path: filePath, ...body.summary }, 'Run manifest written');
  }

  /** Logs the summary, then every entry that did not plainly succeed. */
  report(): void {
    logger.info(this.summary(), 'Run summary');
    for (const entry of this.entries) {
      if (entry.status === 'failed') {
        logger.error({ key: entry.key, stage: entry.stage }, entry.message ?? 'Failed');
      } else if (entry.status !== 'succeeded') {
        logger.warn({ key: entry.key, stage: entry.stage, status: entry.status }, entry.message ?? entry.status);
      }
    }
  }
}
