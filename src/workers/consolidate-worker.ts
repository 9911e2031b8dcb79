import { errorMessage } from '../errors.js';
import type { MetricRegistry } from '../extractors/metric-registry.js';
import { consolidate, exportCsv } from '../pipeline/consolidator.js';
import type { IntermediateStore } from '../pipeline/intermediate.js';
import type { RunManifest } from '../pipeline/manifest.js';
import type { ConsolidatedRecord } from '../types/records.js';
import type { SeasonInfo } from '../types/reference.js';
import { logger } from '../utils/logger.js';

export interface ConsolidateDeps {
  intermediate: IntermediateStore;
  registry: MetricRegistry;
  manifest: RunManifest;
}

/** Joins every season's frames and writes the export. Any mismatch fails the run. */
export async function runConsolidation(
  deps: ConsolidateDeps,
  seasons: SeasonInfo[],
  exportPath: string,
): Promise<ConsolidatedRecord[]> {
  try {
    const frames = await Promise.all(
      seasons.map(async (season) => ({
        table: await deps.intermediate.readTable(season.id),
        statistics: await deps.intermediate.readStatistics(season.id),
      })),
    );

    const records = consolidate(
      frames.flatMap((f) => f.table),
      frames.flatMap((f) => f.statistics),
      deps.registry,
    );
    await exportCsv(records, deps.registry, exportPath);

    logger.info({ rows: records.length, path: exportPath }, 'Export written');
    deps.manifest.record('consolidate', exportPath, 'succeeded', `${records.length} rows`);
    return records;
  } catch (err) {
    deps.manifest.record('consolidate', exportPath, 'failed', errorMessage(err));
    throw err;
  }
}
