import { errorMessage, DataQualityError, NotFoundError } from '../errors.js';
import type { MetricRegistry } from '../extractors/metric-registry.js';
import { extractStatistics } from '../extractors/stats-extractor.js';
import { assertCompleteTable, extractTable } from '../extractors/table-extractor.js';
import type { IntermediateStore } from '../pipeline/intermediate.js';
import type { RunManifest } from '../pipeline/manifest.js';
import { createTarget, targetKey } from '../pipeline/targets.js';
import type { TeamResolver } from '../pipeline/team-resolver.js';
import type { SnapshotStore } from '../snapshots/storage.js';
import type { ExtractionWarning, StatRecord, TableRow } from '../types/records.js';
import type { SeasonInfo } from '../types/reference.js';
import { LEAGUE_ENTITY, type FetchTarget, type SeasonId, type TeamId } from '../types/target.js';
import { logger } from '../utils/logger.js';

export interface ExtractDeps {
  snapshots: SnapshotStore;
  intermediate: IntermediateStore;
  resolver: TeamResolver;
  registry: MetricRegistry;
  manifest: RunManifest;
  /** Statistics pages a team is expected to have, saved or marked absent */
  statsPages: number;
}

export interface SeasonExtraction {
  season: SeasonId;
  table: TableRow[] | null;
  statistics: StatRecord[];
  failedTeams: TeamId[];
}

/**
 * Extraction reads only saved snapshots and shares no state, so every season,
 * and every team within it, is processed concurrently.
 */
export async function runExtraction(deps: ExtractDeps, seasons: SeasonInfo[]): Promise<SeasonExtraction[]> {
  return Promise.all(seasons.map((season) => extractSeason(deps, season)));
}

export async function extractSeason(deps: ExtractDeps, season: SeasonInfo): Promise<SeasonExtraction> {
  const [table, perTeam] = await Promise.all([
    extractSeasonTable(deps, season),
    Promise.all(season.teams.map((team) => extractTeam(deps, season.id, team))),
  ]);

  if (table) {
    await deps.intermediate.writeTable(season.id, table);
  } else {
    await deps.intermediate.remove(season.id, 'table');
  }

  const statistics: StatRecord[] = [];
  const failedTeams: TeamId[] = [];
  for (const [i, records] of perTeam.entries()) {
    if (records) statistics.push(...records);
    else failedTeams.push(season.teams[i] ?? '');
  }
  await deps.intermediate.writeStatistics(season.id, statistics);

  logger.info(
    { season: season.id, tableRows: table?.length ?? 0, statRecords: statistics.length, failedTeams: failedTeams.length },
    'Season extracted',
  );
  return { season: season.id, table, statistics, failedTeams };
}

async function extractSeasonTable(deps: ExtractDeps, season: SeasonInfo): Promise<TableRow[] | null> {
  const target = createTarget(season.id, LEAGUE_ENTITY, 'table');
  const key = targetKey(target);
  try {
    const snapshot = await deps.snapshots.load(target);
    const result = extractTable(snapshot, deps.resolver);
    recordWarnings(deps.manifest, key, result.warnings);
    assertCompleteTable(result);

    const outsiders = result.rows.filter((row) => !season.teams.includes(row.team)).map((row) => row.team);
    if (outsiders.length > 0) {
      throw new DataQualityError(`League table for ${season.id} lists clubs outside the season`, outsiders);
    }

    deps.manifest.record('extract', key, 'succeeded', `${result.rows.length} rows`);
    return result.rows;
  } catch (err) {
    logger.error({ key, err: errorMessage(err) }, 'Table extraction failed');
    deps.manifest.record('extract', key, 'failed', errorMessage(err));
    return null;
  }
}

async function extractTeam(deps: ExtractDeps, season: SeasonId, team: TeamId): Promise<StatRecord[] | null> {
  const key = `${season}/statistics/${team}`;
  try {
    const targets = await deps.snapshots.listPages(season, 'statistics', team);
    if (targets.length === 0) {
      throw new NotFoundError(targetKey(createTarget(season, team, 'statistics')));
    }
    const snapshots = await Promise.all(targets.map((t) => deps.snapshots.load(t)));
    const result = extractStatistics(snapshots, deps.resolver, deps.registry);
    recordWarnings(deps.manifest, key, [
      ...(await uncapturedPages(deps, season, team, targets)),
      ...result.warnings,
    ]);
    deps.manifest.record('extract', key, 'succeeded', `${snapshots.length} page(s)`);
    return result.records;
  } catch (err) {
    logger.error({ key, err: errorMessage(err) }, 'Statistics extraction failed');
    deps.manifest.record('extract', key, 'failed', errorMessage(err));
    return null;
  }
}

/** Expected pages that were neither saved nor found absent by the scraper. */
async function uncapturedPages(
  deps: ExtractDeps,
  season: SeasonId,
  team: TeamId,
  saved: FetchTarget[],
): Promise<ExtractionWarning[]> {
  const warnings: ExtractionWarning[] = [];
  for (let page = 1; page <= deps.statsPages; page++) {
    if (saved.some((t) => t.page === page)) continue;
    if (await deps.snapshots.isAbsent(createTarget(season, team, 'statistics', page))) continue;
    warnings.push({
      code: 'missing_page',
      message: `Page ${page} was never captured, metrics found only there are null`,
      context: { season, team, page },
    });
  }
  return warnings;
}

function recordWarnings(manifest: RunManifest, key: string, warnings: ExtractionWarning[]): void {
  for (const warning of warnings) {
    logger.warn({ key, code: warning.code, ...warning.context }, warning.message);
    manifest.record('extract', key, 'warning', warning.message);
  }
}
