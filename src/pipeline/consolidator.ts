import fs from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import { DataQualityError } from '../errors.js';
import type { MetricRegistry } from '../extractors/metric-registry.js';
import type {
  ConsolidatedRecord,
  MetricId,
  StatRecord,
  TableRow,
  Tier,
} from '../types/records.js';
import type { MetricDefinition } from '../types/reference.js';

const TIERS: ReadonlyArray<{ tier: Tier; lastPosition: number }> = [
  { tier: 'top', lastPosition: 4 },
  { tier: 'upper', lastPosition: 10 },
  { tier: 'lower', lastPosition: 17 },
  { tier: 'bottom', lastPosition: Number.POSITIVE_INFINITY },
];

const STANDINGS_COLUMNS = [
  'position',
  'played',
  'won',
  'drawn',
  'lost',
  'goalsFor',
  'goalsAgainst',
  'goalDifference',
  'points',
] as const;

export function tierFor(position: number): Tier {
  if (!Number.isInteger(position) || position < 1) {
    throw new RangeError(`Invalid league position: ${position}`);
  }
  const match = TIERS.find((t) => position <= t.lastPosition);
  return match ? match.tier : 'bottom';
}

export function perGame(value: number | null, played: number): number | null {
  if (value === null || played === 0) return null;
  return value / played;
}

/** Metrics that end up as columns: those not repeating a standings column. */
export function exportedMetrics(registry: MetricRegistry): MetricDefinition[] {
  return registry.definitions.filter((d) => d.duplicates === undefined);
}

function joinKey(team: string, season: string): string {
  return `${season}/${team}`;
}

/**
 * Joins standings with statistics on (team, season). Every key must exist on
 * both sides: an unmatched key means an extraction went wrong upstream, so
 * the whole run fails rather than exporting a partial dataset.
 */
export function consolidate(
  tableRows: TableRow[],
  statRecords: StatRecord[],
  registry: MetricRegistry,
): ConsolidatedRecord[] {
  const issues: string[] = [];

  const tableByKey = new Map<string, TableRow>();
  for (const row of tableRows) {
    const key = joinKey(row.team, row.season);
    if (tableByKey.has(key)) issues.push(`${key} has more than one table row`);
    tableByKey.set(key, row);
  }

  const statsByKey = new Map<string, Map<MetricId, number | null>>();
  for (const record of statRecords) {
    const key = joinKey(record.team, record.season);
    let values = statsByKey.get(key);
    if (!values) {
      values = new Map();
      statsByKey.set(key, values);
    }
    if (values.has(record.metric)) issues.push(`${key} has more than one value for ${record.metric}`);
    values.set(record.metric, record.value);
  }

  for (const key of tableByKey.keys()) {
    if (!statsByKey.has(key)) issues.push(`${key} has a table row but no statistics`);
  }
  for (const key of statsByKey.keys()) {
    if (!tableByKey.has(key)) issues.push(`${key} has statistics but no table row`);
  }

  if (issues.length > 0) {
    throw new DataQualityError('Standings and statistics do not line up', issues);
  }

  const columns = exportedMetrics(registry);
  const records: ConsolidatedRecord[] = [];

  for (const [key, row] of tableByKey) {
    const values = statsByKey.get(key) ?? new Map<MetricId, number | null>();
    const metrics: Record<MetricId, number | null> = {};
    for (const def of columns) {
      const value = values.get(def.id) ?? null;
      metrics[def.id] = def.perGame ? perGame(value, row.played) : value;
    }

    // Position, played, drawn, goal difference and points stay season totals
    records.push({
      season: row.season,
      team: row.team,
      shortName: row.shortName,
      position: row.position,
      played: row.played,
      won: perGame(row.won, row.played),
      drawn: row.drawn,
      lost: perGame(row.lost, row.played),
      goalsFor: perGame(row.goalsFor, row.played),
      goalsAgainst: perGame(row.goalsAgainst, row.played),
      goalDifference: row.goalDifference,
      points: row.points,
      metrics,
      tier: tierFor(row.position),
    });
  }

  return records.sort((a, b) => a.season.localeCompare(b.season) || a.team.localeCompare(b.team));
}

export function csvHeader(registry: MetricRegistry): string[] {
  return ['season', 'team', 'shortName', ...STANDINGS_COLUMNS, ...exportedMetrics(registry).map((d) => d.id), 'tier'];
}

/** Semicolon-delimited, one row per team/season, empty cells for nulls. */
export function toCsv(records: ConsolidatedRecord[], registry: MetricRegistry): string {
  const metricIds = exportedMetrics(registry).map((d) => d.id);
  const data = records.map((r) => [
    r.season,
    r.team,
    r.shortName,
    ...STANDINGS_COLUMNS.map((column) => r[column]),
    ...metricIds.map((id) => r.metrics[id] ?? null),
    r.tier,
  ]);
  return Papa.unparse({ fields: csvHeader(registry), data }, { delimiter: ';', newline: '\n' });
}

export async function exportCsv(
  records: ConsolidatedRecord[],
  registry: MetricRegistry,
  filePath: string,
): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, toCsv(records, registry), 'utf-8');
}
