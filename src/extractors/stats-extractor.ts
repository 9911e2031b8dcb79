import * as cheerio from 'cheerio';
import { ContentNotFoundError, InconsistentExtractionError } from '../errors.js';
import type { TeamResolver } from '../pipeline/team-resolver.js';
import type { ExtractionWarning, MetricId, StatRecord } from '../types/records.js';
import type { Snapshot } from '../types/snapshot.js';
import type { SeasonId, TeamId } from '../types/target.js';
import type { MetricRegistry } from './metric-registry.js';

/**
 * Club statistics extractor.
 *
 * Labels and values are interleaved in nested elements, so rows are found by
 * structure with cheerio:
 *   - Heading: .club-stats__team (club name, optional)
 *   - Metric: div.normalStat > span.stat, label is the span's own text
 *   - Value: span.allStatContainer inside the label span, e.g. "1,234" or "45%"
 */

const METRIC_SELECTOR = '.normalStat > .stat';
const VALUE_SELECTOR = '.allStatContainer';
const TEAM_HEADING_SELECTOR = '.club-stats__team';

export interface StatisticsExtraction {
  season: SeasonId;
  team: TeamId;
  records: StatRecord[];
  warnings: ExtractionWarning[];
}

interface Observation {
  value: number | null;
  page: number;
}

/**
 * Strips thousands separators and decoration around the number.
 * Returns null when no number is present.
 */
export function parseStatValue(text: string): number | null {
  const match = text.replace(/,/g, '').match(/-?\d+(?:\.\d+)?/);
  return match ? Number(match[0]) : null;
}

/**
 * Extracts one team/season from every saved page of it. All metrics of the
 * registry are returned, in registry order; those no page shows are null.
 */
export function extractStatistics(
  snapshots: Snapshot[],
  resolver: TeamResolver,
  registry: MetricRegistry,
): StatisticsExtraction {
  const [first] = snapshots;
  if (!first) throw new RangeError('No statistics snapshots given');

  const { season, entity: team } = first.target;
  const key = `${season}/${team}`;
  const warnings: ExtractionWarning[] = [];
  const observed = new Map<MetricId, Observation>();

  for (const snapshot of snapshots) {
    const { target } = snapshot;
    if (target.category !== 'statistics' || target.season !== season || target.entity !== team) {
      throw new InconsistentExtractionError(
        key,
        `snapshot ${target.season}/${target.category}/${target.entity}/${target.page} belongs elsewhere`,
      );
    }

    const $ = cheerio.load(snapshot.html);
    const page = target.page;

    const heading = $(TEAM_HEADING_SELECTOR).first().text().trim();
    if (heading) {
      const headingTeam = resolver.resolve(heading);
      if (headingTeam === null) {
        warnings.push({
          code: 'unknown_team',
          message: `Page ${page} heading "${heading}" is not in the team list`,
          context: { season, team, page },
        });
      } else if (headingTeam !== team) {
        throw new InconsistentExtractionError(key, `page ${page} shows statistics for ${headingTeam}`);
      }
    }

    const rows = $(METRIC_SELECTOR).filter((_i, el) => $(el).find(VALUE_SELECTOR).length > 0);
    if (rows.length === 0) {
      throw new ContentNotFoundError(`${METRIC_SELECTOR} ${VALUE_SELECTOR}`, `${key} page ${page}`);
    }

    rows.each((_i, el) => {
      const row = $(el);
      const label = row
        .contents()
        .filter((_j, node) => node.type === 'text')
        .text()
        .replace(/\s+/g, ' ')
        .trim();

      const def = registry.lookup(label);
      if (!def) {
        warnings.push({
          code: 'unknown_metric',
          message: `Page ${page}: unrecognised metric "${label}"`,
          context: { season, team, page },
        });
        return;
      }

      const rawValue = row.find(VALUE_SELECTOR).first().text().trim();
      const value = parseStatValue(rawValue);
      if (value === null && rawValue !== '') {
        warnings.push({
          code: 'missing_value',
          message: `Page ${page}: ${def.id} shows "${rawValue}", recorded as null`,
          context: { season, team, page },
        });
      }

      const previous = observed.get(def.id);
      if (!previous) {
        observed.set(def.id, { value, page });
      } else if (previous.value !== value) {
        throw new InconsistentExtractionError(
          key,
          `${def.id} is ${previous.value} on page ${previous.page} but ${value} on page ${page}`,
        );
      }
    });
  }

  const records: StatRecord[] = registry.ids.map((metric) => ({
    season,
    team,
    metric,
    value: observed.get(metric)?.value ?? null,
  }));

  return { season, team, records, warnings };
}
