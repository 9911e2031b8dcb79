import type { SeasonId, TeamId } from './target.js';

/** One team's league standing for one season. */
export interface TableRow {
  season: SeasonId;
  team: TeamId;
  shortName: string;
  position: number;
  played: number;
  won: number;
  drawn: number;
  lost: number;
  goalsFor: number;
  goalsAgainst: number;
  goalDifference: number;
  points: number;
}

export type MetricId = string;

/** One (team, season, metric) observation. `null` means the site showed no value. */
export interface StatRecord {
  season: SeasonId;
  team: TeamId;
  metric: MetricId;
  value: number | null;
}

export type WarningCode =
  | 'malformed_row'
  | 'invariant_violation'
  | 'unknown_team'
  | 'unknown_metric'
  | 'missing_value'
  | 'missing_page';

/** Soft extraction problem: reported, never thrown. */
export interface ExtractionWarning {
  code: WarningCode;
  message: string;
  context: Record<string, string | number>;
}

export type Tier = 'top' | 'upper' | 'lower' | 'bottom';

/** Joined per-(team, season) row, per-game normalized. */
export interface ConsolidatedRecord {
  season: SeasonId;
  team: TeamId;
  shortName: string;
  position: number;
  played: number;
  won: number | null;
  drawn: number;
  lost: number | null;
  goalsFor: number | null;
  goalsAgainst: number | null;
  goalDifference: number;
  points: number;
  metrics: Record<MetricId, number | null>;
  tier: Tier;
}
