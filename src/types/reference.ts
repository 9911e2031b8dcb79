import type { MetricId, TableRow } from './records.js';
import type { SeasonId, TeamId } from './target.js';

export interface SeasonInfo {
  id: SeasonId;
  /** 1-based position among the dropdown's seasons; the list opens with an "all seasons" entry */
  dropdownIndex: number;
  teams: TeamId[];
}

export interface TeamInfo {
  id: TeamId;
  name: string;
  shortName: string;
  aliases: string[];
}

export interface MetricDefinition {
  id: MetricId;
  /** Label as rendered on the statistics page */
  label: string;
  perGame: boolean;
  /** Standings column this metric repeats, if any */
  duplicates?: keyof TableRow;
}
