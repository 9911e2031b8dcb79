export type SeasonId = string;
export type TeamId = string;
export type PageCategory = 'table' | 'statistics';

/** Entity used for pages that cover the whole competition rather than one team. */
export const LEAGUE_ENTITY = 'league';

/** Identifies one page to retrieve. Doubles as the snapshot key. */
export interface FetchTarget {
  readonly season: SeasonId;
  /** A team id, or `league` for competition-wide pages */
  readonly entity: TeamId;
  readonly category: PageCategory;
  /** 1-based page index for paginated pages */
  readonly page: number;
}
