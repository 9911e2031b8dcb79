import { LEAGUE_ENTITY, type FetchTarget, type PageCategory } from '../types/target.js';
import type { SeasonInfo } from '../types/reference.js';

export function createTarget(
  season: string,
  entity: string,
  category: PageCategory,
  page = 1,
): FetchTarget {
  if (!Number.isInteger(page) || page < 1) {
    throw new RangeError(`Page index must be a positive integer, got ${page}`);
  }
  if (!entity || entity.includes('/')) {
    throw new RangeError(`Invalid entity: "${entity}"`);
  }
  return Object.freeze({ season, entity, category, page });
}

/** Deterministic key, e.g. `2022_23/statistics/arsenal/2`. */
export function targetKey(target: FetchTarget): string {
  return `${target.season}/${target.category}/${target.entity}/${target.page}`;
}

/**
 * One league-table target per season, then `statsPages` statistics targets
 * for each of the season's member teams.
 */
export function buildScrapeTargets(seasons: SeasonInfo[], statsPages: number): FetchTarget[] {
  const targets: FetchTarget[] = [];
  for (const season of seasons) {
    targets.push(createTarget(season.id, LEAGUE_ENTITY, 'table'));
    for (const team of season.teams) {
      for (let page = 1; page <= statsPages; page++) {
        targets.push(createTarget(season.id, team, 'statistics', page));
      }
    }
  }
  return targets;
}
