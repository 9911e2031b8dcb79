import type { PageCategory } from '../types/target.js';
import type { PageProfile } from '../types/profile.js';

export interface SiteUrls {
  tableUrl: string;
  /** Contains a `{team}` placeholder */
  statsUrl: string;
}

/**
 * League table:
 *   - Season picked from the third dropdown in the filter bar
 *   - Rows render inside tbody.league-table__tbody once the season loads
 *
 * Club statistics:
 *   - One page per club, season picked from the mobile filter dropdown
 *   - Metric blocks (div.normalStat) live in .statsTableContainer, split over
 *     pages reached through .paginationNextContainer
 */
export function createSiteProfiles(urls: SiteUrls): Record<PageCategory, PageProfile> {
  return {
    table: {
      category: 'table',
      url: () => urls.tableUrl,
      seasonDropdown: {
        trigger: '.dropDown:nth-child(3) > .current',
        option: (position) => `.open li:nth-child(${position})`,
        content: '.league-table__tbody',
      },
      readyMarker: '.league-table__tbody',
    },
    statistics: {
      category: 'statistics',
      url: (target) => urls.statsUrl.replace('{team}', encodeURIComponent(target.entity)),
      seasonDropdown: {
        trigger: '.mobile > .current',
        option: (position) => `.mobile li:nth-child(${position})`,
        content: '.statsTableContainer',
      },
      readyMarker: '.statsTableContainer',
      pagination: {
        next: '.paginationNextContainer',
        content: '.statsTableContainer',
        revealScrollPx: 800,
      },
    },
  };
}
