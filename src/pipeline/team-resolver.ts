import type { TeamInfo } from '../types/reference.js';
import type { TeamId } from '../types/target.js';

/**
 * Lowercases, spells `&` as `and` and collapses whitespace, so that
 * "Brighton &amp; Hove Albion" on one page and "Brighton and Hove Albion" on
 * another resolve to the same team.
 */
export function normalizeTeamName(raw: string): string {
  return raw
    .replace(/&amp;/gi, '&')
    .replace(/&/g, ' and ')
    .replace(/[.']/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

export class TeamResolver {
  // normalized name/alias/short name -> team id
  private readonly aliasMap = new Map<string, TeamId>();

  constructor(teams: TeamInfo[]) {
    for (const team of teams) {
      for (const name of [team.id, team.name, team.shortName, ...team.aliases]) {
        const key = normalizeTeamName(name);
        const existing = this.aliasMap.get(key);
        if (existing && existing !== team.id) {
          throw new Error(`Alias "${name}" maps to both ${existing} and ${team.id}`);
        }
        this.aliasMap.set(key, team.id);
      }
    }
  }

  resolve(rawName: string): TeamId | null {
    return this.aliasMap.get(normalizeTeamName(rawName)) ?? null;
  }

  get aliasCount(): number {
    return this.aliasMap.size;
  }
}
