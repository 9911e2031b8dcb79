import { ContentNotFoundError, DataQualityError } from '../errors.js';
import type { TeamResolver } from '../pipeline/team-resolver.js';
import type { ExtractionWarning, TableRow } from '../types/records.js';
import type { Snapshot } from '../types/snapshot.js';
import type { SeasonId } from '../types/target.js';

/**
 * League table extractor.
 *
 * The table renders as flat, regular markup, so rows are recovered by
 * position with regular expressions rather than a DOM parser:
 *   - Body: tbody.league-table__tbody
 *   - Rows: tr.league-table__row (expandable detail rows are ignored)
 *   - Position: span.league-table__value
 *   - Names: span.league-table__team-name--long / --short
 *   - After the team cell, eight cells in table order:
 *     played, won, drawn, lost, goals for, goals against, goal difference,
 *     points (td.league-table__points)
 */

export const LEAGUE_SIZE = 20;

const TBODY_PATTERN = /<tbody class="league-table__tbody[^"]*">([\s\S]*?)<\/tbody>/;
const ROW_PATTERN = /<tr\b[^>]*class="[^"]*\bleague-table__row\b[^"]*"[^>]*>([\s\S]*?)<\/tr>/g;
const POSITION_PATTERN = /<span class="league-table__value value">\s*(\d+)\s*<\/span>/;
const LONG_NAME_PATTERN =
  /<span class="league-table__team-name league-table__team-name--long long">([\s\S]*?)<\/span>/;
const SHORT_NAME_PATTERN =
  /<span class="league-table__team-name league-table__team-name--short short">([\s\S]*?)<\/span>/;
const TEAM_CELL_END_PATTERN = /<\/a>\s*<\/td>/;
const POINTS_CELL_PATTERN = /<td class="league-table__points points">[\s\S]*?<\/td>/;
const CELL_PATTERN = /<td(?:\s+class="[^"]*")?>([\s\S]*?)<\/td>/g;
const SIGNED_INT_PATTERN = /^[+\-−]?\d+$/;

const NUMERIC_COLUMNS = [
  'played',
  'won',
  'drawn',
  'lost',
  'goalsFor',
  'goalsAgainst',
  'goalDifference',
  'points',
] as const;

type NumericColumn = (typeof NUMERIC_COLUMNS)[number];

export interface TableExtraction {
  season: SeasonId;
  rows: TableRow[];
  warnings: ExtractionWarning[];
}

export function extractTable(snapshot: Snapshot, resolver: TeamResolver): TableExtraction {
  const season = snapshot.target.season;
  const tbody = snapshot.html.match(TBODY_PATTERN)?.[1];
  if (tbody === undefined) {
    throw new ContentNotFoundError('tbody.league-table__tbody', `season ${season}`);
  }

  const rows: TableRow[] = [];
  const warnings: ExtractionWarning[] = [];
  let rowNumber = 0;

  for (const rowMatch of tbody.matchAll(ROW_PATTERN)) {
    rowNumber++;
    const rowHtml = rowMatch[1] ?? '';
    const context = { season, row: rowNumber };

    const longName = cleanText(rowHtml.match(LONG_NAME_PATTERN)?.[1] ?? '');
    const shortName = cleanText(rowHtml.match(SHORT_NAME_PATTERN)?.[1] ?? '');
    const team = (longName && resolver.resolve(longName)) || (shortName && resolver.resolve(shortName));
    if (!team) {
      warnings.push({
        code: 'unknown_team',
        message: `Row ${rowNumber}: team "${longName || shortName}" is not in the team list`,
        context,
      });
      continue;
    }

    const values = readNumericCells(rowHtml);
    if (!values) {
      warnings.push({
        code: 'malformed_row',
        message: `Row ${rowNumber} (${team}): expected ${NUMERIC_COLUMNS.length} numeric cells after the team name`,
        context: { ...context, team },
      });
      continue;
    }

    const positionText = rowHtml.match(POSITION_PATTERN)?.[1];
    const row: TableRow = {
      season,
      team,
      shortName,
      position: positionText ? parseInt(positionText, 10) : rowNumber,
      ...values,
    };

    const violation = checkInvariants(row);
    if (violation) {
      warnings.push({
        code: 'invariant_violation',
        message: `Row ${rowNumber} (${team}): ${violation}`,
        context: { ...context, team },
      });
      continue;
    }

    rows.push(row);
  }

  return { season, rows, warnings };
}

/**
 * A complete season has exactly one row per member club. Anything else is a
 * data-quality problem for the caller to surface, not to patch.
 */
export function assertCompleteTable(extraction: TableExtraction, expectedRows = LEAGUE_SIZE): void {
  const issues: string[] = [];
  if (extraction.rows.length !== expectedRows) {
    issues.push(`expected ${expectedRows} rows, got ${extraction.rows.length}`);
  }

  const teams = new Set<string>();
  const positions = new Set<number>();
  for (const row of extraction.rows) {
    if (teams.has(row.team)) issues.push(`team ${row.team} appears more than once`);
    if (positions.has(row.position)) issues.push(`position ${row.position} appears more than once`);
    teams.add(row.team);
    positions.add(row.position);
  }

  if (issues.length > 0) {
    throw new DataQualityError(`League table for ${extraction.season} is incomplete`, issues);
  }
}

export function checkInvariants(row: TableRow): string | null {
  if (row.won + row.drawn + row.lost !== row.played) {
    return `won + drawn + lost (${row.won + row.drawn + row.lost}) != played (${row.played})`;
  }
  if (row.goalsFor - row.goalsAgainst !== row.goalDifference) {
    return `goals for - goals against (${row.goalsFor - row.goalsAgainst}) != goal difference (${row.goalDifference})`;
  }
  return null;
}

function readNumericCells(rowHtml: string): Record<NumericColumn, number> | null {
  const teamCellEnd = rowHtml.match(TEAM_CELL_END_PATTERN);
  const pointsCell = rowHtml.match(POINTS_CELL_PATTERN);
  if (teamCellEnd?.index === undefined || pointsCell?.index === undefined) return null;

  const start = teamCellEnd.index + teamCellEnd[0].length;
  const end = pointsCell.index + pointsCell[0].length;
  if (end <= start) return null;

  const cells = Array.from(rowHtml.slice(start, end).matchAll(CELL_PATTERN), (m) => cleanText(m[1] ?? ''));
  if (cells.length !== NUMERIC_COLUMNS.length) return null;

  const values: Partial<Record<NumericColumn, number>> = {};
  for (const [i, column] of NUMERIC_COLUMNS.entries()) {
    const cell = cells[i] ?? '';
    if (!SIGNED_INT_PATTERN.test(cell)) return null;
    values[column] = parseInt(cell.replace('−', '-'), 10);
  }
  return isComplete(values) ? values : null;
}

function isComplete(values: Partial<Record<NumericColumn, number>>): values is Record<NumericColumn, number> {
  return NUMERIC_COLUMNS.every((column) => values[column] !== undefined);
}

function cleanText(html: string): string {
  return html.replace(/<[^>]+>/g, '').replace(/\s+/g, ' ').trim();
}
