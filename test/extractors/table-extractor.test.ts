import { describe, it, expect } from 'vitest';
import { ContentNotFoundError, DataQualityError } from '../../src/errors.js';
import {
  assertCompleteTable,
  checkInvariants,
  extractTable,
} from '../../src/extractors/table-extractor.js';
import { TeamResolver } from '../../src/pipeline/team-resolver.js';
import { teams } from '../../src/reference/index.js';
import { loadFixture, snapshotOf } from '../helpers/fixture-loader.js';

describe('extractTable', () => {
  const resolver = new TeamResolver(teams);
  const html = loadFixture('table', '2022_23.html');
  const extract = (source: string) => extractTable(snapshotOf(source, '2022_23', 'league', 'table'), resolver);

  it('should recover all 20 rows with distinct teams', () => {
    const result = extract(html);

    expect(result.season).toBe('2022_23');
    expect(result.warnings).toEqual([]);
    expect(result.rows).toHaveLength(20);
    expect(new Set(result.rows.map((r) => r.team)).size).toBe(20);
    expect(() => assertCompleteTable(result)).not.toThrow();
  });

  it('should satisfy the standings invariants on every row', () => {
    for (const row of extract(html).rows) {
      expect(row.won + row.drawn + row.lost).toBe(row.played);
      expect(row.goalsFor - row.goalsAgainst).toBe(row.goalDifference);
    }
  });

  it('should decode every column in table order', () => {
    const brighton = extract(html).rows.find((r) => r.team === 'brighton');
    expect(brighton).toEqual({
      season: '2022_23',
      team: 'brighton',
      shortName: 'BHA',
      position: 6,
      played: 38,
      won: 22,
      drawn: 4,
      lost: 12,
      goalsFor: 75,
      goalsAgainst: 40,
      goalDifference: 35,
      points: 70,
    });
  });

  it('should read negative goal differences', () => {
    const westHam = extract(html).rows.find((r) => r.team === 'west-ham');
    expect(westHam?.position).toBe(14);
    expect(westHam?.goalDifference).toBe(-5);
  });

  it('should resolve abbreviated club names through aliases', () => {
    const teamsFound = extract(html).rows.map((r) => r.team);
    expect(teamsFound).toContain('nottingham-forest');
    expect(teamsFound).toContain('bournemouth');
  });

  it('should skip a row with the wrong column count and warn about it', () => {
    const result = extract(html.replace('<td>26</td> <td>5</td>', '<td>26</td>'));

    expect(result.rows).toHaveLength(19);
    expect(result.rows.some((r) => r.team === 'arsenal')).toBe(false);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatchObject({
      code: 'malformed_row',
      context: { season: '2022_23', row: 2, team: 'arsenal' },
    });
  });

  it('should leave the incomplete season for the caller to reject', () => {
    const result = extract(html.replace('<td>26</td> <td>5</td>', '<td>26</td>'));
    expect(() => assertCompleteTable(result)).toThrow(DataQualityError);
  });

  it('should skip a row whose numbers contradict each other', () => {
    const result = extract(
      html.replace(
        '<td>5</td> <td class="league-table__points points">53</td>',
        '<td>6</td> <td class="league-table__points points">53</td>',
      ),
    );

    expect(result.rows).toHaveLength(19);
    expect(result.warnings.map((w) => w.code)).toEqual(['invariant_violation']);
    expect(result.warnings[0]?.context.team).toBe('chelsea');
  });

  it('should skip a row for a club outside the team list', () => {
    const result = extract(html.replace('>Leeds United<', '>Sunderland<').replace('>LEE<', '>SUN<'));

    expect(result.rows).toHaveLength(19);
    expect(result.warnings.map((w) => w.code)).toEqual(['unknown_team']);
  });

  it('should fail when the table body is missing', () => {
    expect(() => extract('<html><body><p>Maintenance</p></body></html>')).toThrow(ContentNotFoundError);
  });
});

describe('assertCompleteTable', () => {
  const row = {
    season: '2022_23',
    team: 'arsenal',
    shortName: 'ARS',
    position: 1,
    played: 38,
    won: 26,
    drawn: 6,
    lost: 6,
    goalsFor: 88,
    goalsAgainst: 43,
    goalDifference: 45,
    points: 84,
  };

  it('should list every problem found', () => {
    expect(() =>
      assertCompleteTable({ season: '2022_23', rows: [row, { ...row }], warnings: [] }, 2),
    ).toThrow('team arsenal appears more than once; position 1 appears more than once');
  });

  it('should accept a custom league size', () => {
    expect(() =>
      assertCompleteTable({ season: '2022_23', rows: [row, { ...row, team: 'chelsea', position: 2 }], warnings: [] }, 2),
    ).not.toThrow();
  });
});

describe('checkInvariants', () => {
  it('should describe the broken invariant', () => {
    const message = checkInvariants({
      season: '2022_23',
      team: 'arsenal',
      shortName: 'ARS',
      position: 1,
      played: 38,
      won: 26,
      drawn: 6,
      lost: 7,
      goalsFor: 88,
      goalsAgainst: 43,
      goalDifference: 45,
      points: 84,
    });
    expect(message).toBe('won + drawn + lost (39) != played (38)');
  });
});
