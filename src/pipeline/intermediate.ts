import fs from 'node:fs/promises';
import path from 'node:path';
import v8 from 'node:v8';
import { z } from 'zod';
import { NotFoundError } from '../errors.js';
import type { StatRecord, TableRow } from '../types/records.js';
import type { SeasonId } from '../types/target.js';

/**
 * Extracted tables between extraction and consolidation: one columnar frame
 * per season and category, in V8 serialization format.
 *   <root>/<season>/table.bin
 *   <root>/<season>/statistics.bin
 */

const FORMAT_VERSION = 1;

const int = z.number().int();

const tableFrameSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  kind: z.literal('table'),
  season: z.string(),
  columns: z.object({
    team: z.array(z.string()),
    shortName: z.array(z.string()),
    position: z.array(int),
    played: z.array(int),
    won: z.array(int),
    drawn: z.array(int),
    lost: z.array(int),
    goalsFor: z.array(int),
    goalsAgainst: z.array(int),
    goalDifference: z.array(int),
    points: z.array(int),
  }),
});

const statisticsFrameSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  kind: z.literal('statistics'),
  season: z.string(),
  columns: z.object({
    team: z.array(z.string()),
    metric: z.array(z.string()),
    value: z.array(z.number().nullable()),
  }),
});

type TableFrame = z.infer<typeof tableFrameSchema>;
type StatisticsFrame = z.infer<typeof statisticsFrameSchema>;

export class IntermediateStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  framePath(season: SeasonId, kind: 'table' | 'statistics'): string {
    return path.join(this.rootDir, season, `${kind}.bin`);
  }

  async writeTable(season: SeasonId, rows: TableRow[]): Promise<string> {
    const frame: TableFrame = {
      version: FORMAT_VERSION,
      kind: 'table',
      season,
      columns: {
        team: rows.map((r) => r.team),
        shortName: rows.map((r) => r.shortName),
        position: rows.map((r) => r.position),
        played: rows.map((r) => r.played),
        won: rows.map((r) => r.won),
        drawn: rows.map((r) => r.drawn),
        lost: rows.map((r) => r.lost),
        goalsFor: rows.map((r) => r.goalsFor),
        goalsAgainst: rows.map((r) => r.goalsAgainst),
        goalDifference: rows.map((r) => r.goalDifference),
        points: rows.map((r) => r.points),
      },
    };
    return this.writeFrame(this.framePath(season, 'table'), frame);
  }

  async writeStatistics(season: SeasonId, records: StatRecord[]): Promise<string> {
    const frame: StatisticsFrame = {
      version: FORMAT_VERSION,
      kind: 'statistics',
      season,
      columns: {
        team: records.map((r) => r.team),
        metric: records.map((r) => r.metric),
        value: records.map((r) => r.value),
      },
    };
    return this.writeFrame(this.framePath(season, 'statistics'), frame);
  }

  async readTable(season: SeasonId): Promise<TableRow[]> {
    const frame = tableFrameSchema.parse(await this.readFrame(this.framePath(season, 'table')));
    const { columns: c } = frame;
    assertEqualLengths(frame.season, c);
    return c.team.map((team, i) => ({
      season: frame.season,
      team,
      shortName: at(c.shortName, i),
      position: at(c.position, i),
      played: at(c.played, i),
      won: at(c.won, i),
      drawn: at(c.drawn, i),
      lost: at(c.lost, i),
      goalsFor: at(c.goalsFor, i),
      goalsAgainst: at(c.goalsAgainst, i),
      goalDifference: at(c.goalDifference, i),
      points: at(c.points, i),
    }));
  }

  async readStatistics(season: SeasonId): Promise<StatRecord[]> {
    const frame = statisticsFrameSchema.parse(await this.readFrame(this.framePath(season, 'statistics')));
    const { columns: c } = frame;
    assertEqualLengths(frame.season, c);
    return c.team.map((team, i) => ({
      season: frame.season,
      team,
      metric: at(c.metric, i),
      value: at(c.value, i),
    }));
  }

  /** Drops a frame left by an earlier run so it cannot stand in for a failed extraction. */
  async remove(season: SeasonId, kind: 'table' | 'statistics'): Promise<void> {
    await fs.rm(this.framePath(season, kind), { force: true });
  }

  private async writeFrame(filePath: string, frame: TableFrame | StatisticsFrame): Promise<string> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, v8.serialize(frame));
    return filePath;
  }

  private async readFrame(filePath: string): Promise<unknown> {
    try {
      return v8.deserialize(await fs.readFile(filePath));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new NotFoundError(path.relative(this.rootDir, filePath), { cause: err });
      }
      throw err;
    }
  }
}

function assertEqualLengths(season: string, columns: Record<string, unknown[]>): void {
  const lengths = new Set(Object.values(columns).map((col) => col.length));
  if (lengths.size > 1) {
    throw new Error(`Intermediate frame for ${season} has columns of different lengths`);
  }
}

function at<T>(column: T[], i: number): T {
  const value = column[i];
  if (value === undefined) throw new RangeError(`Column index ${i} out of range`);
  return value;
}
