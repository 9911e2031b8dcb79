import fs from 'node:fs';
import { z } from 'zod';
import type { MetricDefinition, SeasonInfo, TeamInfo } from '../types/reference.js';

const DATA_DIR = new URL('../../data/', import.meta.url);

const seasonSchema = z.object({
  id: z.string().regex(/^\d{4}_\d{2}$/),
  dropdownIndex: z.number().int().positive(),
  teams: z.array(z.string().min(1)).length(20),
});

const teamSchema = z.object({
  id: z.string().regex(/^[a-z0-9-]+$/),
  name: z.string().min(1),
  shortName: z.string().length(3),
  aliases: z.array(z.string()),
});

const metricSchema = z.object({
  id: z.string().regex(/^[a-z_]+$/),
  label: z.string().min(1),
  perGame: z.boolean(),
  duplicates: z.enum(['won', 'lost', 'goalsFor', 'goalsAgainst']).optional(),
});

function readData<T>(filename: string, schema: z.ZodType<T>): T {
  const raw = fs.readFileSync(new URL(filename, DATA_DIR), 'utf-8');
  return schema.parse(JSON.parse(raw));
}

export const seasons: SeasonInfo[] = readData('seasons.json', z.array(seasonSchema));
export const teams: TeamInfo[] = readData('teams.json', z.array(teamSchema));
export const metrics: MetricDefinition[] = readData('metrics.json', z.array(metricSchema));

export function getSeason(id: string): SeasonInfo {
  const season = seasons.find((s) => s.id === id);
  if (!season) throw new Error(`Unknown season: ${id}`);
  return season;
}

export function getTeam(id: string): TeamInfo {
  const team = teams.find((t) => t.id === id);
  if (!team) throw new Error(`Unknown team: ${id}`);
  return team;
}
