/**
 * Canonical NFL team codes.
 *
 * The feed names teams inconsistently (abbreviation, full name, nickname,
 * or a conference placeholder before playoff matchups are set). Everything
 * recognised maps to one code; anything else passes through verbatim and
 * is reported as unresolved.
 */

import { z } from 'zod';
import teamData from '../../data/nflTeams.json';

const teamTableSchema = z.object({
  placeholders: z.array(z.string()),
  teams: z.array(
    z.object({
      code: z.string().min(1),
      name: z.string().min(1),
      aliases: z.array(z.string()),
    }),
  ),
});

export type TeamTable = z.infer<typeof teamTableSchema>;

export type TeamResolution =
  | { resolved: true; code: string; name: string }
  | { resolved: false; code: string; placeholder: boolean };

function keyOf(value: string): string {
  return value.trim().toLowerCase();
}

export class TeamDirectory {
  private readonly byKey = new Map<string, { code: string; name: string }>();
  private readonly placeholders: Set<string>;

  constructor(table: TeamTable) {
    for (const team of table.teams) {
      const entry = { code: team.code, name: team.name };
      for (const key of [team.code, team.name, ...team.aliases]) {
        this.byKey.set(keyOf(key), entry);
      }
    }
    this.placeholders = new Set(table.placeholders.map(keyOf));
  }

  resolve(value: string): TeamResolution {
    const trimmed = value.trim();
    const hit = this.byKey.get(keyOf(trimmed));
    if (hit) {
      return { resolved: true, code: hit.code, name: hit.name };
    }
    return { resolved: false, code: trimmed, placeholder: this.placeholders.has(keyOf(trimmed)) };
  }

  /**
   * Resolve the first candidate that maps to a known team, else fall back to
   * the first non-empty candidate unresolved.
   */
  resolveAny(candidates: ReadonlyArray<string | null | undefined>): TeamResolution {
    const present = candidates.filter((c): c is string => typeof c === 'string' && c.trim().length > 0);
    for (const candidate of present) {
      const resolution = this.resolve(candidate);
      if (resolution.resolved) return resolution;
    }
    return this.resolve(present[0] ?? 'TBD');
  }

  nameOf(code: string): string {
    return this.byKey.get(keyOf(code))?.name ?? code;
  }

  get size(): number {
    return new Set([...this.byKey.values()].map((entry) => entry.code)).size;
  }
}

let defaultDirectory: TeamDirectory | null = null;

export function getTeamDirectory(): TeamDirectory {
  if (!defaultDirectory) {
    defaultDirectory = new TeamDirectory(teamTableSchema.parse(teamData));
  }
  return defaultDirectory;
}
