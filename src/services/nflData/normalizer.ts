/**
 * ESPN event → canonical record conversion.
 */

import { DataIntegrityError } from '../../errors';
import type { GameStatus } from '../../types/domain';
import { normalizeNumber } from '../../utils/number';
import { coerceLegacy } from '../clock/clockService';
import type { EspnCompetitor, EspnEvent, EspnOdds } from './payloadSchemas';
import type { TeamDirectory, TeamResolution } from './teamDirectory';
import type { RawGame, RawOdds, RawScore } from './types';

export interface NormalizeContext {
  teams: TeamDirectory;
  legacyZone: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Status
// ─────────────────────────────────────────────────────────────────────────────

export function mapEspnStatus(status: EspnEvent['status']): GameStatus {
  const name = status?.type?.name?.toUpperCase() ?? '';
  if (name.includes('POSTPONED')) return 'postponed';
  if (name.includes('CANCELED') || name.includes('CANCELLED')) return 'canceled';

  switch (status?.type?.state) {
    case 'in':
      return 'in_progress';
    case 'post':
      return 'final';
    default:
      return 'scheduled';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Competitors
// ─────────────────────────────────────────────────────────────────────────────

interface Matchup {
  home: EspnCompetitor;
  away: EspnCompetitor;
}

function matchupOf(event: EspnEvent): Matchup {
  const competitors = event.competitions[0]?.competitors ?? [];
  const home = competitors.find((c) => c.homeAway === 'home');
  const away = competitors.find((c) => c.homeAway === 'away');
  if (!home || !away) {
    throw new DataIntegrityError(`Event ${event.id} is missing a home or away competitor`, 'event', event.id);
  }
  return { home, away };
}

function resolveCompetitor(competitor: EspnCompetitor, teams: TeamDirectory): TeamResolution {
  const team = competitor.team;
  return teams.resolveAny([team?.abbreviation, team?.displayName, team?.shortDisplayName, team?.name]);
}

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeGame(event: EspnEvent, ctx: NormalizeContext): RawGame {
  const { home, away } = matchupOf(event);
  const homeTeam = resolveCompetitor(home, ctx.teams);
  const awayTeam = resolveCompetitor(away, ctx.teams);

  return {
    kind: 'game',
    externalId: event.id,
    homeTeam: homeTeam.code,
    awayTeam: awayTeam.code,
    kickoffAt: coerceLegacy(event.date, ctx.legacyZone),
    status: mapEspnStatus(event.status),
    unresolvedTeam: !homeTeam.resolved || !awayTeam.resolved,
  };
}

function parseScore(value: EspnCompetitor['score']): number | null {
  const score = normalizeNumber(value, Number.NaN);
  return Number.isFinite(score) && score >= 0 ? score : null;
}

export function normalizeScore(event: EspnEvent): RawScore {
  const { home, away } = matchupOf(event);
  const status = mapEspnStatus(event.status);
  const started = status === 'in_progress' || status === 'final';

  return {
    kind: 'score',
    externalId: event.id,
    homeScore: started ? parseScore(home.score) : null,
    awayScore: started ? parseScore(away.score) : null,
    status,
  };
}

const PICK_EM = /^(even|pk|pick|pick'?em)$/i;
const DETAILS = /^\s*([A-Za-z][A-Za-z0-9. ]*?)\s*([+-]?\d+(?:\.\d+)?)\s*$/;

/**
 * Read the favorite and spread magnitude from a line such as "PIT -5.5".
 * A pick'em ("EVEN") has spread 0 and lists the home team as favorite.
 */
export function parseOddsLine(
  odds: EspnOdds,
  homeCode: string,
  awayCode: string,
  teams: TeamDirectory,
): { favoriteTeam: string; spreadPts: number } | null {
  const details = odds.details?.trim();
  if (details) {
    if (PICK_EM.test(details)) {
      return { favoriteTeam: homeCode, spreadPts: 0 };
    }
    const match = DETAILS.exec(details);
    if (match) {
      const [, team, line] = match;
      return { favoriteTeam: teams.resolve(team).code, spreadPts: Math.abs(Number(line)) };
    }
  }

  if (typeof odds.spread === 'number' && Number.isFinite(odds.spread)) {
    // ESPN's numeric spread is quoted from the home side: negative means home favored.
    let favoriteTeam = odds.spread <= 0 ? homeCode : awayCode;
    if (odds.homeTeamOdds?.favorite) favoriteTeam = homeCode;
    else if (odds.awayTeamOdds?.favorite) favoriteTeam = awayCode;
    return { favoriteTeam, spreadPts: Math.abs(odds.spread) };
  }

  return null;
}

export function normalizeOdds(event: EspnEvent, ctx: NormalizeContext): RawOdds | null {
  const odds = event.competitions[0]?.odds?.[0];
  if (!odds) return null;
  const { home, away } = matchupOf(event);
  const line = parseOddsLine(
    odds,
    resolveCompetitor(home, ctx.teams).code,
    resolveCompetitor(away, ctx.teams).code,
    ctx.teams,
  );
  if (!line) return null;
  return { kind: 'odds', externalId: event.id, ...line };
}
