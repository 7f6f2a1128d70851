import { DataIntegrityError } from '../../errors';
import type { AtsOutcome, GameRecord, ParticipantRecord, PickRecord } from '../../types/domain';
import { scoreAtsPick } from './atsScoring';

export interface StandingRow {
  participantId: string;
  externalId: string;
  displayName: string;
  wins: number;
  losses: number;
  pushes: number;
}

export interface StandingsTally {
  rows: StandingRow[];
  /** Games skipped because their stored odds were malformed. */
  integrityErrors: DataIntegrityError[];
}

/**
 * Tally ATS records for every participant (zero rows included) over the
 * given games. Ordered by wins desc, then participant id.
 */
export function tallyStandings(
  participants: readonly ParticipantRecord[],
  games: readonly GameRecord[],
  picks: readonly PickRecord[],
): StandingsTally {
  const gamesById = new Map(games.map((game) => [game.game_id, game]));
  const rows = new Map<string, StandingRow>(
    participants.map((p) => [
      p.participant_id,
      {
        participantId: p.participant_id,
        externalId: p.external_id,
        displayName: p.display_name,
        wins: 0,
        losses: 0,
        pushes: 0,
      },
    ]),
  );
  const integrityErrors: DataIntegrityError[] = [];
  const failedGames = new Set<string>();

  for (const pick of picks) {
    const row = rows.get(pick.participant_id);
    const game = gamesById.get(pick.game_id);
    if (!row || !game || failedGames.has(game.game_id)) continue;

    let outcome: AtsOutcome;
    try {
      outcome = scoreAtsPick(game, pick.selected_team);
    } catch (err) {
      if (!(err instanceof DataIntegrityError)) throw err;
      if (err.entity === 'game') failedGames.add(game.game_id);
      integrityErrors.push(err);
      continue;
    }

    if (outcome === 'WIN') row.wins++;
    else if (outcome === 'LOSS') row.losses++;
    else if (outcome === 'PUSH') row.pushes++;
  }

  return { rows: sortStandings([...rows.values()]), integrityErrors };
}

export function sortStandings(rows: StandingRow[]): StandingRow[] {
  return rows.sort((a, b) => {
    if (a.wins !== b.wins) return b.wins - a.wins;
    if (a.participantId === b.participantId) return 0;
    return a.participantId < b.participantId ? -1 : 1;
  });
}
