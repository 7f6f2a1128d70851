/**
 * Against-the-spread scoring.
 *
 * margin = score(favorite) - score(underdog)
 *   margin > spread  → favorite covers
 *   margin = spread  → push
 *   margin < spread  → underdog covers
 *
 * A game that is not final, has no odds, or still has a placeholder team is
 * UNDECIDED. Malformed odds throw `DataIntegrityError` instead of grading.
 */

import { DataIntegrityError } from '../../errors';
import type { AtsOutcome, GameRecord } from '../../types/domain';
import { isApproximatelyEqual } from '../../utils/number';

export type ScorableGame = Pick<
  GameRecord,
  | 'game_id'
  | 'home_team'
  | 'away_team'
  | 'status'
  | 'home_score'
  | 'away_score'
  | 'favorite_team'
  | 'spread_pts'
  | 'unresolved_team'
>;

export type CoverOutcome =
  | { decided: false }
  | { decided: true; push: true; coveringTeam: null }
  | { decided: true; push: false; coveringTeam: string };

function assertValidSpread(game: ScorableGame, spread: number, favorite: string): void {
  if (!Number.isFinite(spread) || spread < 0) {
    throw new DataIntegrityError(`Malformed spread ${spread} on game ${game.game_id}`, 'game', game.game_id);
  }
  if (favorite !== game.home_team && favorite !== game.away_team) {
    throw new DataIntegrityError(
      `Favorite ${favorite} is not playing in game ${game.game_id}`,
      'game',
      game.game_id,
    );
  }
}

/**
 * Which side covered, or `{ decided: false }` while the game can't be graded.
 */
export function atsCoverOutcome(game: ScorableGame): CoverOutcome {
  const { spread_pts: spread, favorite_team: favorite } = game;
  if (spread !== null && favorite !== null) {
    assertValidSpread(game, spread, favorite);
  }
  if (
    game.status !== 'final' ||
    game.home_score === null ||
    game.away_score === null ||
    spread === null ||
    favorite === null ||
    game.unresolved_team
  ) {
    return { decided: false };
  }

  const favoriteIsHome = favorite === game.home_team;
  const favoriteScore = favoriteIsHome ? game.home_score : game.away_score;
  const underdogScore = favoriteIsHome ? game.away_score : game.home_score;
  const margin = favoriteScore - underdogScore;

  if (isApproximatelyEqual(margin, spread)) {
    return { decided: true, push: true, coveringTeam: null };
  }
  const underdog = favoriteIsHome ? game.away_team : game.home_team;
  return { decided: true, push: false, coveringTeam: margin > spread ? favorite : underdog };
}

export function scoreAtsPick(game: ScorableGame, selectedTeam: string): AtsOutcome {
  if (selectedTeam !== game.home_team && selectedTeam !== game.away_team) {
    throw new DataIntegrityError(
      `Pick for ${selectedTeam} does not match game ${game.game_id}`,
      'pick',
      game.game_id,
    );
  }
  const outcome = atsCoverOutcome(game);
  if (!outcome.decided) return 'UNDECIDED';
  if (outcome.push) return 'PUSH';
  return outcome.coveringTeam === selectedTeam ? 'WIN' : 'LOSS';
}
