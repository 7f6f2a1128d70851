/**
 * NFL data: ESPN scoreboard feed, payload validation and team codes.
 */

export { NflFeedService, toScoreboardQuery, toSeasonContext } from './nflFeedService';
export { mapEspnStatus, normalizeGame, normalizeOdds, normalizeScore, parseOddsLine } from './normalizer';
export { TeamDirectory, getTeamDirectory, type TeamResolution } from './teamDirectory';
export type * from './types';
