import type { WeekRecord } from '../../types/domain';

/**
 * A pick is accepted strictly before kickoff. A submission at the kickoff
 * instant itself is rejected.
 */
export function acceptsPick(kickoff: Date, now: Date): boolean {
  return now.getTime() < kickoff.getTime();
}

/** Prop picks close at the week's picks deadline. */
export function acceptsPropPick(week: Pick<WeekRecord, 'picks_deadline'>, now: Date): boolean {
  return acceptsPick(week.picks_deadline, now);
}
