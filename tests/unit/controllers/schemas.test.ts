/**
 * Tests for controller request schemas
 */

import { describe, it, expect } from 'vitest';
import {
  adjustDeadlineBody,
  atsResultParams,
  createPropBody,
  jobNameParams,
  propResultsBody,
  registerParticipantBody,
  seasonWeekParams,
  submitPickBody,
  submitPropPickBody,
  uuidString,
} from '../../../src/controllers/schemas';

const UUID = '550e8400-e29b-41d4-a716-446655440000';
const OTHER_UUID = '6fa459ea-ee8a-3ca4-894e-db77e160355e';

// ─────────────────────────────────────────────────────────────────────────────
// Params
// ─────────────────────────────────────────────────────────────────────────────

describe('uuidString', () => {
  it('accepts v3 and v4 UUIDs', () => {
    expect(uuidString.safeParse(UUID).success).toBe(true);
    expect(uuidString.safeParse(OTHER_UUID).success).toBe(true);
  });

  it('rejects plain strings and suffixed ids', () => {
    expect(uuidString.safeParse('game-1').success).toBe(false);
    expect(uuidString.safeParse(`${UUID}; DROP TABLE picks`).success).toBe(false);
  });
});

describe('atsResultParams', () => {
  it('requires both ids', () => {
    expect(atsResultParams.safeParse({ gameId: UUID, participantId: OTHER_UUID }).success).toBe(true);
    expect(atsResultParams.safeParse({ gameId: UUID }).success).toBe(false);
  });
});

describe('seasonWeekParams', () => {
  it('coerces path strings to numbers', () => {
    expect(seasonWeekParams.parse({ seasonYear: '2025', weekNumber: '23' })).toEqual({
      seasonYear: 2025,
      weekNumber: 23,
    });
  });

  it('bounds the week number to the Super Bowl', () => {
    expect(seasonWeekParams.safeParse({ seasonYear: '2025', weekNumber: '0' }).success).toBe(false);
    expect(seasonWeekParams.safeParse({ seasonYear: '2025', weekNumber: '24' }).success).toBe(false);
  });

  it('rejects fractional and implausible seasons', () => {
    expect(seasonWeekParams.safeParse({ seasonYear: '2025.5', weekNumber: '1' }).success).toBe(false);
    expect(seasonWeekParams.safeParse({ seasonYear: '1900', weekNumber: '1' }).success).toBe(false);
  });
});

describe('jobNameParams', () => {
  it('accepts only orchestrator job names', () => {
    expect(jobNameParams.safeParse({ jobName: 'import_odds_upcoming' }).success).toBe(true);
    expect(jobNameParams.safeParse({ jobName: 'drop_everything' }).success).toBe(false);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Bodies
// ─────────────────────────────────────────────────────────────────────────────

describe('registerParticipantBody', () => {
  it('trims both fields', () => {
    expect(registerParticipantBody.parse({ external_id: ' chat-1 ', display_name: ' Sam ' })).toEqual({
      external_id: 'chat-1',
      display_name: 'Sam',
    });
  });

  it('caps the display name length', () => {
    expect(registerParticipantBody.safeParse({ external_id: 'chat-1', display_name: 'x'.repeat(65) }).success).toBe(
      false,
    );
  });
});

describe('submitPickBody', () => {
  it('requires uuids and a team', () => {
    expect(submitPickBody.safeParse({ participant_id: UUID, game_id: OTHER_UUID, team: 'KC' }).success).toBe(true);
    expect(submitPickBody.safeParse({ participant_id: UUID, game_id: OTHER_UUID, team: ' ' }).success).toBe(false);
  });
});

describe('submitPropPickBody', () => {
  it('leaves the selection for the service to normalize', () => {
    expect(submitPropPickBody.parse({ participant_id: UUID, prop_id: OTHER_UUID, selection: 'over' }).selection).toBe(
      'over',
    );
  });
});

describe('createPropBody', () => {
  it('accepts the two outcome domains only', () => {
    expect(createPropBody.safeParse({ description: 'Overtime?', outcome_domain: 'YES_NO' }).success).toBe(true);
    expect(createPropBody.safeParse({ description: 'Overtime?', outcome_domain: 'WIN_LOSS' }).success).toBe(false);
  });
});

describe('propResultsBody', () => {
  it('keys results by prop uuid', () => {
    expect(propResultsBody.parse({ results: { [UUID]: 'OVER' } })).toEqual({ results: { [UUID]: 'OVER' } });
  });

  it('rejects a non-uuid key', () => {
    expect(propResultsBody.safeParse({ results: { 'prop-1': 'OVER' } }).success).toBe(false);
  });
});

describe('adjustDeadlineBody', () => {
  it('accepts ISO timestamps with Z or an offset', () => {
    expect(adjustDeadlineBody.safeParse({ picks_deadline: '2025-09-07T17:00:00Z' }).success).toBe(true);
    expect(adjustDeadlineBody.safeParse({ picks_deadline: '2025-09-07T13:00:00-04:00' }).success).toBe(true);
  });

  it('rejects dates without a time', () => {
    expect(adjustDeadlineBody.safeParse({ picks_deadline: '2025-09-07' }).success).toBe(false);
  });
});
