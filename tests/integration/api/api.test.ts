/**
 * Integration Tests: HTTP API
 *
 * Drives the full middleware stack from `createApp` against the in-memory
 * store. Health checks are injected; nothing touches Redis or Supabase.
 */

import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../../../src/app';
import type { HealthStatus } from '../../../src/infrastructure/healthCheck';
import { fixedClock } from '../../../src/services/clock/clockService';
import { getTeamDirectory } from '../../../src/services/nflData/teamDirectory';
import { PicksService } from '../../../src/services/picks/picksService';
import { JobRunner } from '../../../src/services/sync/jobRunner';
import { makeGame, makeParticipant, makeProp, makePropPick, makeWeek, testConfig } from '../../fixtures/factories';
import { jobHarness, silentLogger } from '../../helpers/fakes';

const WEEK_ID = '11111111-1111-4111-8111-111111111111';
const GAME_ID = '22222222-2222-4222-8222-222222222222';
const PARTICIPANT_ID = '33333333-3333-4333-8333-333333333333';
const PROP_ID = '44444444-4444-4444-8444-444444444444';
const PLACEHOLDER_GAME_ID = '77777777-7777-4777-8777-777777777777';

const NOW = new Date('2025-09-06T12:00:00.000Z');
const ADMIN = 'Bearer test-secret';

function healthy(status: HealthStatus['status'] = 'healthy'): () => Promise<HealthStatus> {
  return async () => ({
    status,
    timestamp: '2025-09-06T12:00:00.000Z',
    uptime: 42,
    checks: {
      redis: { ok: status !== 'unhealthy', latencyMs: 1 },
      supabase: { ok: true, latencyMs: 3 },
    },
  });
}

function buildApp(options: { adminApiToken?: string | null; health?: HealthStatus['status'] } = {}) {
  const config = testConfig({ adminApiToken: options.adminApiToken });
  const h = jobHarness(NOW, config);
  h.store
    .seedWeek(makeWeek({ week_id: WEEK_ID }), [
      makeGame({ game_id: GAME_ID, kickoff_at: new Date('2025-09-07T17:00:00.000Z') }),
    ])
    .seedParticipants(makeParticipant({ participant_id: PARTICIPANT_ID }));

  const { clock, store, provider, anomalies, participants } = h.ctx;
  const picksService = new PicksService(store, fixedClock(NOW), getTeamDirectory(), silentLogger());
  const jobRunner = new JobRunner({ config, clock, store, provider, anomalies, participants });
  const app = createApp({ config, picksService, jobRunner, healthCheck: healthy(options.health) });
  return { app, store: h.store };
}

describe('HTTP API', () => {
  // ─── Operational endpoints ────────────────────────────────────────────────

  describe('GET /health', () => {
    it('answers 200 while healthy or degraded', async () => {
      const ok = await request(buildApp().app).get('/health');
      expect(ok.status).toBe(200);
      expect(ok.body.status).toBe('healthy');

      const degraded = await request(buildApp({ health: 'degraded' }).app).get('/health');
      expect(degraded.status).toBe(200);
    });

    it('answers 503 when unhealthy', async () => {
      const response = await request(buildApp({ health: 'unhealthy' }).app).get('/health');
      expect(response.status).toBe(503);
      expect(response.body.checks.redis).toEqual({ ok: false, latencyMs: 1 });
    });
  });

  it('GET /metrics exposes Prometheus text', async () => {
    const response = await request(buildApp().app).get('/metrics');
    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/^text\/plain/);
    expect(response.text).toContain('# TYPE atspool_pick_submissions_total counter');
  });

  it('echoes an incoming X-Request-ID on success and in error bodies', async () => {
    const { app } = buildApp();

    const ok = await request(app).get('/health').set('X-Request-ID', 'req-123');
    expect(ok.headers['x-request-id']).toBe('req-123');

    const missing = await request(app).get('/api/nope').set('X-Request-ID', 'req-456');
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: 'Cannot GET /api/nope', code: 'NOT_FOUND', requestId: 'req-456' });
  });

  it('generates a request id when none is sent', async () => {
    const response = await request(buildApp().app).get('/health');
    expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  // ─── Participants & picks ─────────────────────────────────────────────────

  describe('POST /api/participants', () => {
    it('registers a participant', async () => {
      const response = await request(buildApp().app)
        .post('/api/participants')
        .send({ external_id: ' chat-900 ', display_name: 'Jordan' });

      expect(response.status).toBe(201);
      expect(response.body.participant).toMatchObject({
        participant_id: '00000000-0000-4000-8000-000000000001',
        external_id: 'chat-900',
        display_name: 'Jordan',
      });
    });

    it('rejects a blank display name', async () => {
      const response = await request(buildApp().app)
        .post('/api/participants')
        .send({ external_id: 'chat-900', display_name: '   ' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.details[0].field).toBe('display_name');
    });
  });

  describe('POST /api/picks', () => {
    it('accepts a pick with 201 and refuses the repeat with 409', async () => {
      const { app } = buildApp();
      const body = { participant_id: PARTICIPANT_ID, game_id: GAME_ID, team: 'kc' };

      const first = await request(app).post('/api/picks').send(body);
      expect(first.status).toBe(201);
      expect(first.body).toEqual({
        status: 'ACCEPTED',
        pick: {
          pick_id: '00000000-0000-4000-8000-000000000001',
          participant_id: PARTICIPANT_ID,
          game_id: GAME_ID,
          selected_team: 'KC',
          created_at: '2025-09-06T12:00:00.000Z',
        },
      });

      const second = await request(app).post('/api/picks').send({ ...body, team: 'BUF' });
      expect(second.status).toBe(409);
      expect(second.body).toEqual({ status: 'REJECTED', reason: 'DUPLICATE_PICK' });
    });

    it('answers 409 INVALID_TEAM for a team outside the game', async () => {
      const response = await request(buildApp().app)
        .post('/api/picks')
        .send({ participant_id: PARTICIPANT_ID, game_id: GAME_ID, team: 'DAL' });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({ status: 'REJECTED', reason: 'INVALID_TEAM' });
    });

    it('answers 409 TEAMS_UNRESOLVED for a game with placeholder teams', async () => {
      const { app, store } = buildApp();
      store.seedWeek(makeWeek({ week_id: WEEK_ID }), [
        makeGame({
          game_id: PLACEHOLDER_GAME_ID,
          external_id: '9999',
          home_team: 'NFC',
          away_team: 'AFC',
          unresolved_team: true,
        }),
      ]);

      const response = await request(app)
        .post('/api/picks')
        .send({ participant_id: PARTICIPANT_ID, game_id: PLACEHOLDER_GAME_ID, team: 'NFC' });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({ status: 'REJECTED', reason: 'TEAMS_UNRESOLVED' });
      expect(store.picks.size).toBe(0);
    });

    it('rejects a malformed id before reaching the service', async () => {
      const { app, store } = buildApp();
      const response = await request(app)
        .post('/api/picks')
        .send({ participant_id: 'not-a-uuid', game_id: GAME_ID, team: 'KC' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: [{ field: 'participant_id', message: 'Must be a valid UUID' }],
      });
      expect(store.calls).toBe(0);
    });
  });

  describe('POST /api/prop-picks', () => {
    it('normalizes the selection', async () => {
      const { app, store } = buildApp();
      store.seedProps(makeProp({ prop_id: PROP_ID, week_id: WEEK_ID }));

      const response = await request(app)
        .post('/api/prop-picks')
        .send({ participant_id: PARTICIPANT_ID, prop_id: PROP_ID, selection: ' under ' });

      expect(response.status).toBe(201);
      expect(response.body.pick.selection).toBe('UNDER');
    });
  });

  describe('GET /api/seasons/:seasonYear/weeks/:weekNumber/picks/:participantId', () => {
    it("lists one participant's picks for the week", async () => {
      const { app, store } = buildApp();
      store.seedPicks({
        pick_id: 'pick-1',
        participant_id: PARTICIPANT_ID,
        game_id: GAME_ID,
        selected_team: 'KC',
        created_at: new Date('2025-09-06T10:00:00.000Z'),
      });

      const response = await request(app).get(`/api/seasons/2025/weeks/1/picks/${PARTICIPANT_ID}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        seasonYear: 2025,
        weekNumber: 1,
        participantId: PARTICIPANT_ID,
        picks: [
          {
            participantId: PARTICIPANT_ID,
            displayName: 'Avery',
            gameId: GAME_ID,
            matchup: 'BUF @ KC',
            kickoffAt: '2025-09-07T17:00:00.000Z',
            selectedTeam: 'KC',
            result: 'UNDECIDED',
          },
        ],
      });
    });

    it('answers 404 for an unknown participant', async () => {
      const missing = '55555555-5555-4555-8555-555555555555';
      const response = await request(buildApp().app).get(`/api/seasons/2025/weeks/1/picks/${missing}`);
      expect(response.status).toBe(404);
      expect(response.body.error).toBe(`Participant ${missing} not found`);
    });
  });

  // ─── Results ──────────────────────────────────────────────────────────────

  describe('results', () => {
    function finishedApp() {
      const built = buildApp();
      built.store
        .seedWeek(makeWeek({ week_id: WEEK_ID }), [
          makeGame({
            game_id: GAME_ID,
            status: 'final',
            home_score: 27,
            away_score: 20,
            favorite_team: 'KC',
            spread_pts: 3.5,
          }),
        ])
        .seedPicks({
          pick_id: 'pick-1',
          participant_id: PARTICIPANT_ID,
          game_id: GAME_ID,
          selected_team: 'KC',
          created_at: new Date('2025-09-06T10:00:00.000Z'),
        });
      return built.app;
    }

    it('GET /api/games/:gameId/ats/:participantId grades the pick', async () => {
      const response = await request(finishedApp()).get(`/api/games/${GAME_ID}/ats/${PARTICIPANT_ID}`);
      expect(response.status).toBe(200);
      expect(response.body).toEqual({ gameId: GAME_ID, participantId: PARTICIPANT_ID, result: 'WIN' });
    });

    it('GET /api/seasons/:seasonYear/scoreboard lists every participant', async () => {
      const response = await request(finishedApp()).get('/api/seasons/2025/scoreboard');
      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        seasonYear: 2025,
        standings: [
          {
            participantId: PARTICIPANT_ID,
            externalId: 'chat-100',
            displayName: 'Avery',
            wins: 1,
            losses: 0,
            pushes: 0,
          },
        ],
      });
    });

    it('GET week results answers 404 for an unknown week', async () => {
      const response = await request(finishedApp()).get('/api/seasons/2025/weeks/2/results');
      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({ error: 'Week 2 of 2025 not found', code: 'NOT_FOUND' });
    });

    it('rejects a week number past the Super Bowl', async () => {
      const response = await request(finishedApp()).get('/api/seasons/2025/weeks/24/results');
      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Invalid path parameters');
    });

    it('answers 404 for an unknown game', async () => {
      const missing = '55555555-5555-4555-8555-555555555555';
      const response = await request(finishedApp()).get(`/api/games/${missing}/ats/${PARTICIPANT_ID}`);
      expect(response.status).toBe(404);
      expect(response.body.error).toBe(`Game ${missing} not found`);
    });
  });

  // ─── Admin ────────────────────────────────────────────────────────────────

  describe('admin guard', () => {
    it('requires a bearer token', async () => {
      const response = await request(buildApp().app).post('/api/jobs/grade_completed_week');
      expect(response.status).toBe(401);
      expect(response.body.error).toBe('Authorization token required');
    });

    it('rejects a wrong token', async () => {
      const response = await request(buildApp().app)
        .post('/api/jobs/grade_completed_week')
        .set('Authorization', 'Bearer wrong-secret');
      expect(response.status).toBe(401);
      expect(response.body.error).toBe('Invalid admin token');
    });

    it('disables admin routes when no token is configured', async () => {
      const response = await request(buildApp({ adminApiToken: null }).app)
        .post('/api/jobs/grade_completed_week')
        .set('Authorization', ADMIN);
      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({
        error: 'Admin API is disabled: ADMIN_API_TOKEN is not set',
        code: 'UNAVAILABLE',
      });
    });
  });

  describe('POST /api/jobs/:jobName', () => {
    it('runs the job and returns its result', async () => {
      const response = await request(buildApp().app)
        .post('/api/jobs/sync_scores_active_week')
        .set('Authorization', ADMIN);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        job: 'sync_scores_active_week',
        result: { ok: true, changed: 0, skipped: 'NO_TARGET_WEEK', detail: 'no week has kicked off' },
      });
    });

    it('rejects an unknown job name', async () => {
      const response = await request(buildApp().app).post('/api/jobs/rebuild_everything').set('Authorization', ADMIN);
      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Invalid path parameters');
    });
  });

  describe('props', () => {
    it('POST /api/weeks/:weekId/props creates a prop', async () => {
      const response = await request(buildApp().app)
        .post(`/api/weeks/${WEEK_ID}/props`)
        .set('Authorization', ADMIN)
        .send({ description: ' Total points over 44.5 ', outcome_domain: 'OVER_UNDER' });

      expect(response.status).toBe(201);
      expect(response.body.prop).toEqual({
        prop_id: '00000000-0000-4000-8000-000000000001',
        week_id: WEEK_ID,
        description: 'Total points over 44.5',
        outcome_domain: 'OVER_UNDER',
        result: null,
      });
    });

    it('POST /api/weeks/:weekId/prop-results stores the result and grades picks', async () => {
      const { app, store } = buildApp();
      const otherProp = '66666666-6666-4666-8666-666666666666';
      store.seedProps(
        makeProp({ prop_id: PROP_ID, week_id: WEEK_ID }),
        makeProp({ prop_id: otherProp, week_id: WEEK_ID, outcome_domain: 'YES_NO' }),
      );
      store.propPicks.set(
        `${PARTICIPANT_ID}:${PROP_ID}`,
        makePropPick({ participant_id: PARTICIPANT_ID, prop_id: PROP_ID, selection: 'OVER' }),
      );

      const response = await request(app)
        .post(`/api/weeks/${WEEK_ID}/prop-results`)
        .set('Authorization', ADMIN)
        .send({ results: { [PROP_ID]: 'over', [otherProp]: 'OVER' } });

      expect(response.status).toBe(200);
      expect(response.body.updated).toEqual([
        {
          prop_id: PROP_ID,
          week_id: WEEK_ID,
          description: 'Total points over 47.5',
          outcome_domain: 'OVER_UNDER',
          result: 'OVER',
        },
      ]);
      expect(response.body.grades).toEqual([
        {
          prop_pick_id: 'prop-pick-1',
          participant_id: PARTICIPANT_ID,
          prop_id: PROP_ID,
          selection: 'OVER',
          grade: 'WIN',
        },
      ]);
      expect(response.body.errors).toEqual([
        { propId: otherProp, error: `Result OVER is not a YES_NO outcome for prop ${otherProp}` },
      ]);
    });
  });

  describe('PATCH /api/weeks/:weekId/deadline', () => {
    it('moves the deadline', async () => {
      const response = await request(buildApp().app)
        .patch(`/api/weeks/${WEEK_ID}/deadline`)
        .set('Authorization', ADMIN)
        .send({ picks_deadline: '2025-09-07T12:00:00-04:00' });

      expect(response.status).toBe(200);
      expect(response.body.week.picks_deadline).toBe('2025-09-07T16:00:00.000Z');
    });

    it('rejects a non-ISO timestamp', async () => {
      const response = await request(buildApp().app)
        .patch(`/api/weeks/${WEEK_ID}/deadline`)
        .set('Authorization', ADMIN)
        .send({ picks_deadline: 'sunday noon' });

      expect(response.status).toBe(400);
      expect(response.body.details[0].field).toBe('picks_deadline');
    });
  });

  describe('PATCH /api/games/:gameId/teams', () => {
    it('replaces placeholder teams', async () => {
      const response = await request(buildApp().app)
        .patch(`/api/games/${GAME_ID}/teams`)
        .set('Authorization', ADMIN)
        .send({ home_team: 'Eagles', away_team: 'kan' });

      expect(response.status).toBe(200);
      expect(response.body.game).toMatchObject({ home_team: 'PHI', away_team: 'KC', unresolved_team: false });
    });

    it('answers 400 with details for identical teams', async () => {
      const response = await request(buildApp().app)
        .patch(`/api/games/${GAME_ID}/teams`)
        .set('Authorization', ADMIN)
        .set('X-Request-ID', 'req-789')
        .send({ home_team: 'KC', away_team: 'KC' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: 'Home and away teams must differ',
        code: 'BAD_REQUEST',
        requestId: 'req-789',
        details: { homeTeam: 'KC', awayTeam: 'KC' },
      });
    });
  });

  describe('pick administration', () => {
    function appWithPick() {
      const built = buildApp();
      built.store.seedPicks({
        pick_id: 'pick-1',
        participant_id: PARTICIPANT_ID,
        game_id: GAME_ID,
        selected_team: 'KC',
        created_at: new Date('2025-09-06T10:00:00.000Z'),
      });
      return built;
    }

    it('keeps the week pick listing and missing-picks query behind the admin token', async () => {
      const { app } = appWithPick();

      expect((await request(app).get('/api/seasons/2025/weeks/1/picks')).status).toBe(401);
      expect((await request(app).get('/api/seasons/2025/weeks/1/missing-picks')).status).toBe(401);
      expect((await request(app).put(`/api/games/${GAME_ID}/picks/${PARTICIPANT_ID}`).send({ team: 'BUF' })).status).toBe(
        401,
      );
      expect((await request(app).delete(`/api/weeks/${WEEK_ID}/picks/${PARTICIPANT_ID}`)).status).toBe(401);
    });

    it('GET week picks lists every participant', async () => {
      const response = await request(appWithPick().app).get('/api/seasons/2025/weeks/1/picks').set('Authorization', ADMIN);

      expect(response.status).toBe(200);
      expect(response.body.seasonYear).toBe(2025);
      expect(response.body.weekNumber).toBe(1);
      expect(response.body.picks).toEqual([
        {
          participantId: PARTICIPANT_ID,
          displayName: 'Avery',
          gameId: GAME_ID,
          matchup: 'BUF @ KC',
          kickoffAt: '2025-09-07T17:00:00.000Z',
          selectedTeam: 'KC',
          result: 'UNDECIDED',
        },
      ]);
    });

    it('GET missing-picks reports who still has open games to pick', async () => {
      const response = await request(buildApp().app)
        .get('/api/seasons/2025/weeks/1/missing-picks')
        .set('Authorization', ADMIN);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        seasonYear: 2025,
        weekNumber: 1,
        participants: [
          { participantId: PARTICIPANT_ID, displayName: 'Avery', picked: 0, totalGames: 1, openGameIds: [GAME_ID] },
        ],
      });
    });

    it('PUT replaces a pick for a participant', async () => {
      const { app, store } = appWithPick();

      const response = await request(app)
        .put(`/api/games/${GAME_ID}/picks/${PARTICIPANT_ID}`)
        .set('Authorization', ADMIN)
        .send({ team: 'BUF' });

      expect(response.status).toBe(200);
      expect(response.body.pick).toMatchObject({
        pick_id: 'pick-1',
        participant_id: PARTICIPANT_ID,
        game_id: GAME_ID,
        selected_team: 'BUF',
      });
      expect(store.picks.size).toBe(1);
    });

    it('PUT answers 400 for a team outside the game', async () => {
      const response = await request(buildApp().app)
        .put(`/api/games/${GAME_ID}/picks/${PARTICIPANT_ID}`)
        .set('Authorization', ADMIN)
        .send({ team: 'DAL' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('DAL is not playing in this game');
    });

    it("DELETE removes the participant's picks for the week", async () => {
      const { app, store } = appWithPick();

      const response = await request(app)
        .delete(`/api/weeks/${WEEK_ID}/picks/${PARTICIPANT_ID}`)
        .set('Authorization', ADMIN);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ weekId: WEEK_ID, participantId: PARTICIPANT_ID, deleted: 1 });
      expect(store.picks.size).toBe(0);
    });
  });
});
