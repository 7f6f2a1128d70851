import express, { type Router } from 'express';
import { createAdminController } from '../controllers/adminController';
import { createPicksController } from '../controllers/picksController';
import {
  adjustDeadlineBody,
  atsResultParams,
  createPropBody,
  gameIdParams,
  gameParticipantParams,
  jobNameParams,
  overridePickBody,
  propResultsBody,
  registerParticipantBody,
  resolveTeamsBody,
  seasonParams,
  seasonWeekParams,
  seasonWeekParticipantParams,
  submitPickBody,
  submitPropPickBody,
  weekIdParams,
  weekParticipantParams,
} from '../controllers/schemas';
import { requireAdmin } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { validateBody, validateParams } from '../middleware/validateRequest';
import type { PicksService } from '../services/picks/picksService';
import type { JobRunner } from '../services/sync/jobRunner';

export interface ApiRouterDeps {
  picksService: PicksService;
  jobRunner: JobRunner;
  adminApiToken: string | null;
}

export function createApiRouter(deps: ApiRouterDeps): Router {
  const router = express.Router();
  const picks = createPicksController(deps.picksService);
  const admin = createAdminController(deps.picksService, deps.jobRunner);
  const adminOnly = requireAdmin(deps.adminApiToken);

  // Participants & picks
  router.post('/participants', validateBody(registerParticipantBody), asyncHandler(picks.registerParticipant));
  router.post('/picks', validateBody(submitPickBody), asyncHandler(picks.submitPick));
  router.post('/prop-picks', validateBody(submitPropPickBody), asyncHandler(picks.submitPropPick));

  // Results
  router.get(
    '/games/:gameId/ats/:participantId',
    validateParams(atsResultParams),
    asyncHandler(picks.getAtsResult),
  );
  router.get('/seasons/:seasonYear/scoreboard', validateParams(seasonParams), asyncHandler(picks.getSeasonScoreboard));
  router.get(
    '/seasons/:seasonYear/weeks/:weekNumber/results',
    validateParams(seasonWeekParams),
    asyncHandler(picks.getWeekResults),
  );
  router.get(
    '/seasons/:seasonYear/weeks/:weekNumber/picks/:participantId',
    validateParams(seasonWeekParticipantParams),
    asyncHandler(picks.getParticipantWeekPicks),
  );

  // Admin
  router.post('/jobs/:jobName', adminOnly, validateParams(jobNameParams), asyncHandler(admin.runJob));
  router.post(
    '/weeks/:weekId/props',
    adminOnly,
    validateParams(weekIdParams),
    validateBody(createPropBody),
    asyncHandler(admin.createProp),
  );
  router.post(
    '/weeks/:weekId/prop-results',
    adminOnly,
    validateParams(weekIdParams),
    validateBody(propResultsBody),
    asyncHandler(admin.declarePropResults),
  );
  router.patch(
    '/weeks/:weekId/deadline',
    adminOnly,
    validateParams(weekIdParams),
    validateBody(adjustDeadlineBody),
    asyncHandler(admin.adjustDeadline),
  );
  router.patch(
    '/games/:gameId/teams',
    adminOnly,
    validateParams(gameIdParams),
    validateBody(resolveTeamsBody),
    asyncHandler(admin.resolveTeams),
  );
  router.get(
    '/seasons/:seasonYear/weeks/:weekNumber/picks',
    adminOnly,
    validateParams(seasonWeekParams),
    asyncHandler(admin.listWeekPicks),
  );
  router.get(
    '/seasons/:seasonYear/weeks/:weekNumber/missing-picks',
    adminOnly,
    validateParams(seasonWeekParams),
    asyncHandler(admin.listMissingPicks),
  );
  router.put(
    '/games/:gameId/picks/:participantId',
    adminOnly,
    validateParams(gameParticipantParams),
    validateBody(overridePickBody),
    asyncHandler(admin.overridePick),
  );
  router.delete(
    '/weeks/:weekId/picks/:participantId',
    adminOnly,
    validateParams(weekParticipantParams),
    asyncHandler(admin.deleteWeekPicks),
  );

  return router;
}
