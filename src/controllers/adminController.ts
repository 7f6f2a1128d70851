import type { Request, Response } from 'express';
import { parseBody, parseParams } from '../middleware/validateRequest';
import type { PicksService } from '../services/picks/picksService';
import type { JobRunner } from '../services/sync/jobRunner';
import {
  adjustDeadlineBody,
  createPropBody,
  gameIdParams,
  gameParticipantParams,
  jobNameParams,
  overridePickBody,
  propResultsBody,
  resolveTeamsBody,
  seasonWeekParams,
  weekIdParams,
  weekParticipantParams,
} from './schemas';

/** Administrative endpoints, mounted behind `requireAdmin`. */
export function createAdminController(service: PicksService, runner: JobRunner) {
  return {
    /** Runs the job to completion; a failed run is still a 200 carrying the result. */
    async runJob(req: Request, res: Response): Promise<void> {
      const { jobName } = parseParams(jobNameParams, req);
      const result = await runner.run(jobName);
      res.json({ job: jobName, result });
    },

    async createProp(req: Request, res: Response): Promise<void> {
      const { weekId } = parseParams(weekIdParams, req);
      const body = parseBody(createPropBody, req);
      const prop = await service.createPropBet(weekId, body.description, body.outcome_domain);
      res.status(201).json({ prop });
    },

    async declarePropResults(req: Request, res: Response): Promise<void> {
      const { weekId } = parseParams(weekIdParams, req);
      const { results } = parseBody(propResultsBody, req);
      const declaration = await service.declarePropResults(weekId, results);
      res.json({
        updated: declaration.updated,
        grades: declaration.grades,
        errors: declaration.errors.map((err) => ({ propId: err.reference, error: err.message })),
      });
    },

    async adjustDeadline(req: Request, res: Response): Promise<void> {
      const { weekId } = parseParams(weekIdParams, req);
      const body = parseBody(adjustDeadlineBody, req);
      const week = await service.adjustPicksDeadline(weekId, new Date(body.picks_deadline));
      res.json({ week });
    },

    async resolveTeams(req: Request, res: Response): Promise<void> {
      const { gameId } = parseParams(gameIdParams, req);
      const body = parseBody(resolveTeamsBody, req);
      const game = await service.resolveGameTeams(gameId, body.home_team, body.away_team);
      res.json({ game });
    },

    async listWeekPicks(req: Request, res: Response): Promise<void> {
      const { seasonYear, weekNumber } = parseParams(seasonWeekParams, req);
      const picks = await service.listWeekPicks(seasonYear, weekNumber);
      res.json({ seasonYear, weekNumber, picks });
    },

    async listMissingPicks(req: Request, res: Response): Promise<void> {
      const { seasonYear, weekNumber } = parseParams(seasonWeekParams, req);
      const participants = await service.listMissingPicks(seasonYear, weekNumber);
      res.json({ seasonYear, weekNumber, participants });
    },

    async overridePick(req: Request, res: Response): Promise<void> {
      const { gameId, participantId } = parseParams(gameParticipantParams, req);
      const { team } = parseBody(overridePickBody, req);
      const pick = await service.overridePick(gameId, participantId, team);
      res.json({ pick });
    },

    async deleteWeekPicks(req: Request, res: Response): Promise<void> {
      const { weekId, participantId } = parseParams(weekParticipantParams, req);
      const deleted = await service.deleteWeekPicks(weekId, participantId);
      res.json({ weekId, participantId, deleted });
    },
  };
}

export type AdminController = ReturnType<typeof createAdminController>;
