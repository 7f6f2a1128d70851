import type { Request, Response } from 'express';
import { parseBody, parseParams } from '../middleware/validateRequest';
import type { PicksService } from '../services/picks/picksService';
import {
  atsResultParams,
  registerParticipantBody,
  seasonParams,
  seasonWeekParams,
  seasonWeekParticipantParams,
  submitPickBody,
  submitPropPickBody,
} from './schemas';

/** Participant-facing endpoints. Rejected picks answer 409 with the reason. */
export function createPicksController(service: PicksService) {
  return {
    async registerParticipant(req: Request, res: Response): Promise<void> {
      const body = parseBody(registerParticipantBody, req);
      const participant = await service.registerParticipant(body.external_id, body.display_name);
      res.status(201).json({ participant });
    },

    async submitPick(req: Request, res: Response): Promise<void> {
      const body = parseBody(submitPickBody, req);
      const result = await service.submitPick(body.participant_id, body.game_id, body.team);
      res.status(result.status === 'ACCEPTED' ? 201 : 409).json(result);
    },

    async submitPropPick(req: Request, res: Response): Promise<void> {
      const body = parseBody(submitPropPickBody, req);
      const result = await service.submitPropPick(body.participant_id, body.prop_id, body.selection);
      res.status(result.status === 'ACCEPTED' ? 201 : 409).json(result);
    },

    async getAtsResult(req: Request, res: Response): Promise<void> {
      const { gameId, participantId } = parseParams(atsResultParams, req);
      const result = await service.getAtsResult(gameId, participantId);
      res.json({ gameId, participantId, result });
    },

    async getSeasonScoreboard(req: Request, res: Response): Promise<void> {
      const { seasonYear } = parseParams(seasonParams, req);
      const standings = await service.getSeasonScoreboard(seasonYear);
      res.json({ seasonYear, standings });
    },

    async getWeekResults(req: Request, res: Response): Promise<void> {
      const { seasonYear, weekNumber } = parseParams(seasonWeekParams, req);
      const standings = await service.getWeekResults(seasonYear, weekNumber);
      res.json({ seasonYear, weekNumber, standings });
    },

    async getParticipantWeekPicks(req: Request, res: Response): Promise<void> {
      const { seasonYear, weekNumber, participantId } = parseParams(seasonWeekParticipantParams, req);
      const picks = await service.listWeekPicks(seasonYear, weekNumber, participantId);
      res.json({ seasonYear, weekNumber, participantId, picks });
    },
  };
}

export type PicksController = ReturnType<typeof createPicksController>;
