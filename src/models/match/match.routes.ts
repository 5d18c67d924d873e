import { Router } from 'express';
import { MatchController } from './match.controller';
import { MatchingService } from '../shared/matching.service';

export function createMatchRoutes(matchingService: MatchingService): Router {
  const router = Router();
  const controller = new MatchController(matchingService);

  // POST /api/match - Score one resume against one job description
  router.post('/match', controller.createMatch.bind(controller));

  // POST /api/match/batch - Score many pairs, each reported independently
  router.post('/match/batch', controller.createBatch.bind(controller));

  // GET /api/matches/:matchId - Stored match record
  router.get('/matches/:matchId', controller.getMatch.bind(controller));

  return router;
}
