import { Request, Response, NextFunction } from 'express';
import { MatchingService } from '../shared/matching.service';
import { BatchMatchRequestDto, MatchRequestDto } from '../../interfaces/dto/MatchRequestDto';

export class MatchController {
  constructor(private matchingService: MatchingService) {}

  async createMatch(req: Request, res: Response, next: NextFunction) {
    try {
      const dto: MatchRequestDto = req.body;

      const result = await this.matchingService.matchPair(dto);

      res.status(result.matchId ? 201 : 200).json(result);
    } catch (error) {
      next(error);
    }
  }

  async createBatch(req: Request, res: Response, next: NextFunction) {
    try {
      const dto: BatchMatchRequestDto = req.body;

      const results = await this.matchingService.matchBatch(dto);

      res.json({ results });
    } catch (error) {
      next(error);
    }
  }

  async getMatch(req: Request, res: Response, next: NextFunction) {
    try {
      const { matchId } = req.params;

      const result = await this.matchingService.getMatchRecord(matchId);

      res.json(result);
    } catch (error) {
      next(error);
    }
  }
}
