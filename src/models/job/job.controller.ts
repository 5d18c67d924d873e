import { Request, Response, NextFunction } from 'express';
import { MatchingService } from '../shared/matching.service';
import { CreateJobDto, RankJobsDto } from '../../interfaces/dto/CreateJobDto';

export class JobController {
  constructor(private matchingService: MatchingService) {}

  async createJob(req: Request, res: Response, next: NextFunction) {
    try {
      const dto: CreateJobDto = req.body;

      const job = await this.matchingService.registerJob(dto);

      res.status(201).json(job);
    } catch (error) {
      next(error);
    }
  }

  async getJob(req: Request, res: Response, next: NextFunction) {
    try {
      const { jobKey } = req.params;

      const job = await this.matchingService.getJob(jobKey);

      res.json(job);
    } catch (error) {
      next(error);
    }
  }

  async rankJobs(req: Request, res: Response, next: NextFunction) {
    try {
      const dto: RankJobsDto = req.body;

      const results = await this.matchingService.rankJobs(dto);

      res.json({ results });
    } catch (error) {
      next(error);
    }
  }
}
