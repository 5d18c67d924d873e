import { Router } from 'express';
import { JobController } from './job.controller';
import { MatchingService } from '../shared/matching.service';

export function createJobRoutes(matchingService: MatchingService): Router {
  const router = Router();
  const controller = new JobController(matchingService);

  // POST /api/jobs - Register or replace a job description
  router.post('/jobs', controller.createJob.bind(controller));

  // POST /api/jobs/rank - Rank registered jobs for a resume
  router.post('/jobs/rank', controller.rankJobs.bind(controller));

  // GET /api/jobs/:jobKey - Registered job profile
  router.get('/jobs/:jobKey', controller.getJob.bind(controller));

  return router;
}
