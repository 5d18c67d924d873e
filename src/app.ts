import express, { Express } from 'express';
import cors from 'cors';
import { errorMiddleware, notFoundHandler } from './middleware/error.middleware';
import { createMatchRoutes } from './models/match/match.routes';
import { createJobRoutes } from './models/job/job.routes';
import { MatchingService } from './models/shared/matching.service';

export function createApp(matchingService: MatchingService): Express {
  const app = express();

  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api', createMatchRoutes(matchingService));
  app.use('/api', createJobRoutes(matchingService));

  app.use('*', notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
