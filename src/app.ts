import express, { Application } from 'express';
import cors from 'cors';
import healthCheckRouter from './routes/healthCheck';
import episodesRouter from './routes/episodes';
import { validateApiKey } from './middleware/auth';
import { handleErrors } from './middleware/errorHandler';

export function createApp(): Application {
  const app: Application = express();

  app.use(cors());
  app.use(express.json());

  app.use('/api/health-check', healthCheckRouter);

  app.use(validateApiKey);

  // All routes after this point require API key authentication
  app.use('/api/episodes', episodesRouter);

  app.use(handleErrors);

  return app;
}
