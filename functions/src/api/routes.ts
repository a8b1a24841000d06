import express from 'express';
import cors from 'cors';
import type { ServiceContext } from '../services/serviceContext';
import { createEventRoutes, createSubmissionRoutes } from './events';

export function createApiApp(context: ServiceContext): express.Express {
  const app = express();
  app.use(cors({ origin: context.config.allowedOrigins }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/status', (req, res) => {
    res.json({
      status: 'healthy',
      services: {
        tagging: 'enabled',
        model: context.processor.model,
        tagsLoaded: context.registry.size,
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/v1/events', createEventRoutes(context));
  app.use('/api/v1/submissions', createSubmissionRoutes(context));

  return app;
}
