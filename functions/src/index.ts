import * as functions from 'firebase-functions/v1';
import { createApiApp } from './api/routes';
import { loadConfig } from './config';
import { createServiceContext } from './services/serviceContext';

const apiApp = createApiApp(createServiceContext(loadConfig()));

export const api = functions
  .runWith({
    timeoutSeconds: 540,
    memory: '512MB',
    secrets: ['OPENAI_API_KEY'],
  })
  .https.onRequest(apiApp);
