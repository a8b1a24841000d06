import { Request, Response, Router } from 'express';
import path from 'path';
import type { DatasetEntry } from '../models/event';
import type { ProcessingErrorKind } from '../models/tagging';
import { loadDataset, resolveDatasetPath } from '../evaluation/datasetLoader';
import type { ServiceContext } from '../services/serviceContext';
import { UpstreamError } from '../tagging/errors';
import {
  parseBatchRequest,
  parseEvaluationRequest,
  parseEventRecord,
  parseSubmissionRequest,
  parseTagRequest,
} from './requestParsing';
import { serializeResult, serializeRow } from './serializers';

const FAILURE_STATUS: Record<ProcessingErrorKind, number> = {
  validation: 400,
  upstream: 502,
  computation: 500,
  internal: 500,
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function createEventRoutes(context: ServiceContext): Router {
  const router = Router();
  const { config, registry, processor, engine, promptGenerator } = context;

  function loadNamedDataset(name: string | null): DatasetEntry[] {
    const filePath = name
      ? resolveDatasetPath(config.dataDir, name)
      : path.join(config.dataDir, config.evaluationDatasetFile);
    return loadDataset(filePath);
  }

  router.get('/tags', (req: Request, res: Response) => {
    res.json({
      tags: registry.list(),
      count: registry.size,
    });
  });

  router.post('/tag', async (req: Request, res: Response): Promise<void> => {
    let parsed: ReturnType<typeof parseTagRequest>;
    try {
      parsed = parseTagRequest(req.body);
    } catch (error) {
      res.status(400).json({ error: error instanceof Error ? error.message : 'Invalid request body' });
      return;
    }

    try {
      console.log(`[TAGGING] Tag request for event ${parsed.record.id}: ${parsed.record.title.slice(0, 50)}`);
      const result = await processor.processSingleEvent(parsed.record);
      const status = result.ok ? 200 : FAILURE_STATUS[result.error.kind];
      res.status(status).json(serializeResult(result, parsed.options));
    } catch (error) {
      console.error('Failed to tag event', error);
      res.status(500).json({
        error: 'Failed to tag event',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  router.post('/tag/batch', async (req: Request, res: Response): Promise<void> => {
    let parsed: ReturnType<typeof parseBatchRequest>;
    try {
      parsed = parseBatchRequest(req.body);
    } catch (error) {
      res.status(400).json({ error: error instanceof Error ? error.message : 'Invalid request body' });
      return;
    }

    try {
      console.log(`[TAGGING] Batch request for ${parsed.records.length} events`);
      const outcome = await processor.processBatch(parsed.records);
      res.json({
        results: outcome.results.map(result => serializeResult(result, parsed.options)),
        summary: outcome.summary,
      });
    } catch (error) {
      console.error('Failed to tag batch', error);
      res.status(500).json({
        error: 'Failed to tag batch',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  router.post('/debug-prompt', (req: Request, res: Response): void => {
    try {
      const record = parseEventRecord(req.body);
      const payload = promptGenerator.generate(record, registry.tagNames);
      res.json({
        prompt: payload.prompt,
        availableTagsCount: payload.availableTags.length,
      });
    } catch (error) {
      res.status(400).json({ error: error instanceof Error ? error.message : 'Invalid request body' });
    }
  });

  router.post('/evaluate', async (req: Request, res: Response): Promise<void> => {
    const startedAt = Date.now();
    let dataset: DatasetEntry[];
    try {
      const request = parseEvaluationRequest(req.body);
      dataset = request.kind === 'inline' ? request.entries : loadNamedDataset(request.dataset);
    } catch (error) {
      if (isMissingFile(error)) {
        res.status(404).json({ error: 'Dataset not found' });
        return;
      }
      res.status(400).json({ error: error instanceof Error ? error.message : 'Invalid request body' });
      return;
    }

    try {
      const outcome = await engine.evaluate(dataset);
      res.json({
        metrics: outcome.metrics,
        results: outcome.rows.map(serializeRow),
        processingTimeMs: Date.now() - startedAt,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      console.error('Failed to evaluate dataset', error);
      res.status(500).json({
        error: 'Failed to evaluate dataset',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  return router;
}

export function createSubmissionRoutes(context: ServiceContext): Router {
  const router = Router();
  const { config, submissions } = context;

  router.post('/', async (req: Request, res: Response): Promise<void> => {
    let request: ReturnType<typeof parseSubmissionRequest>;
    let dataset: DatasetEntry[] | undefined;
    try {
      request = parseSubmissionRequest(req.body);
      dataset = request.dataset ? loadDataset(resolveDatasetPath(config.dataDir, request.dataset)) : undefined;
    } catch (error) {
      if (isMissingFile(error)) {
        res.status(404).json({ error: 'Dataset not found' });
        return;
      }
      res.status(400).json({ error: error instanceof Error ? error.message : 'Invalid request body' });
      return;
    }

    try {
      const response = await submissions.submit(request.name, dataset);
      res.status(response.status).json(response.body);
    } catch (error) {
      if (isMissingFile(error)) {
        res.status(404).json({ error: 'Dataset not found' });
        return;
      }
      if (error instanceof UpstreamError) {
        console.error('[SUBMISSION] Dashboard request failed', error.message);
        res.status(502).json({ error: 'Submission failed', message: error.message });
        return;
      }
      console.error('Failed to submit evaluation', error);
      res.status(500).json({
        error: 'Failed to submit evaluation',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  return router;
}
