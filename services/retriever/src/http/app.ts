/**
 * HTTP surface
 * Health, retrieval and session endpoints over a RetrievalOrchestrator
 */

import express, { type Request, type Response } from 'express';
import { isRetrieveRequest } from '@ctxrag/shared-types';
import type { RetrievalOrchestrator } from '../orchestrator/retrieval-orchestrator.js';
import type { RetrieverLogger } from '../utils/logger.js';
import { logError } from '../utils/logger.js';
import { InvalidRequestError, RetrievalCancelledError, getErrorMessage } from '../utils/errors.js';

export interface AppDeps {
  orchestrator: RetrievalOrchestrator;
  logger: RetrieverLogger;
  sessionBackend: string;
}

export function createApp(deps: AppDeps): express.Express {
  const { orchestrator, logger } = deps;
  const app = express();

  app.use(express.json({ limit: '64kb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'retriever',
      sessionBackend: deps.sessionBackend,
      timestamp: Date.now(),
    });
  });

  app.post('/retrieve', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRetrieveRequest(body)) {
      res.status(400).json({ error: 'Body must be a JSON object with string query and userId' });
      return;
    }

    // Abort backend calls if the client goes away before we answer
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort(new Error('client disconnected'));
      }
    });

    try {
      const result = await orchestrator.retrieve(body.query, body.userId, { signal: controller.signal });
      res.json(result);
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        res.status(400).json({ error: error.message, field: error.field });
      } else if (error instanceof RetrievalCancelledError) {
        logger.info('Retrieval cancelled by client', { userId: body.userId });
      } else {
        logError(logger, 'Unexpected retrieval failure', error, { userId: body.userId });
        res.status(500).json({ error: getErrorMessage(error) });
      }
    }
  });

  app.get('/sessions/:userId', async (req: Request, res: Response) => {
    const userId = req.params['userId'] ?? '';
    try {
      const history = await orchestrator.getConversation(userId);
      res.json({ userId, history });
    } catch (error) {
      sendSessionError(res, error);
    }
  });

  app.delete('/sessions/:userId', async (req: Request, res: Response) => {
    try {
      await orchestrator.clearSession(req.params['userId'] ?? '');
      res.status(204).end();
    } catch (error) {
      sendSessionError(res, error);
    }
  });

  function sendSessionError(res: Response, error: unknown): void {
    if (error instanceof InvalidRequestError) {
      res.status(400).json({ error: error.message, field: error.field });
      return;
    }
    logError(logger, 'Unexpected session failure', error);
    res.status(500).json({ error: getErrorMessage(error) });
  }

  return app;
}
