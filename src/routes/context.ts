// src/routes/context.ts: context and multi-query endpoints under /v1/:projectId
import express, { type Request, type Response, type NextFunction, type Router } from 'express';
import type { Project, QueryScope } from '@/types/core';
import type { ContextOptimizer } from '@/services/retrieval-orchestrator';
import type { DocumentStore } from '@/services/stores/document-store';
import type { TierGate } from '@/services/tier-gate';
import type { RateLimiter } from '@/stability/rateLimiter';
import { runMultiQuery } from '@/services/multi-query';
import { logger } from '@/services/logger';
import { loadProject } from '@/middleware/project-loader';
import { callerRateLimit } from '@/middleware/caller-rate-limit';
import { CapabilityDeniedError, ProjectNotFoundError, QueryValidationError } from '@/utils/errors';
import { createSuccessResponse } from '@/utils/errorResponse';
import { validateContextRequest, validateMultiQueryRequest } from './context.validation';

export interface ContextRouteDeps {
  optimizer: ContextOptimizer;
  store: DocumentStore;
  tierGate: TierGate;
  limiter: RateLimiter;
}

function requireProject(req: Request): Project {
  if (!req.project) throw new ProjectNotFoundError(req.params.projectId);
  return req.project;
}

function scopeOf(project: Project): QueryScope {
  return { projectId: project.id, sharedCollectionIds: project.sharedCollectionIds };
}

/** Work finishes either way; the result is dropped if the client has gone. */
function sendIfConnected(req: Request, res: Response, body: unknown): void {
  if (res.destroyed || res.socket === null || res.socket.destroyed) {
    logger.info('http:client_disconnected', { correlationId: req.correlationId, path: req.path });
    return;
  }
  res.status(200).json(body);
}

export function createContextRouter(deps: ContextRouteDeps): Router {
  const router = express.Router();

  router.use('/:projectId', loadProject(deps.store), callerRateLimit(deps.limiter));

  router.post('/:projectId/context', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = validateContextRequest(req.body);
      if (!parsed.success) throw new QueryValidationError('Invalid context request', parsed.error);

      const project = requireProject(req);
      const result = await deps.optimizer.optimizeContext(
        {
          query: parsed.data.query,
          maxTokens: parsed.data.maxTokens,
          searchMode: parsed.data.searchMode,
          scope: scopeOf(project),
        },
        deps.tierGate.allowedModes(project.plan),
      );
      sendIfConnected(req, res, createSuccessResponse(result));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:projectId/multi-query', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = validateMultiQueryRequest(req.body);
      if (!parsed.success) throw new QueryValidationError('Invalid multi-query request', parsed.error);

      const project = requireProject(req);
      const allowedModes = deps.tierGate.allowedModes(project.plan);
      if (!allowedModes.has('multi_query')) {
        throw new CapabilityDeniedError(`Plan ${project.plan} does not include multi-query`);
      }

      const result = await runMultiQuery(deps.optimizer, parsed.data.queries, parsed.data.maxTokens, {
        scope: scopeOf(project),
        searchMode: parsed.data.searchMode,
        allowedModes,
      });
      sendIfConnected(req, res, createSuccessResponse(result));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
