// Resolves :projectId once so limiter and handlers share it
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { DocumentStore } from '@/services/stores/document-store';
import { ProjectNotFoundError } from '@/utils/errors';

export function loadProject(store: DocumentStore): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      const project = await store.getProject(req.params.projectId);
      if (!project) {
        next(new ProjectNotFoundError(req.params.projectId));
        return;
      }
      req.project = project;
      next();
    } catch (err) {
      next(err);
    }
  };
}
