import type { Project } from '../core';

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
      /** Set by the project loader on /v1/:projectId routes. */
      project?: Project;
    }
  }
}

export {};
