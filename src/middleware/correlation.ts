// Correlation id per request, echoed back to the client
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const correlationId = req.header('x-correlation-id') ?? randomUUID();
  req.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);
  next();
}
