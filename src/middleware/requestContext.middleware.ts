import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { runWithRequestContext } from '../lib/requestContext';

const MAX_REQUEST_ID_LENGTH = 128;

function extractRequestId(req: Request): string {
  const header = req.header('x-request-id');
  if (typeof header === 'string') {
    const trimmed = header.trim();
    if (trimmed && trimmed.length <= MAX_REQUEST_ID_LENGTH) return trimmed;
  }
  return uuidv4();
}

/** Assigns the request id, echoes it back and makes it visible to everything the request awaits. */
export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
  const requestId = extractRequestId(req);
  req.requestId = requestId;
  res.setHeader('x-request-id', requestId);

  runWithRequestContext({ requestId }, () => next());
}
