import type { Request, Response, NextFunction } from 'express';

type RequestLogEntry = {
  event: 'http_request';
  requestId?: string;
  method: string;
  path: string;
  status: number;
  durationMs: number;
  bytesIn: number;
  bytesOut: number;
  userAgent?: string;
  timestamp: string;
};

export type RequestLogSink = (line: string) => void;

/** One JSON line per finished request. */
export function createRequestLogger(sink: RequestLogSink = (line) => console.log(line)) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime.bigint();
    const bytesIn = Number(req.headers['content-length'] ?? 0);

    res.on('finish', () => {
      const durationMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
      const entry: RequestLogEntry = {
        event: 'http_request',
        requestId: req.requestId,
        method: req.method,
        path: req.originalUrl.split('?')[0],
        status: res.statusCode,
        durationMs,
        bytesIn,
        bytesOut: Number(res.getHeader('content-length') ?? 0),
        userAgent: req.header('user-agent') ?? undefined,
        timestamp: new Date().toISOString()
      };

      sink(JSON.stringify(entry));
    });

    next();
  };
}
