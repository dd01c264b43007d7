import { NextFunction, Request, RequestHandler, Response } from 'express';
import { AgentEngine } from '../../agent';
import { createTraceRecord } from '../monitoring/trace-recorder';

/**
 * Records every completed exchange into the engine's trace history.
 */
export function httpTraceMiddleware(engine: AgentEngine): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestTime = new Date();

    res.once('finish', () => {
      engine.addTraceRecord(createTraceRecord({
        method: req.method,
        uri: `${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`,
        requestHeaders: req.headers,
        status: res.statusCode,
        responseHeaders: res.getHeaders(),
        requestTime,
        responseTime: new Date()
      }));
    });

    next();
  };
}
