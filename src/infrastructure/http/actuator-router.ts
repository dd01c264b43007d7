/**
 * Express adapter exposing the engine as actuator endpoints
 */

import express, { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { ACTUATOR_CONTENT_TYPE, AgentEngine } from '../../agent';
import { ActuatorError, EndpointId, ErrorCode, InvalidArgumentError } from '../../types';
import { logger } from '../../shared/utils/logger';

const routerLogger = logger.child('http');

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  RANGE_NOT_SATISFIABLE: 416,
  INVALID_ARGUMENT: 400,
  UNAVAILABLE: 503,
  REMOTE_REGISTRATION_FAILURE: 502,
  CONFIGURATION_ERROR: 500
};

type AsyncHandler = (req: Request, res: Response) => Promise<void> | void;

function handle(fn: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };
}

function sendJson(res: Response, body: unknown, status: number = 200): void {
  res.status(status).type(ACTUATOR_CONTENT_TYPE).send(JSON.stringify(body));
}

function readConfiguredLevel(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('configuredLevel' in body)) {
    return null;
  }
  const { configuredLevel } = body;
  if (configuredLevel === null || configuredLevel === undefined) {
    return null;
  }
  if (typeof configuredLevel !== 'string') {
    throw new InvalidArgumentError('configuredLevel must be a string or null');
  }
  return configuredLevel;
}

export function createActuatorRouter(engine: AgentEngine): Router {
  const router = express.Router();
  router.use(express.json());

  const enabled = (endpoint: EndpointId): boolean => engine.isEndpointEnabled(endpoint);

  router.get('/', handle((req, res) => {
    sendJson(res, engine.getEndpoints(`${req.protocol}://${req.get('host') ?? 'localhost'}${req.baseUrl}`));
  }));

  if (enabled('env')) {
    router.get('/env', handle((_req, res) => sendJson(res, engine.getEnvironment())));
  }

  if (enabled('info')) {
    router.get('/info', handle((_req, res) => sendJson(res, engine.getAppInfo())));
  }

  if (enabled('health')) {
    router.get('/health', handle(async (_req, res) => {
      const health = await engine.getHealth();
      sendJson(res, health, health.httpStatus());
    }));
  }

  if (enabled('metrics')) {
    router.get('/metrics', handle((_req, res) => sendJson(res, engine.getMetricNames())));
    router.get('/metrics/:name', handle(async (req, res) => {
      sendJson(res, await engine.getMetricMeasurement(req.params.name));
    }));
  }

  if (enabled('loggers')) {
    router.get('/loggers', handle((_req, res) => sendJson(res, engine.getLoggers())));
    router.get('/loggers/:name', handle((req, res) => sendJson(res, engine.getLogger(req.params.name))));
    router.post('/loggers/:name', handle((req, res) => {
      engine.setLoggerLevel(req.params.name, readConfiguredLevel(req.body));
      sendJson(res, {});
    }));
  }

  if (enabled('logfile')) {
    router.get('/logfile', handle((req, res) => {
      const range = req.get('range');
      if (!range) {
        sendJson(res, engine.getLogRange());
        return;
      }

      const { content, start, end } = engine.getLogfile(range);
      res.status(206)
        .set({
          'Content-Type': 'text/html; charset=UTF-8',
          'Accept-Ranges': 'bytes',
          'Content-Range': `bytes ${start}-${end}/${end}`
        })
        .send(content);
    }));
  }

  for (const alias of ['trace', 'httptrace'] as const) {
    if (enabled(alias)) {
      router.get(`/${alias}`, handle((_req, res) => sendJson(res, engine.getHttpTrace())));
    }
  }

  for (const alias of ['dump', 'threaddump'] as const) {
    if (enabled(alias)) {
      router.get(`/${alias}`, handle((_req, res) => sendJson(res, engine.getThreadDump())));
    }
  }

  router.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof ActuatorError) {
      sendJson(res, { error: error.message, code: error.code }, STATUS_BY_CODE[error.code]);
      return;
    }
    if (error instanceof SyntaxError) {
      sendJson(res, { error: `Malformed request body: ${error.message}`, code: 'INVALID_ARGUMENT' }, 400);
      return;
    }
    routerLogger.error('Unhandled actuator error:', error);
    sendJson(res, { error: 'Internal server error' }, 500);
  });

  return router;
}
