import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { ITargetGenerator } from '../core/TargetGenerator.js';
import type { ILogger } from '../utils/Logger.js';
import { createTarget, errorResponse, showForm, type HandlerResponse } from './handlers.js';

export interface AppConfig {
  generator: ITargetGenerator;
  logger: ILogger;
}

function send(res: Response, response: HandlerResponse): void {
  res.status(response.status).type(response.contentType);
  for (const [name, value] of Object.entries(response.headers ?? {})) {
    res.setHeader(name, value);
  }
  res.send(response.body);
}

/**
 * Logs one line per finished request.
 */
function requestLogger(logger: ILogger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();
    res.on('finish', () => {
      logger.info(`${req.method} ${req.path}`, {
        status: res.statusCode,
        durationMs: Date.now() - startTime,
      });
    });
    next();
  };
}

/**
 * Builds the express application: the form, the generation route and a health check.
 */
export function createApp(config: AppConfig): Express {
  const { generator, logger } = config;
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogger(logger.child('http')));
  app.use(express.urlencoded({ extended: false, limit: '16kb' }));

  app.get('/', (_req, res) => {
    send(res, showForm());
  });

  app.post('/create_target', async (req, res, next) => {
    try {
      send(res, await createTarget(req.body, generator, logger));
    } catch (error) {
      next(error);
    }
  });

  app.get('/healthz', (_req, res) => {
    res.type('text/plain').send('ok');
  });

  // Express recognises error handlers by their four parameters
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    send(res, errorResponse(error, logger));
  });

  return app;
}
