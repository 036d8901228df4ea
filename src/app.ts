import express, { ErrorRequestHandler, Express, RequestHandler } from 'express';
import { logger } from './logger';
import { IndexPageDeps, indexRoute } from './modules/indexPage';
import { renderErrorPage } from './views';

// Four arguments mark this as Express's error middleware.
export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  logger.error(
    { err, path: req.path },
    'Unhandled error while rendering page'
  );
  res.status(500).type('html').send(renderErrorPage());
};

// Liveness check for process managers; touches no upstream.
export const healthRoute: RequestHandler = (_req, res) => {
  res.json({ status: 'ok' });
};

export function createApp(deps: IndexPageDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get('/', indexRoute(deps));

  app.get('/health', healthRoute);

  app.use(errorHandler);

  return app;
}
