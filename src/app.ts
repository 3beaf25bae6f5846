import express, { Application, NextFunction, Request, Response } from 'express';
import { getBibliographyIdMapper } from './bibliography.js';
import { errorMessage } from './errors.js';
import { PresenterDependencies } from './presenter.js';
import { createApiRoutes } from './routes/api.js';
import { getStylesheetCache } from './stylesheet-cache.js';

/**
 * Create and configure the Express application
 */
export function createApp(deps: PresenterDependencies = {}): Application {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '5mb' }));

  // API routes
  app.use('/api', createApiRoutes(deps));

  // Health check
  app.get('/health', (_req, res) => {
    const stylesheets = deps.stylesheets ?? getStylesheetCache();
    const bibliography = deps.bibliography ?? getBibliographyIdMapper();
    res.json({
      status: 'ok',
      stylesheets: stylesheets.stats.compiled,
      bibliography: bibliography.size
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Errors raised before a router takes over, such as an unparsable JSON body
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatus(err);
    if (status < 500) {
      res.status(status).json({ error: isBodyParseError(err) ? 'Malformed JSON body' : errorMessage(err) });
      return;
    }
    console.error('[app] request failed:', err);
    res.status(status).json({ error: errorMessage(err) });
  });

  return app;
}

function httpStatus(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}
