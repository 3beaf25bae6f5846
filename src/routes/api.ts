import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ConfigurationError, ParseError, PayloadError, errorMessage } from '../errors.js';
import { EntryPresenter, PresenterDependencies, RecordResultPresenter } from '../presenter.js';
import { StoredRecord, storedRecordSchema } from '../record.js';
import { renderHit } from '../render.js';

const renderRequestSchema = z.object({
  record: storedRecordSchema,
  searchField: z.string().nullable().optional()
});

/**
 * Create API routes for rendering search hits
 */
export function createApiRoutes(deps: PresenterDependencies = {}): Router {
  const router = Router();

  /**
   * POST /api/render
   * Render one search hit
   * Body: { record: { fields, highlighting? }, searchField? }
   */
  router.post('/render', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = renderRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid render request',
        issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
      });
      return;
    }

    try {
      const record = new StoredRecord(parsed.data.record);
      const presenter = new EntryPresenter(
        record,
        new RecordResultPresenter(record),
        parsed.data.searchField ?? null,
        deps
      );
      res.json(await renderHit(presenter));
    } catch (err) {
      next(err);
    }
  });

  router.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof PayloadError) {
      res.status(err.statusCode).json({ error: err.message, issues: err.issues });
      return;
    }
    if (err instanceof ParseError || err instanceof ConfigurationError) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }
    console.error('[api] render failed:', err);
    res.status(500).json({ error: errorMessage(err) });
  });

  return router;
}
