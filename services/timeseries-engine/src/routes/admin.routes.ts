import { Router } from 'express';
import { adminController } from '../controllers/admin.controller.js';
import { ticksController } from '../controllers/ticks.controller.js';
import type { TimeseriesEngine } from '../engine.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { requireApiKey } from '../middleware/auth.js';

export function adminRoutes(engine: TimeseriesEngine, apiKey: string) {
  const admin = adminController(engine);
  const ticks = ticksController(engine);
  const r = Router();
  const guard = requireApiKey(apiKey);

  r.post('/ingest', guard, asyncHandler(ticks.ingest));

  r.get('/admin/aggregates', guard, asyncHandler(admin.listAggregates));
  r.post('/admin/aggregates', guard, asyncHandler(admin.defineAggregate));
  r.post('/admin/aggregates/:name/reprocess', guard, asyncHandler(admin.reprocess));
  r.post('/admin/compression-policies', guard, asyncHandler(admin.setCompression));
  r.post('/admin/retention-policies', guard, asyncHandler(admin.setRetention));
  r.post('/admin/lifecycle/run', guard, asyncHandler(admin.runLifecycle));
  r.get('/admin/chunks', guard, asyncHandler(admin.listChunks));
  return r;
}
