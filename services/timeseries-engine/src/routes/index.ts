import { Router, type Request, type Response, type NextFunction } from 'express';
import type { TimeseriesEngine } from '../engine.js';
import { httpReqDuration } from '../metrics/metrics.js';
import type { Probe } from '../services/health.service.js';
import { adminRoutes } from './admin.routes.js';
import { opsRoutes } from './ops.routes.js';
import { publicRoutes } from './public.routes.js';

export type ApiOptions = { apiKey: string; probes?: { db?: Probe; redis?: Probe } };

export function apiRouter(engine: TimeseriesEngine, opts: ApiOptions) {
  const r = Router();
  r.use((req: Request, res: Response, next: NextFunction) => {
    const end = httpReqDuration.startTimer({ method: req.method, route: req.path });
    res.on('finish', () => end({ code: String(res.statusCode) }));
    next();
  });
  r.use(opsRoutes(opts.probes ?? {}));
  r.use(publicRoutes(engine));
  r.use(adminRoutes(engine, opts.apiKey));
  r.use((_req, res) => res.status(404).json({ error: { code: 'NOT_FOUND', message: 'route' } }));
  return r;
}
