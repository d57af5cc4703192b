import type { Request, Response } from 'express';
import { registry } from '../metrics/metrics.js';
import { readinessSvc, type Probe } from '../services/health.service.js';

export function healthController(probes: { db?: Probe; redis?: Probe }) {
  return {
    async liveness(_req: Request, res: Response) {
      res.json({ ok: true });
    },
    async readiness(_req: Request, res: Response) {
      const result = await readinessSvc(probes);
      res.status(result.status === 'ready' ? 200 : 503).json(result);
    },
    async promMetrics(_req: Request, res: Response) {
      res.setHeader('Content-Type', registry.contentType);
      res.end(await registry.metrics());
    },
  };
}
