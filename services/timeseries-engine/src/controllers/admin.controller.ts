import type { Request, Response } from 'express';
import { AggregateConfig, CompressionConfig, RetentionConfig } from '../config/policies.js';
import type { TimeseriesEngine } from '../engine.js';
import { LifecycleRunBody, ReprocessBody } from '../utils/validators.js';

export function adminController(engine: TimeseriesEngine) {
  return {
    async defineAggregate(req: Request, res: Response) {
      const spec = AggregateConfig.parse(req.body);
      res.status(201).json(engine.defineAggregate(spec));
    },

    async listAggregates(_req: Request, res: Response) {
      res.json({ items: engine.aggregates() });
    },

    async reprocess(req: Request, res: Response) {
      const { start, end } = ReprocessBody.parse(req.body);
      res.json(await engine.reprocess(req.params.name, start, end));
    },

    async setCompression(req: Request, res: Response) {
      const policy = CompressionConfig.parse(req.body);
      res.status(201).json(engine.setCompressionPolicy(policy));
    },

    async setRetention(req: Request, res: Response) {
      const policy = RetentionConfig.parse(req.body);
      res.status(201).json(engine.setRetentionPolicy(policy));
    },

    async runLifecycle(req: Request, res: Response) {
      const { now } = LifecycleRunBody.parse(req.body ?? {});
      res.json(await engine.runLifecycle(now));
    },

    async listChunks(req: Request, res: Response) {
      const table = typeof req.query.table === 'string' ? req.query.table : undefined;
      res.json({ items: engine.chunks(table) });
    },
  };
}
