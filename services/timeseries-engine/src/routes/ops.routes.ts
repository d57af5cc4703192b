import { Router } from 'express';
import { healthController } from '../controllers/health.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';
import type { Probe } from '../services/health.service.js';

export function opsRoutes(probes: { db?: Probe; redis?: Probe }) {
  const c = healthController(probes);
  const ops = Router();
  ops.get('/health/liveness', asyncHandler(c.liveness));
  ops.get('/health/readiness', asyncHandler(c.readiness));
  ops.get('/ops/metrics', asyncHandler(c.promMetrics));
  return ops;
}
