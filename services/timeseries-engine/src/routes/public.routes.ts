import { Router } from 'express';
import { candlesController } from '../controllers/candles.controller.js';
import { ticksController } from '../controllers/ticks.controller.js';
import type { TimeseriesEngine } from '../engine.js';
import { asyncHandler } from '../middleware/async-handler.js';

export function publicRoutes(engine: TimeseriesEngine) {
  const candles = candlesController(engine);
  const ticks = ticksController(engine);
  const pub = Router();
  pub.get('/candles/:symbol/:timeframe', asyncHandler(candles.range));
  pub.get('/candles/:symbol/:timeframe/latest', asyncHandler(candles.latest));
  pub.get('/indicators/:symbol/:timeframe/atr', asyncHandler(candles.atr));
  pub.get('/indicators/:symbol/:timeframe/sma', asyncHandler(candles.sma));
  pub.get('/indicators/:symbol/:timeframe/ema', asyncHandler(candles.ema));
  pub.get('/ticks/:symbol', asyncHandler(ticks.history));
  return pub;
}
