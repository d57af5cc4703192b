import pino from 'pino';
import { cfg } from '../config/index.js';

export type { Logger } from 'pino';

export const logger = pino(
  cfg.logPretty
    ? { level: cfg.logLevel, transport: { target: 'pino-pretty', options: { colorize: true } } }
    : { level: cfg.logLevel }
);
