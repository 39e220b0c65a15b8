import pino from 'pino';
import { cfg } from '../config/index.js';
export const logger = pino(
  cfg.logPretty
    ? { name: 'ingestor', level: cfg.logLevel, transport: { target: 'pino-pretty', options: { colorize: true } } }
    : { name: 'ingestor', level: cfg.logLevel }
);
