import 'dotenv/config';
import { pino } from 'pino';

// LOG_LEVEL may come from .env, so dotenv has to run before the logger is built.
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'scanlator-tracker' },
  transport: {
    target: 'pino/file',
    options: { destination: 1 },
  },
  formatters: {
    level: (label: string) => ({ level: label.toUpperCase() }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});
