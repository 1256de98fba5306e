import pino from 'pino';
import * as dotenv from 'dotenv';
dotenv.config();

const transport = pino.transport({
  target: 'pino-pretty',
  options: { destination: 1 },
});

const baseLogger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
  },
  transport,
);

export const logger = baseLogger.child({
  name: process.env.BOT_NAME || 'local',
});

export type { Logger } from 'pino';
