import { pino } from 'pino';

const underTest = process.env.VITEST !== undefined;

const logger = underTest
  ? pino({ level: 'silent' })
  : pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: {
      target: 'pino-pretty', // human-readable logs
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
      },
    },
  });

export default logger;
