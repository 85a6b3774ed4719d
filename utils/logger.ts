// utils/logger.ts
import pino from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';

// Pino default levels: trace:10, debug:20, info:30, warn:40, error:50, fatal:60
// 'http' sits between debug and info for request logging.
const customLevels = {
  http: 25,
};

// Development: Pretty printing (Colors, readable timestamp)
// Production: JSON (Best for log aggregation)
const transport = isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard', // YYYY-mm-dd HH:MM:ss
        ignore: 'pid,hostname',
      },
    }
  : undefined;

const logger = pino({
  level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
  customLevels,
  // Emit the level label ("level": "info") instead of just the number
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport,
});

export default logger;
