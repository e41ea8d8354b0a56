import pino from 'pino';

// Pino logger instance configured for the app
// name: identifies this logger in output
// level: LOG_LEVEL wins, then production uses info only, dev uses debug
// tests run silent so vitest output stays readable
const defaultLevel = (): string => {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === 'test' || process.env.VITEST) return 'silent';
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
};

export const logger = pino({
  name: 'flat-allocation',
  level: defaultLevel(),
});
