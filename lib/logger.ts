import pino, { Logger } from 'pino';

// Structured logger shared by the library and the route handlers.
// Call sites use the `logger.level({ context }, 'message')` form.
export const logger: Logger = pino({
  level: process.env.LOG_LEVEL?.toLowerCase() || 'info',
  base: { service: 'tld-similar-domains' },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
});

export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}

export default logger;
