import pino from 'pino';

// Structured JSON logs; Lambda adds its own timestamp
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  timestamp: false,
  formatters: {
    level: (label) => ({ level: label }),
  },
  // Collector credentials must never reach the logs
  redact: {
    paths: [
      'authorization',
      'Authorization',
      'token',
      'accessToken',
      'password',
      'apiKey',
      '*.password',
      '*.apiKey',
    ],
    censor: '[REDACTED]',
  },
});

// Child logger scoped to one batch run or request
export function createRunLogger(runId: string, context?: Record<string, unknown>) {
  return logger.child({
    runId,
    ...context,
  });
}

export type Logger = typeof logger;
