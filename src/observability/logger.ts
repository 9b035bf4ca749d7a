import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

export const logger = pino({
  name: 'coupon-issuer',
  level,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  redact: ['secretKey', 'headers.Authorization'],
  ...(process.env.NODE_ENV === 'development'
    ? { transport: { target: 'pino/file', options: { destination: 1 } } }
    : {}),
});

/** Create a child logger scoped to one run of the issuer */
export function runLogger(runId: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ runId, ...extra });
}
