import pino from 'pino';

function buildBaseLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || 'info';

  if (process.env.NODE_ENV === 'development') {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  // Keep test output quiet unless a level is asked for explicitly
  if (process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL) {
    return pino({ level: 'silent' });
  }

  return pino({ level });
}

const baseLogger = buildBaseLogger();

export function generateRequestId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

export function createLogger(context: Record<string, unknown> = {}): pino.Logger {
  return baseLogger.child(context);
}
