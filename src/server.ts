import type { Server } from 'node:http';
import express from 'express';
import type { SleepDiaryService } from './core/diary/SleepDiaryService.js';
import { createDiaryRouter } from './http/diaryRouter.js';
import { createErrorHandler } from './http/errorHandler.js';
import { createRequestLogger } from './http/requestLogger.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger({ component: 'server' });

export function createApp(service: SleepDiaryService): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(createRequestLogger());

  // Health check
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/', createDiaryRouter(service));

  // Error handling
  app.use(createErrorHandler());

  return app;
}

export function startServer(service: SleepDiaryService, port: number, host: string = '0.0.0.0'): Promise<Server> {
  const app = createApp(service);

  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
