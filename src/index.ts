// Load environment variables first
import 'dotenv/config';

import { join } from 'node:path';
import { config, type Config } from './config/index.js';
import { createLogger } from './utils/logger.js';
import type { DiaryStorePort } from './ports/DiaryStorePort.js';
import { SqliteDiaryStore } from './adapters/store/SqliteDiaryStore.js';
import { JsonFileDiaryStore } from './adapters/store/JsonFileDiaryStore.js';
import { DEFAULT_DATABASE_PATH, closeDatabase, getDatabase } from './persistence/database.js';
import { SleepDiaryService } from './core/diary/SleepDiaryService.js';
import { WeeklyReviewJob } from './scheduler/WeeklyReviewJob.js';
import { scheduleWeeklyReview } from './scheduler/index.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

function createStore(appConfig: Config): DiaryStorePort {
  if (appConfig.storeDriver === 'json') {
    const filePath = appConfig.diaryFilePath ?? join(process.cwd(), 'data', 'sleep-diary.json');
    logger.info({ filePath }, 'Using JSON file diary store');
    return new JsonFileDiaryStore(filePath);
  }
  const dbPath = appConfig.databasePath ?? DEFAULT_DATABASE_PATH;
  logger.info({ dbPath }, 'Using SQLite diary store');
  return new SqliteDiaryStore(getDatabase(dbPath));
}

async function main(): Promise<void> {
  logger.info('Starting sleep diary service');

  try {
    const service = await SleepDiaryService.open(createStore(config), {
      ownerName: config.diaryOwnerName,
      initialWindow: {
        targetWakeTime: config.initialTargetWake,
        durationMinutes: config.initialWindowMinutes,
      },
      rollingWindowDays: config.rollingWindowDays,
      minNightsForAdvice: config.minNightsForAdvice,
      adherenceToleranceMinutes: config.adherenceToleranceMinutes,
    });

    const reviewJob = new WeeklyReviewJob(service, config.autoApplyAdjustments);
    scheduleWeeklyReview(reviewJob, config.reviewTime, config.reviewWeekday, config.timezone);

    const server = await startServer(service, config.port, config.host);

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutting down');
      server.close(() => {
        closeDatabase();
        process.exit(0);
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    logger.info({ host: config.host, port: config.port }, 'Server started successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
