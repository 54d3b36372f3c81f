import cron, { type ScheduledTask } from 'node-cron';
import { createLogger } from '../utils/logger.js';
import type { WeeklyReviewJob } from './WeeklyReviewJob.js';

const logger = createLogger({ component: 'scheduler' });

export function weeklyCronExpression(reviewTime: string, weekday: number): string {
  const [hourStr, minuteStr] = reviewTime.split(':');
  const hour = Number(hourStr);
  const minute = Number(minuteStr);
  if (Number.isNaN(hour) || Number.isNaN(minute) || hourStr === undefined || minuteStr === undefined) {
    throw new Error(`Invalid REVIEW_TIME format: ${reviewTime}`);
  }
  return `${minute} ${hour} * * ${weekday}`;
}

export function scheduleWeeklyReview(
  job: WeeklyReviewJob,
  reviewTime: string,
  weekday: number,
  timezone: string
): ScheduledTask {
  const cronExpression = weeklyCronExpression(reviewTime, weekday);
  logger.info({ cronExpression, timezone }, 'Scheduling weekly review job');

  return cron.schedule(
    cronExpression,
    () => {
      job.run().catch((error) => {
        logger.error({ error }, 'Weekly review job failed');
      });
    },
    { timezone }
  );
}
