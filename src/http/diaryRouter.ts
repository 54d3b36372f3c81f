import type { NextFunction, Request, Response, Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { SleepDiaryService } from '../core/diary/SleepDiaryService.js';
import { prescribedBedtime } from '../core/window/sleepWindow.js';
import { renderPeriodReportText } from '../core/report/periodReport.js';
import {
  DiaryEntryBodySchema,
  IsoDateSchema,
  SleepWindowSchema,
  WindowAppendSchema,
  parseOrThrow,
} from '../validation/schemas.js';
import { todayIsoDate } from '../utils/dates.js';
import { NotFoundError } from '../utils/errors.js';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler
function handle(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}

const RangeQuerySchema = z.object({
  from: IsoDateSchema.optional(),
  to: IsoDateSchema.optional(),
});

const RequiredRangeQuerySchema = z.object({
  from: IsoDateSchema,
  to: IsoDateSchema,
});

const TodayQuerySchema = z.object({
  today: IsoDateSchema.optional(),
});

const ActiveQuerySchema = z.object({
  date: IsoDateSchema.optional(),
});

const ReportQuerySchema = RequiredRangeQuerySchema.extend({
  format: z.enum(['json', 'text']).default('json'),
});

const ApplyBodySchema = z.object({
  today: IsoDateSchema.optional(),
  effectiveFrom: IsoDateSchema.optional(),
});

function pathDate(req: Request): string {
  return parseOrThrow(IsoDateSchema, req.params.date, 'date');
}

export function createDiaryRouter(service: SleepDiaryService): Router {
  const router = express.Router();

  // --- Entries ---

  router.get(
    '/entries',
    handle(async (req, res) => {
      const { from, to } = parseOrThrow(RangeQuerySchema, req.query, 'query');
      res.json({ entries: service.listEntries(from, to) });
    })
  );

  router.get(
    '/entries/:date',
    handle(async (req, res) => {
      const logDate = pathDate(req);
      const entry = service.getEntry(logDate);
      if (!entry) {
        throw new NotFoundError(`No diary entry for ${logDate}`);
      }
      res.json({ entry });
    })
  );

  router.put(
    '/entries/:date',
    handle(async (req, res) => {
      const logDate = pathDate(req);
      const body = parseOrThrow(DiaryEntryBodySchema, req.body, 'diary entry');
      const entry = { ...body, logDate };
      const night = await service.recordEntry(entry);
      res.json({ entry: service.getEntry(logDate), night });
    })
  );

  router.delete(
    '/entries/:date',
    handle(async (req, res) => {
      const entry = await service.removeEntry(pathDate(req));
      res.json({ entry });
    })
  );

  router.get(
    '/nights',
    handle(async (req, res) => {
      const { from, to } = parseOrThrow(RangeQuerySchema, req.query, 'query');
      res.json({ nights: service.nightResults(from, to) });
    })
  );

  // --- Analysis ---

  router.get(
    '/analysis',
    handle(async (req, res) => {
      const { today = todayIsoDate() } = parseOrThrow(TodayQuerySchema, req.query, 'query');
      res.json(service.analysis(today));
    })
  );

  router.get(
    '/proposal',
    handle(async (req, res) => {
      const { today = todayIsoDate() } = parseOrThrow(TodayQuerySchema, req.query, 'query');
      res.json({ proposal: service.proposeAdjustment(today) });
    })
  );

  router.post(
    '/proposal/apply',
    handle(async (req, res) => {
      const { today = todayIsoDate(), effectiveFrom } = parseOrThrow(ApplyBodySchema, req.body ?? {}, 'request');
      const result = await service.applyAdjustment(today, effectiveFrom ?? today);
      res.status(result.applied ? 201 : 200).json(result);
    })
  );

  // --- Window history ---

  router.get(
    '/windows',
    handle(async (_req, res) => {
      res.json({ history: service.windowHistory() });
    })
  );

  router.post(
    '/windows',
    handle(async (req, res) => {
      const record = parseOrThrow(WindowAppendSchema, req.body, 'window record');
      await service.appendWindow(record);
      res.status(201).json({ record });
    })
  );

  router.get(
    '/windows/active',
    handle(async (req, res) => {
      const { date = todayIsoDate() } = parseOrThrow(ActiveQuerySchema, req.query, 'query');
      const active = service.activeWindowOn(date);
      res.json({ date, ...active, prescribedBedtime: prescribedBedtime(active.record.window) });
    })
  );

  router.get(
    '/windows/timeline',
    handle(async (req, res) => {
      const { from, to } = parseOrThrow(RequiredRangeQuerySchema, req.query, 'query');
      res.json({ timeline: service.windowTimeline(from, to) });
    })
  );

  router.put(
    '/windows/:date',
    handle(async (req, res) => {
      const effectiveFrom = pathDate(req);
      const window = parseOrThrow(SleepWindowSchema, req.body, 'sleep window');
      await service.editWindow(effectiveFrom, window);
      res.json({ history: service.windowHistory() });
    })
  );

  router.delete(
    '/windows/:date',
    handle(async (req, res) => {
      const record = await service.removeWindow(pathDate(req));
      res.json({ record });
    })
  );

  // --- Reports ---

  router.get(
    '/report',
    handle(async (req, res) => {
      const { from, to, format } = parseOrThrow(ReportQuerySchema, req.query, 'query');
      const report = service.report(from, to);
      if (format === 'text') {
        res.type('text/plain').send(renderPeriodReportText(report));
        return;
      }
      res.json(report);
    })
  );

  return router;
}
