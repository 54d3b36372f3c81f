import type {
  DiaryEntry,
  DiaryProfile,
  DiarySnapshot,
  IsoDate,
  NightResult,
  SleepWindow,
  WindowHistoryRecord,
} from '../types.js';
import type { DiaryStorePort } from '../../ports/DiaryStorePort.js';
import { computeNightMetrics } from '../metrics/nightMetrics.js';
import { aggregateRollingWindow, type RollingSummary } from '../metrics/rollingAggregator.js';
import { assessAdherence, type AdherenceSummary } from '../metrics/adherence.js';
import { assessNaps, type NapAssessment } from '../metrics/napAssessment.js';
import { proposeWindowAdjustment, type WindowProposal } from '../window/adjustmentEngine.js';
import { WindowHistoryLedger, type ActiveWindow, type TimelineDay } from '../ledger/WindowHistoryLedger.js';
import { buildPeriodReport, type PeriodReport } from '../report/periodReport.js';
import { assertIsoDate, compareIsoDates, todayIsoDate } from '../../utils/dates.js';
import { CorruptStoreError, NotFoundError, PersistenceError, ValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export interface SleepDiaryOptions {
  ownerName: string;
  initialWindow: SleepWindow;
  rollingWindowDays: number;
  minNightsForAdvice: number;
  adherenceToleranceMinutes: number;
  /** Date used when a fresh diary is created. */
  clock?: () => IsoDate;
}

export interface DiaryAnalysis {
  today: IsoDate;
  activeWindow: ActiveWindow;
  summary: RollingSummary;
  proposal: WindowProposal;
  adherence: AdherenceSummary;
  naps: NapAssessment;
}

export interface AppliedAdjustment {
  applied: boolean;
  proposal: WindowProposal;
  record?: WindowHistoryRecord;
}

function copyEntry(entry: DiaryEntry): DiaryEntry {
  return {
    ...entry,
    awakenings: entry.awakenings.map(({ start, end }) => ({ start, end })),
    naps: entry.naps.map(({ start, end }) => ({ start, end })),
  };
}

// A stored record that fails validation means the store is corrupt, not the caller's input
function storedOrCorrupt<T>(what: string, read: () => T): T {
  try {
    return read();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new CorruptStoreError(`Stored ${what} is invalid: ${error.issues.join('; ')}`, { cause: error });
    }
    throw error;
  }
}

function inRange(date: IsoDate, from?: IsoDate, to?: IsoDate): boolean {
  if (from !== undefined && compareIsoDates(date, from) < 0) return false;
  if (to !== undefined && compareIsoDates(date, to) > 0) return false;
  return true;
}

/**
 * One diary owner's entries and window history, with the derived metrics and
 * recommendations computed on demand. Mutations are validated first, then
 * saved; when a save fails the in-memory state stays as validated and the
 * failure is raised as a PersistenceError.
 */
export class SleepDiaryService {
  private readonly logger = createLogger({ service: 'SleepDiaryService' });
  private readonly entries: Map<IsoDate, DiaryEntry>;

  private constructor(
    private readonly store: DiaryStorePort,
    private readonly options: SleepDiaryOptions,
    private readonly profile: DiaryProfile,
    entries: DiaryEntry[],
    private readonly ledger: WindowHistoryLedger
  ) {
    this.entries = new Map(entries.map((entry) => [entry.logDate, copyEntry(entry)]));
  }

  static async open(store: DiaryStorePort, options: SleepDiaryOptions): Promise<SleepDiaryService> {
    const logger = createLogger({ service: 'SleepDiaryService', method: 'open' });
    const snapshot = await store.load();

    if (snapshot) {
      const ledger = storedOrCorrupt('window history', () => WindowHistoryLedger.fromRecords(snapshot.history));
      for (const entry of snapshot.entries) {
        storedOrCorrupt(`entry ${entry.logDate}`, () => computeNightMetrics(entry));
      }
      logger.info({ entries: snapshot.entries.length, windows: snapshot.history.length }, 'Opened diary');
      return new SleepDiaryService(store, options, snapshot.profile, snapshot.entries, ledger);
    }

    const today = (options.clock ?? todayIsoDate)();
    const service = new SleepDiaryService(
      store,
      options,
      { name: options.ownerName, createdOn: today },
      [],
      WindowHistoryLedger.create({ effectiveFrom: today, window: options.initialWindow })
    );
    await service.persist('creating the diary');
    logger.info({ today, window: options.initialWindow }, 'Created new diary');
    return service;
  }

  get owner(): DiaryProfile {
    return { ...this.profile };
  }

  snapshot(): DiarySnapshot {
    return {
      profile: { ...this.profile },
      entries: this.listEntries(),
      history: this.ledger.records(),
    };
  }

  // --- Entries ---

  /** Stores the entry for its log date, replacing any earlier entry wholesale. */
  async recordEntry(entry: DiaryEntry): Promise<NightResult> {
    const night = computeNightMetrics(entry);
    const replaced = this.entries.has(entry.logDate);
    this.entries.set(entry.logDate, copyEntry(entry));
    this.logger.info({ logDate: entry.logDate, replaced, status: night.status }, 'Recorded diary entry');
    await this.persist(`recording ${entry.logDate}`);
    return night;
  }

  async removeEntry(logDate: IsoDate): Promise<DiaryEntry> {
    const existing = this.entries.get(assertIsoDate(logDate, 'logDate'));
    if (!existing) {
      throw new NotFoundError(`No diary entry for ${logDate}`);
    }
    this.entries.delete(logDate);
    this.logger.info({ logDate }, 'Removed diary entry');
    await this.persist(`removing ${logDate}`);
    return copyEntry(existing);
  }

  getEntry(logDate: IsoDate): DiaryEntry | null {
    const entry = this.entries.get(assertIsoDate(logDate, 'logDate'));
    return entry ? copyEntry(entry) : null;
  }

  listEntries(from?: IsoDate, to?: IsoDate): DiaryEntry[] {
    return [...this.entries.values()]
      .filter((entry) => inRange(entry.logDate, from, to))
      .sort((a, b) => compareIsoDates(a.logDate, b.logDate))
      .map(copyEntry);
  }

  nightResults(from?: IsoDate, to?: IsoDate): NightResult[] {
    return this.listEntries(from, to).map(computeNightMetrics);
  }

  // --- Analysis ---

  /**
   * Rolling SE for the nights up to `today`, counted only from the date the
   * currently active window took effect.
   */
  rollingSummary(today: IsoDate): RollingSummary {
    const active = this.activeWindowOn(today);
    return aggregateRollingWindow(this.nightResults(), {
      today,
      days: this.options.rollingWindowDays,
      since: active.gap ? undefined : active.record.effectiveFrom,
      minNights: this.options.minNightsForAdvice,
    });
  }

  proposeAdjustment(today: IsoDate): WindowProposal {
    return proposeWindowAdjustment(this.rollingSummary(today), this.activeWindowOn(today).record.window);
  }

  /**
   * Appends the rule-triggered window when the proposal changes it. Goes
   * through the same ledger gate as manual changes, so a record already
   * effective on `effectiveFrom` makes this fail rather than merge.
   */
  async applyAdjustment(today: IsoDate, effectiveFrom: IsoDate = today): Promise<AppliedAdjustment> {
    const proposal = this.proposeAdjustment(today);
    if (proposal.rationale !== 'increase' && proposal.rationale !== 'decrease') {
      this.logger.info({ today, rationale: proposal.rationale }, 'No window change to apply');
      return { applied: false, proposal };
    }
    const record: WindowHistoryRecord = { effectiveFrom, window: proposal.proposed, rationale: proposal.rationale };
    await this.appendWindow(record);
    return { applied: true, proposal, record };
  }

  adherence(today: IsoDate): AdherenceSummary {
    const summary = this.rollingSummary(today);
    return assessAdherence(
      this.listEntries(summary.windowStart, summary.windowEnd),
      (date) => this.ledger.activeWindowOn(date).record.window,
      this.options.adherenceToleranceMinutes
    );
  }

  napAssessment(today: IsoDate): NapAssessment {
    const summary = this.rollingSummary(today);
    return assessNaps(this.nightResults(summary.windowStart, summary.windowEnd));
  }

  analysis(today: IsoDate): DiaryAnalysis {
    return {
      today,
      activeWindow: this.activeWindowOn(today),
      summary: this.rollingSummary(today),
      proposal: this.proposeAdjustment(today),
      adherence: this.adherence(today),
      naps: this.napAssessment(today),
    };
  }

  report(from: IsoDate, to: IsoDate): PeriodReport {
    return buildPeriodReport(this.listEntries(), (date) => this.ledger.activeWindowOn(date).record.window, {
      from,
      to,
    });
  }

  // --- Window history ---

  windowHistory(): WindowHistoryRecord[] {
    return this.ledger.records();
  }

  activeWindowOn(date: IsoDate): ActiveWindow {
    const active = this.ledger.activeWindowOn(date);
    if (active.gap) {
      this.logger.warn({ date, effectiveFrom: active.record.effectiveFrom }, active.warning ?? 'Window lookup gap');
    }
    return active;
  }

  windowTimeline(from: IsoDate, to: IsoDate): TimelineDay[] {
    return this.ledger.timeline(from, to);
  }

  async appendWindow(record: WindowHistoryRecord): Promise<void> {
    this.ledger.append(record);
    this.logger.info({ effectiveFrom: record.effectiveFrom, rationale: record.rationale }, 'Appended window record');
    await this.persist(`appending the window effective ${record.effectiveFrom}`);
  }

  async editWindow(effectiveFrom: IsoDate, window: SleepWindow): Promise<void> {
    this.ledger.edit(effectiveFrom, window);
    this.logger.info({ effectiveFrom, window }, 'Edited window record');
    await this.persist(`editing the window effective ${effectiveFrom}`);
  }

  async removeWindow(effectiveFrom: IsoDate): Promise<WindowHistoryRecord> {
    const removed = this.ledger.remove(effectiveFrom);
    this.logger.info({ effectiveFrom }, 'Removed window record');
    await this.persist(`removing the window effective ${effectiveFrom}`);
    return removed;
  }

  private async persist(action: string): Promise<void> {
    try {
      await this.store.save(this.snapshot());
    } catch (error) {
      this.logger.error({ error, action }, 'Failed to save diary; keeping in-memory state');
      throw new PersistenceError(`Saving the diary failed while ${action}`, { cause: error });
    }
  }
}
