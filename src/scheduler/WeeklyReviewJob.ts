import type { Logger } from 'pino';
import type { SleepDiaryService } from '../core/diary/SleepDiaryService.js';
import type { WindowProposal } from '../core/window/adjustmentEngine.js';
import { RATIONALE_LABELS } from '../core/window/adjustmentEngine.js';
import { prescribedBedtime } from '../core/window/sleepWindow.js';
import { todayIsoDate, type IsoDate } from '../utils/dates.js';
import { formatPercent, formatWindowLabel } from '../utils/format.js';
import { createLogger } from '../utils/logger.js';

export interface WeeklyReviewOutcome {
  today: IsoDate;
  proposal: WindowProposal;
  applied: boolean;
}

export class WeeklyReviewJob {
  private readonly logger = createLogger({ job: 'WeeklyReviewJob' });

  constructor(
    private readonly service: SleepDiaryService,
    private readonly autoApply: boolean,
    private readonly clock: () => IsoDate = todayIsoDate
  ) {}

  async run(): Promise<WeeklyReviewOutcome> {
    const today = this.clock();
    const logger = this.logger.child({ method: 'run', today });

    if (!this.autoApply) {
      const proposal = this.service.proposeAdjustment(today);
      this.logProposal(logger, proposal);
      return { today, proposal, applied: false };
    }

    const { proposal, applied } = await this.service.applyAdjustment(today);
    this.logProposal(logger, proposal);
    if (applied) {
      logger.info(
        {
          window: formatWindowLabel(proposal.proposed.durationMinutes),
          bedtime: prescribedBedtime(proposal.proposed),
          wake: proposal.proposed.targetWakeTime,
        },
        'Applied new sleep window'
      );
    }
    return { today, proposal, applied };
  }

  private logProposal(logger: Logger, proposal: WindowProposal): void {
    logger.info(
      {
        rationale: proposal.rationale,
        averageSe: proposal.averageSe === undefined ? null : formatPercent(proposal.averageSe),
        current: proposal.current,
        proposed: proposal.proposed,
      },
      RATIONALE_LABELS[proposal.rationale]
    );
  }
}
