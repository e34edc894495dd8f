import { Inject, Injectable, Logger } from '@nestjs/common';

import { ReminderBatchEvaluatorService } from './reminder-batch-evaluator.service';
import { ReminderDispatcherService } from './reminder-dispatcher.service';
import { AppConfigService } from '../../../config/app-config.service';
import { NotificationPreferencesRepository } from '../../../database/repositories/notification-preferences.repository';
import type { IReminderCandidateRow } from '../../../database/repositories/notification-preferences.repository.interfaces';
import { MetricsService } from '../../observability/metrics.service';
import type { IReminderDispatchSummary } from '../entities/reminder-dispatch.interfaces';
import { ReminderTickStatus } from '../entities/reminder-tick.interfaces';
import { REMINDER_KINDS, type IReminderBatchResult } from '../entities/reminder.interfaces';

const MS_PER_MINUTE = 60_000;

@Injectable()
export class ReminderTickDependencies {
  @Inject(NotificationPreferencesRepository)
  public readonly notificationPreferencesRepository!: NotificationPreferencesRepository;

  @Inject(ReminderBatchEvaluatorService)
  public readonly reminderBatchEvaluatorService!: ReminderBatchEvaluatorService;

  @Inject(ReminderDispatcherService)
  public readonly reminderDispatcherService!: ReminderDispatcherService;

  @Inject(MetricsService)
  public readonly metricsService!: MetricsService;

  @Inject(AppConfigService)
  public readonly appConfigService!: AppConfigService;
}

/**
 * One pass of the reminder pipeline: load candidates, evaluate them for the
 * given minute, dispatch. Each UTC minute is processed at most once and
 * ticks never overlap.
 */
@Injectable()
export class ReminderTickService {
  private readonly logger: Logger = new Logger(ReminderTickService.name);
  private tickInProgress: boolean = false;
  private lastProcessedMinute: number | null = null;

  public constructor(private readonly deps: ReminderTickDependencies) {}

  public async runTick(now: Date): Promise<ReminderTickStatus> {
    const minuteKey: number = Math.floor(now.getTime() / MS_PER_MINUTE);

    if (this.tickInProgress) {
      this.logger.warn(`reminder_tick_skipped reason=in_progress at=${now.toISOString()}`);
      this.deps.metricsService.reminderTicksTotal.inc({ status: 'skipped' });
      return ReminderTickStatus.SKIPPED_IN_PROGRESS;
    }

    if (this.lastProcessedMinute === minuteKey) {
      this.logger.debug(`reminder_tick_skipped reason=duplicate_minute at=${now.toISOString()}`);
      this.deps.metricsService.reminderTicksTotal.inc({ status: 'skipped' });
      return ReminderTickStatus.SKIPPED_DUPLICATE_MINUTE;
    }

    this.tickInProgress = true;
    this.lastProcessedMinute = minuteKey;
    const stopTimer: () => number = this.deps.metricsService.reminderTickDurationSeconds.startTimer();

    try {
      const candidates: readonly IReminderCandidateRow[] =
        await this.deps.notificationPreferencesRepository.listReminderCandidates();
      const result: IReminderBatchResult = this.deps.reminderBatchEvaluatorService.evaluate(
        now,
        candidates,
        this.deps.appConfigService.waterReminderStrategy,
      );

      this.recordBatchMetrics(result);

      const summary: IReminderDispatchSummary =
        await this.deps.reminderDispatcherService.dispatch(result, now);

      this.deps.metricsService.reminderTicksTotal.inc({ status: 'ok' });
      this.logger.debug(
        `reminder_tick_complete at=${now.toISOString()} candidates=${String(candidates.length)} skipped=${String(result.skipped.length)} sent=${String(summary.sent)} failed=${String(summary.failed)}`,
      );

      return ReminderTickStatus.COMPLETED;
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.deps.metricsService.reminderTicksTotal.inc({ status: 'failed' });
      this.logger.error(`reminder_tick_failed at=${now.toISOString()} reason=${errorMessage}`);

      return ReminderTickStatus.FAILED;
    } finally {
      stopTimer();
      this.tickInProgress = false;
    }
  }

  private recordBatchMetrics(result: IReminderBatchResult): void {
    for (const kind of REMINDER_KINDS) {
      this.deps.metricsService.reminderDueUsers.set({ kind }, result.dueByKind[kind].length);
    }

    if (result.skipped.length > 0) {
      this.deps.metricsService.reminderCandidatesSkippedTotal.inc(result.skipped.length);
    }
  }
}
