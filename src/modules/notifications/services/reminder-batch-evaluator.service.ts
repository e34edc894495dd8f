import { Injectable, Logger } from '@nestjs/common';
import { type z } from 'zod';

import { ReminderEligibilityService } from './reminder-eligibility.service';
import { isValidTimezone } from './timezone.util';
import { RateLimitedWarningEmitter } from '../../../common/utils/logging/rate-limited-warning-emitter';
import { formatZodIssues } from '../../../common/utils/validation/format-zod-issues';
import { AppConfigService } from '../../../config/app-config.service';
import { reminderCandidateSchema } from '../entities/reminder-candidate.schema';
import {
  REMINDER_KINDS,
  ReminderKind,
  type IReminderBatchResult,
  type IReminderCandidate,
  type ISkippedCandidate,
  type WaterReminderStrategy,
} from '../entities/reminder.interfaces';

const MS_PER_SECOND = 1000;

@Injectable()
export class ReminderBatchEvaluatorService {
  private readonly logger: Logger = new Logger(ReminderBatchEvaluatorService.name);
  private readonly invalidTimezoneWarnings: RateLimitedWarningEmitter;

  public constructor(
    private readonly reminderEligibilityService: ReminderEligibilityService,
    appConfigService: AppConfigService,
  ) {
    this.invalidTimezoneWarnings = new RateLimitedWarningEmitter(
      appConfigService.invalidTimezoneWarnCooldownSec * MS_PER_SECOND,
    );
  }

  /**
   * Splits a batch of raw preference rows into per-kind lists of user ids due
   * right now. A row that fails validation or evaluation is skipped and
   * reported without affecting the others.
   */
  public evaluate(
    now: Date,
    rawCandidates: readonly unknown[],
    waterStrategy: WaterReminderStrategy,
  ): IReminderBatchResult {
    const dueByKind: Record<ReminderKind, string[]> = this.createEmptyDueMap();
    const skipped: ISkippedCandidate[] = [];

    rawCandidates.forEach((rawCandidate: unknown, index: number): void => {
      const parsed: z.ZodSafeParseResult<z.output<typeof reminderCandidateSchema>> =
        reminderCandidateSchema.safeParse(rawCandidate);

      if (!parsed.success) {
        const skippedCandidate: ISkippedCandidate = {
          index,
          userId: this.extractUserId(rawCandidate),
          reason: formatZodIssues(parsed.error),
        };
        skipped.push(skippedCandidate);
        this.logger.warn(
          `reminder_candidate_skipped index=${String(index)} userId=${skippedCandidate.userId ?? 'n/a'} reason=${skippedCandidate.reason}`,
        );
        return;
      }

      const candidate: IReminderCandidate = parsed.data;
      this.warnOnInvalidTimezone(candidate);

      try {
        const dueKinds: readonly ReminderKind[] = this.resolveDueKinds(
          now,
          candidate,
          waterStrategy,
        );

        for (const kind of dueKinds) {
          dueByKind[kind].push(candidate.userId);
        }
      } catch (error: unknown) {
        const errorMessage: string = error instanceof Error ? error.message : String(error);
        skipped.push({ index, userId: candidate.userId, reason: errorMessage });
        this.logger.warn(
          `reminder_candidate_failed index=${String(index)} userId=${candidate.userId} reason=${errorMessage}`,
        );
      }
    });

    return {
      evaluatedAt: now,
      dueByKind,
      skipped,
    };
  }

  private resolveDueKinds(
    now: Date,
    candidate: IReminderCandidate,
    waterStrategy: WaterReminderStrategy,
  ): readonly ReminderKind[] {
    return REMINDER_KINDS.filter((kind: ReminderKind): boolean =>
      this.reminderEligibilityService.isDue(
        kind,
        now,
        candidate.preferences,
        candidate.timezone,
        waterStrategy,
      ),
    );
  }

  private warnOnInvalidTimezone(candidate: IReminderCandidate): void {
    if (candidate.timezone === null || candidate.timezone.trim().length === 0) {
      return;
    }

    if (isValidTimezone(candidate.timezone)) {
      return;
    }

    if (this.invalidTimezoneWarnings.shouldEmit(candidate.timezone)) {
      this.logger.warn(
        `invalid_timezone_fallback_utc userId=${candidate.userId} timezone=${candidate.timezone}`,
      );
    }
  }

  private createEmptyDueMap(): Record<ReminderKind, string[]> {
    return {
      [ReminderKind.MEAL_BREAKFAST]: [],
      [ReminderKind.MEAL_LUNCH]: [],
      [ReminderKind.MEAL_DINNER]: [],
      [ReminderKind.SLEEP]: [],
      [ReminderKind.WATER]: [],
      [ReminderKind.DAILY_SUMMARY]: [],
    };
  }

  private extractUserId(rawCandidate: unknown): string | null {
    if (
      typeof rawCandidate === 'object' &&
      rawCandidate !== null &&
      'userId' in rawCandidate &&
      typeof rawCandidate.userId === 'string'
    ) {
      return rawCandidate.userId;
    }

    return null;
  }
}
