import { Injectable } from '@nestjs/common';

import { utcToLocalMinutes } from './timezone.util';
import {
  DEFAULT_SLEEP_TIME_MINUTES,
  DEFAULT_WAKE_TIME_MINUTES,
} from '../entities/notification-preferences.constants';
import type { IQuietHoursEvaluation, IQuietWindow } from '../entities/quiet-hours.interfaces';

@Injectable()
export class QuietHoursService {
  public resolveWindow(
    quietStart: number | null | undefined,
    quietEnd: number | null | undefined,
  ): IQuietWindow {
    return {
      startMinutes: quietStart ?? DEFAULT_SLEEP_TIME_MINUTES,
      endMinutes: quietEnd ?? DEFAULT_WAKE_TIME_MINUTES,
    };
  }

  /**
   * Half-open `[start, end)` test; a window whose start is later than its end
   * wraps past midnight.
   */
  public isInQuietHours(
    localMinutes: number,
    quietStart: number | null | undefined,
    quietEnd: number | null | undefined,
  ): boolean {
    const window: IQuietWindow = this.resolveWindow(quietStart, quietEnd);

    if (window.startMinutes > window.endMinutes) {
      return localMinutes >= window.startMinutes || localMinutes < window.endMinutes;
    }

    return localMinutes >= window.startMinutes && localMinutes < window.endMinutes;
  }

  public evaluate(
    quietStart: number | null | undefined,
    quietEnd: number | null | undefined,
    timezone: string | null,
    now: Date = new Date(),
  ): IQuietHoursEvaluation {
    const currentMinuteOfDay: number = utcToLocalMinutes(now, timezone);

    return {
      suppressed: this.isInQuietHours(currentMinuteOfDay, quietStart, quietEnd),
      currentMinuteOfDay,
      window: this.resolveWindow(quietStart, quietEnd),
    };
  }
}
