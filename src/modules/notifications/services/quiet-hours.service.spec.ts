import { describe, expect, it } from 'vitest';

import { QuietHoursService } from './quiet-hours.service';
import type { IQuietHoursEvaluation } from '../entities/quiet-hours.interfaces';

describe('QuietHoursService', (): void => {
  const service: QuietHoursService = new QuietHoursService();

  it('handles windows that wrap past midnight', (): void => {
    expect(service.isInQuietHours(1380, 1320, 480)).toBe(true);
    expect(service.isInQuietHours(120, 1320, 480)).toBe(true);
    expect(service.isInQuietHours(1320, 1320, 480)).toBe(true);
    expect(service.isInQuietHours(480, 1320, 480)).toBe(false);
    expect(service.isInQuietHours(720, 1320, 480)).toBe(false);
  });

  it('handles same-day windows', (): void => {
    expect(service.isInQuietHours(120, 60, 300)).toBe(true);
    expect(service.isInQuietHours(60, 60, 300)).toBe(true);
    expect(service.isInQuietHours(300, 60, 300)).toBe(false);
    expect(service.isInQuietHours(30, 60, 300)).toBe(false);
  });

  it('treats an equal start and end as an empty window', (): void => {
    expect(service.isInQuietHours(600, 600, 600)).toBe(false);
  });

  it('defaults missing bounds to 22:00 and 08:00', (): void => {
    expect(service.isInQuietHours(1400, null, null)).toBe(true);
    expect(service.isInQuietHours(479, undefined, undefined)).toBe(true);
    expect(service.isInQuietHours(600, null, null)).toBe(false);
    expect(service.resolveWindow(null, 420)).toEqual({ startMinutes: 1320, endMinutes: 420 });
  });

  it('evaluates the window against local time in the given zone', (): void => {
    const evaluation: IQuietHoursEvaluation = service.evaluate(
      null,
      null,
      'Asia/Ho_Chi_Minh',
      new Date('2024-01-15T16:00:00Z'),
    );

    expect(evaluation).toEqual({
      suppressed: true,
      currentMinuteOfDay: 1380,
      window: { startMinutes: 1320, endMinutes: 480 },
    });
  });
});
