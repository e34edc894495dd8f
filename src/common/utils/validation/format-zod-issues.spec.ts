import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { formatZodIssues } from './format-zod-issues';

describe('formatZodIssues', (): void => {
  it('joins nested paths with dots', (): void => {
    const schema = z.object({
      preferences: z.object({ lunchTimeMinutes: z.number().max(1439, 'too late') }),
    });
    const result = schema.safeParse({ preferences: { lunchTimeMinutes: 1500 } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('preferences.lunchTimeMinutes: too late');
    }
  });

  it('labels root issues', (): void => {
    const schema = z.object({}).refine((): boolean => false, { message: 'empty body' });
    const result = schema.safeParse({});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('(root): empty body');
    }
  });
});
