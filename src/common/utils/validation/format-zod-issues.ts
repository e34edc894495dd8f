import type { z } from 'zod';

/**
 * Flattens zod issues into `path: message` pairs joined by `; `. Root-level
 * issues are reported under `(root)`.
 */
export const formatZodIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue): string => {
      const path: string = issue.path.map(String).join('.');
      return `${path.length > 0 ? path : '(root)'}: ${issue.message}`;
    })
    .join('; ');
