import { type PipeTransform, BadRequestException } from '@nestjs/common';
import { type z } from 'zod';

import { formatZodIssues } from '../../../common/utils/validation/format-zod-issues';

export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  public constructor(private readonly schema: z.ZodType<T>) {}

  public transform(value: unknown): T {
    const result = this.schema.safeParse(value);

    if (!result.success) {
      throw new BadRequestException(`Validation failed: ${formatZodIssues(result.error)}`);
    }

    return result.data;
  }
}
