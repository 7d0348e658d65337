import type { PipeTransform } from '@nestjs/common';
import { Injectable } from '@nestjs/common';
import type { ZodType, ZodTypeDef } from 'zod';
import { InvalidInputError } from '../errors/weather-errors.js';

/** 스키마 검증 실패를 InvalidInputError(issues 목록)로 바꾼다 */
export function parseWithSchema<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
    );
    throw new InvalidInputError('Validation failed', { issues });
  }
  return result.data;
}

@Injectable()
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown): T {
    return parseWithSchema(this.schema, value);
  }
}
