import type { PipeTransform, ArgumentMetadata } from '@nestjs/common';
import { Injectable } from '@nestjs/common';
import type { ZodType, ZodTypeDef } from 'zod';
import { InvalidInputError } from '../errors/game-errors.js';

/** zod 이슈 → "path: message" 문자열 목록 */
export function formatZodIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>,
): string[] {
  return issues.map((i) => `${i.path.join('.')}: ${i.message}`);
}

/** 요청 body 검증. 실패 시 422 INVALID_INPUT, details.issues에 이슈 목록 */
@Injectable()
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown, metadata: ArgumentMetadata): T {
    const result = this.schema.safeParse(value);
    if (result.success) return result.data;

    throw new InvalidInputError(`Invalid request ${metadata.type}`, {
      issues: formatZodIssues(result.error.issues),
    });
  }
}
