import { ValidationPipe as NestValidationPipe, BadRequestException } from '@nestjs/common';
import { type ValidationError as ClassValidatorError } from 'class-validator';

export interface FormattedError {
  field: string;
  message: string;
  constraints: string[];
}

/**
 * Request validation: unknown properties are rejected, payloads become DTO
 * instances and query strings are converted to the declared types.
 */
export function createValidationPipe(): NestValidationPipe {
  return new NestValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    transformOptions: {
      enableImplicitConversion: true,
    },
    exceptionFactory: (errors: ClassValidatorError[]) =>
      new BadRequestException({
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        errors: formatValidationErrors(errors),
      }),
  });
}

/**
 * Flattens class-validator errors; nested fields read `parent.child`
 */
export function formatValidationErrors(errors: ClassValidatorError[], parent?: string): FormattedError[] {
  const result: FormattedError[] = [];

  for (const error of errors) {
    const field = parent === undefined ? error.property : `${parent}.${error.property}`;
    if (error.constraints !== undefined) {
      result.push({
        field,
        message: Object.values(error.constraints).join(', '),
        constraints: Object.keys(error.constraints),
      });
    }
    if (error.children !== undefined && error.children.length > 0) {
      result.push(...formatValidationErrors(error.children, field));
    }
  }

  return result;
}
