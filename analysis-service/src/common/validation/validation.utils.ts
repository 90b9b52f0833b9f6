import { ValidationPipe, type ValidationError as ClassValidationError } from '@nestjs/common';
import { plainToInstance, type ClassConstructor } from 'class-transformer';
import { validate } from 'class-validator';
import { ValidationError } from '../../analysis/errors/analysis-errors';

/**
 * "property: constraint message" for every failed constraint, nested included
 */
export function flattenValidationErrors(
  errors: ClassValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: (errors) =>
      new ValidationError(
        'Request validation failed',
        flattenValidationErrors(errors),
      ),
  });
}

/**
 * Validate a plain payload (e.g. a TCP message) against a DTO class
 * @throws ValidationError
 */
export async function validatePayload<T extends object>(
  dtoClass: ClassConstructor<T>,
  payload: unknown,
): Promise<T> {
  if (typeof payload !== 'object' || payload === null) {
    throw new ValidationError('Payload must be an object');
  }

  const instance = plainToInstance(dtoClass, payload);
  const errors = await validate(instance, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  if (errors.length > 0) {
    throw new ValidationError(
      'Payload validation failed',
      flattenValidationErrors(errors),
    );
  }

  return instance;
}
