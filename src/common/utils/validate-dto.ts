import { BadRequestException } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';

function flattenErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) =>
      parent ? `${parent}.${message}` : message,
    );
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}

/**
 * Same rules as the global ValidationPipe (transform + whitelist), usable
 * outside of a request.
 */
export async function validateDto<T extends object>(
  cls: ClassConstructor<T>,
  plain: object,
): Promise<T> {
  const instance = plainToInstance(cls, plain);
  const errors = await validate(instance, { whitelist: true });
  if (errors.length > 0) {
    throw new BadRequestException(flattenErrors(errors));
  }
  return instance;
}
