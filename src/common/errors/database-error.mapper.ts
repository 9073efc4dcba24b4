import { BadRequestException, ConflictException } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';

/** MySQL/MariaDB error codes raised by the constraint checker. */
export const MYSQL_DUPLICATE_ENTRY = ['ER_DUP_ENTRY'];
export const MYSQL_UNKNOWN_PARENT = ['ER_NO_REFERENCED_ROW_2', 'ER_NO_REFERENCED_ROW'];
export const MYSQL_PARENT_REFERENCED = ['ER_ROW_IS_REFERENCED_2', 'ER_ROW_IS_REFERENCED'];

export function driverErrorCode(error: unknown): string | undefined {
  if (!(error instanceof QueryFailedError)) return undefined;
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    const { code } = driverError;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Turns an engine constraint violation into the matching Nest exception.
 * Anything else is returned untouched so the caller can rethrow it.
 */
export function translateDatabaseError(error: unknown, subject: string): unknown {
  const code = driverErrorCode(error);
  if (!code) return error;

  if (MYSQL_DUPLICATE_ENTRY.includes(code)) {
    return new ConflictException(`${subject} already exists`);
  }
  if (MYSQL_UNKNOWN_PARENT.includes(code)) {
    return new BadRequestException(`${subject} references a row that does not exist`);
  }
  if (MYSQL_PARENT_REFERENCED.includes(code)) {
    return new ConflictException(`${subject} is still referenced and cannot be deleted`);
  }
  return error;
}

/** Runs a write and rethrows constraint violations as Nest exceptions. */
export async function withConstraintErrors<T>(subject: string, write: () => Promise<T>): Promise<T> {
  try {
    return await write();
  } catch (error) {
    throw translateDatabaseError(error, subject);
  }
}

