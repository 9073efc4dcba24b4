import { Matches, ValidationOptions } from 'class-validator';

/** Non-negative DECIMAL(12,2) amount written as a string, e.g. "35000.00". */
export const MONEY_STRING = /^\d{1,10}(\.\d{1,2})?$/;

export function IsMoney(validationOptions?: ValidationOptions): PropertyDecorator {
  return Matches(MONEY_STRING, {
    message: '$property must be a non-negative amount with at most 2 decimals',
    ...validationOptions,
  });
}
