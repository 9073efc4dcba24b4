import slugify from 'slugify';
import {
  registerDecorator,
  ValidationOptions,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator';

export function toSlug(input: string): string {
  return slugify(input || '', { lower: true, strict: true });
}

/** A slug is URL-safe when slugify leaves it unchanged. */
export function isUrlSafeSlug(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0 && toSlug(value) === value;
}

@ValidatorConstraint({ name: 'isUrlSafeSlug', async: false })
export class UrlSafeSlugConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return isUrlSafeSlug(value);
  }

  defaultMessage(): string {
    return '$property must be a lowercase URL-safe slug';
  }
}

export function IsUrlSafeSlug(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      target: object.constructor,
      propertyName,
      options: validationOptions,
      validator: UrlSafeSlugConstraint,
    });
  };
}
