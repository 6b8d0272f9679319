import { ValidationError } from 'class-validator';

/** Flattens nested class-validator errors into "path: message" entries. */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const propertyPath = parentPath
      ? `${parentPath}.${error.property}`
      : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${propertyPath}: ${message}`,
    );
    return [
      ...own,
      ...flattenValidationErrors(error.children ?? [], propertyPath),
    ];
  });
}

export function isPlainRecord(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
