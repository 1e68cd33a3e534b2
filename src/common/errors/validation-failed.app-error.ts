import { ValidationError } from '@nestjs/common';
import { AppError } from './app-error';

export interface FieldViolation {
  readonly field: string;
  readonly constraints: string[];
}

function flatten(errors: ValidationError[], prefix = ''): FieldViolation[] {
  return errors.flatMap((error) => {
    const field = prefix + error.property;
    const own: FieldViolation[] = error.constraints
      ? [{ field, constraints: Object.values(error.constraints) }]
      : [];
    return [...own, ...flatten(error.children ?? [], `${field}.`)];
  });
}

export class ValidationFailedAppError extends AppError {
  public readonly code = 'ERR_VALIDATION_FAILED';

  constructor(errors: ValidationError[]) {
    const fields = flatten(errors);
    super(
      `Validation failed on fields ${fields.map((f) => f.field).join(', ')}`,
      { fields },
    );
  }
}
