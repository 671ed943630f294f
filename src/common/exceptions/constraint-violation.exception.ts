import { UnprocessableEntityException } from '@nestjs/common';

/** A scheduling or business rule refused the change; `violations` says why. */
export class ConstraintViolationException extends UnprocessableEntityException {
  constructor(
    message: string,
    public readonly violations: string[] = [],
  ) {
    super({ statusCode: 422, error: 'Constraint Violation', message, violations });
  }
}
