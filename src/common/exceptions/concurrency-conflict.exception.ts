import { ConflictException } from '@nestjs/common';

export type ConflictCode = 'SEAT_TAKEN' | 'CREW_CHANGED';

export class ConcurrencyConflictException extends ConflictException {
  constructor(
    public readonly code: ConflictCode,
    message: string,
  ) {
    super({ statusCode: 409, error: 'Conflict', code, message });
  }
}
