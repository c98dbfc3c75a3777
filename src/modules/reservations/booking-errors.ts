import {
  BadRequestException,
  ConflictException,
} from '@nestjs/common';

export enum BookingErrorCode {
  PAST_DATE = 'PAST_DATE',
  OUT_OF_HOURS = 'OUT_OF_HOURS',
  INVALID_RANGE = 'INVALID_RANGE',
  SLOT_TAKEN = 'SLOT_TAKEN',
}

export type BookingValidationCode =
  | BookingErrorCode.PAST_DATE
  | BookingErrorCode.OUT_OF_HOURS
  | BookingErrorCode.INVALID_RANGE;

const VALIDATION_MESSAGES: Record<BookingValidationCode, string> = {
  [BookingErrorCode.PAST_DATE]: 'Reservations cannot be made for past dates.',
  [BookingErrorCode.OUT_OF_HOURS]:
    'Reservations are only available between 08:00 and 22:00.',
  [BookingErrorCode.INVALID_RANGE]: 'End time must be later than start time.',
};

export const SLOT_TAKEN_MESSAGE =
  'The selected slot is no longer available. Please choose another time.';

export class BookingValidationException extends BadRequestException {
  constructor(readonly code: BookingValidationCode) {
    super({ statusCode: 400, code, message: VALIDATION_MESSAGES[code] });
  }
}

export class SlotTakenException extends ConflictException {
  readonly code = BookingErrorCode.SLOT_TAKEN;

  constructor() {
    super({
      statusCode: 409,
      code: BookingErrorCode.SLOT_TAKEN,
      message: SLOT_TAKEN_MESSAGE,
    });
  }
}
