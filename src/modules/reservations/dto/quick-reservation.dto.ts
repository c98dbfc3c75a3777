import { IsUUID, Matches } from 'class-validator';
import {
  ISO_DATE_PATTERN,
  TIME_OF_DAY_PATTERN,
} from '../../availability/operating-hours';

export class QuickReservationDto {
  @IsUUID()
  courtId!: string;

  @Matches(ISO_DATE_PATTERN, { message: 'date must be YYYY-MM-DD' })
  date!: string;

  @Matches(TIME_OF_DAY_PATTERN, { message: 'time must be HH:MM' })
  time!: string;
}
