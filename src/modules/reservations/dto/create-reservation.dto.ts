import {
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  MaxLength,
} from 'class-validator';
import {
  ISO_DATE_PATTERN,
  TIME_OF_DAY_PATTERN,
} from '../../availability/operating-hours';

export class CreateReservationDto {
  @IsUUID()
  courtId!: string;

  @Matches(ISO_DATE_PATTERN, { message: 'date must be YYYY-MM-DD' })
  date!: string;

  @Matches(TIME_OF_DAY_PATTERN, { message: 'startTime must be HH:MM' })
  startTime!: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  notes?: string;

  // honoured for admins only; players always book for themselves
  @IsOptional()
  @IsUUID()
  playerId?: string;
}
