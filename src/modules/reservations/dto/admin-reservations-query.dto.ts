import { IsEnum, IsOptional, IsUUID, Matches } from 'class-validator';
import { ReservationStatus } from '../reservation.entity';
import { ISO_DATE_PATTERN } from '../../availability/operating-hours';

export class AdminReservationsQueryDto {
  @IsOptional()
  @IsEnum(ReservationStatus)
  status?: ReservationStatus;

  @IsOptional()
  @IsUUID()
  courtId?: string;

  @IsOptional()
  @Matches(ISO_DATE_PATTERN, { message: 'from must be YYYY-MM-DD' })
  from?: string;

  @IsOptional()
  @Matches(ISO_DATE_PATTERN, { message: 'to must be YYYY-MM-DD' })
  to?: string;
}
