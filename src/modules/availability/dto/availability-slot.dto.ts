import { SurfaceType } from '../../courts/surface-type.enum';

export class AvailabilitySlotDto {
  time!: string;
  displayTime!: string;
}

export class BoardSlotDto extends AvailabilitySlotDto {
  available!: boolean;
  reservationId!: string | null;
}

export class BoardCourtDto {
  courtId!: string;
  courtName!: string;
  surfaceType!: SurfaceType;
  hourlyRate!: number;
  slots!: BoardSlotDto[];
}

export class DayBoardDto {
  date!: string;
  courts!: BoardCourtDto[];
}
