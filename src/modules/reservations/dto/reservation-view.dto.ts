import { ReservationStatus } from '../reservation.entity';

export class ReservationViewDto {
  id!: string;
  courtId!: string;
  courtName!: string;
  playerId!: string;
  date!: string;
  startTime!: string;
  endTime!: string;
  status!: ReservationStatus;
  totalPrice!: number;
  durationHours!: number;
  notes!: string | null;
  canCancel!: boolean;
  createdAt!: string;
}
