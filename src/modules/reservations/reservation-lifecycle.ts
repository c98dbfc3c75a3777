import { ReservationStatus } from './reservation.entity';

/** confirmed -> cancelled | completed | no_show; nothing leaves those three. */
const TRANSITIONS: Record<ReservationStatus, readonly ReservationStatus[]> = {
  [ReservationStatus.CONFIRMED]: [
    ReservationStatus.CANCELLED,
    ReservationStatus.COMPLETED,
    ReservationStatus.NO_SHOW,
  ],
  [ReservationStatus.CANCELLED]: [],
  [ReservationStatus.COMPLETED]: [],
  [ReservationStatus.NO_SHOW]: [],
};

export type AttendanceStatus =
  | ReservationStatus.COMPLETED
  | ReservationStatus.NO_SHOW;

export function canTransition(
  from: ReservationStatus,
  to: ReservationStatus,
): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Only confirmed reservations dated today or later can be cancelled. */
export function canCancel(
  reservation: { status: ReservationStatus; date: string },
  today: string,
): boolean {
  return (
    canTransition(reservation.status, ReservationStatus.CANCELLED) &&
    reservation.date >= today
  );
}

export function appendCancellationNote(
  notes: string | null,
  actorName: string,
): string {
  const line = `Cancelled by: ${actorName}`;
  return notes?.trim() ? `${notes.trimEnd()}\n${line}` : line;
}
