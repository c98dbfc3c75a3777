import type { Court } from '../courts/court.entity';
import { toMinutes, type TimeOfDay } from '../availability/operating-hours';

/** Flat tariff: one booking is one slot, so the price is the court's hourly rate. */
export function computePrice(court: Pick<Court, 'hourlyRate'>): number {
  return court.hourlyRate;
}

export function computeDurationHours(range: {
  startTime?: TimeOfDay | null;
  endTime?: TimeOfDay | null;
}): number {
  if (!range.startTime || !range.endTime) return 1;
  return (toMinutes(range.endTime) - toMinutes(range.startTime)) / 60;
}
