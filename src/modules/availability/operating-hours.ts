import { DateTime } from 'luxon';

/** Zero-padded 24h clock time, `HH:MM`. */
export type TimeOfDay = string;

export interface TimeRange {
  startTime: TimeOfDay;
  endTime: TimeOfDay;
}

export const OPENING_HOUR = 8;
export const CLOSING_HOUR = 22;
export const SLOT_MINUTES = 60;

const MINUTES_PER_DAY = 24 * 60;
export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function toMinutes(time: TimeOfDay): number {
  const match = TIME_OF_DAY_PATTERN.exec(time);
  if (!match) throw new Error(`Invalid time of day: "${time}"`);
  return Number(match[1]) * 60 + Number(match[2]);
}

export function fromMinutes(minutes: number): TimeOfDay {
  const m = ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hh = String(Math.floor(m / 60)).padStart(2, '0');
  const mm = String(m % 60).padStart(2, '0');
  return `${hh}:${mm}`;
}

/** Every whole-hour slot start from opening up to the last bookable hour. */
export function operatingSlots(): TimeOfDay[] {
  const slots: TimeOfDay[] = [];
  for (let hour = OPENING_HOUR; hour < CLOSING_HOUR; hour++) {
    slots.push(fromMinutes(hour * 60));
  }
  return slots;
}

/**
 * start + one slot, wrapping past midnight (23:00 -> 00:00). The wrap is not
 * rejected here; callers keep starts inside the operating window.
 */
export function computeEnd(start: TimeOfDay): TimeOfDay {
  return fromMinutes(toMinutes(start) + SLOT_MINUTES);
}

export function isWithinOperatingWindow(time: TimeOfDay): boolean {
  const minutes = toMinutes(time);
  return minutes >= OPENING_HOUR * 60 && minutes < CLOSING_HOUR * 60;
}

// half-open [start, end)
export function intervalsOverlap(a: TimeRange, b: TimeRange): boolean {
  return (
    toMinutes(a.startTime) < toMinutes(b.endTime) &&
    toMinutes(a.endTime) > toMinutes(b.startTime)
  );
}

export function toDisplayTime(time: TimeOfDay): string {
  const minutes = toMinutes(time);
  return DateTime.fromObject(
    { hour: Math.floor(minutes / 60), minute: minutes % 60 },
    { locale: 'en-US' },
  ).toFormat('hh:mm a');
}

// ---------------------------
// CALENDAR DATES (YYYY-MM-DD)
// ---------------------------

export function isIsoDate(value: string, zone: string): boolean {
  return (
    ISO_DATE_PATTERN.test(value) && DateTime.fromISO(value, { zone }).isValid
  );
}

export function todayIn(zone: string): string {
  const today = DateTime.now().setZone(zone).toISODate();
  if (!today) throw new Error(`Invalid booking timezone: "${zone}"`);
  return today;
}
