import { FindOperator, QueryFailedError } from 'typeorm';
import {
  CONFIRMED_SLOT_INDEX,
  Reservation,
  ReservationStatus,
} from '../modules/reservations/reservation.entity';
import type { Court } from '../modules/courts/court.entity';
import { PG_UNIQUE_VIOLATION } from '../database/pg-error';

type Where = Record<string, unknown>;

function matches(row: Reservation, where: Where = {}): boolean {
  return Object.entries(where).every(([key, expected]) => {
    const actual: unknown = Reflect.get(row, key);
    if (expected instanceof FindOperator) {
      const operand: unknown = expected.value;
      if (expected.type === 'in' && Array.isArray(operand))
        return operand.includes(actual);
      if (expected.type === 'moreThanOrEqual')
        return String(actual) >= String(operand);
      throw new Error(`unsupported operator ${expected.type}`);
    }
    return actual === expected;
  });
}

/** What pg reports when a second confirmed row hits the same slot. */
export function confirmedSlotViolation(): QueryFailedError {
  const driverError = Object.assign(
    new Error('duplicate key value violates unique constraint'),
    { code: PG_UNIQUE_VIOLATION, constraint: CONFIRMED_SLOT_INDEX },
  );
  return new QueryFailedError('INSERT INTO "reservations"', [], driverError);
}

/**
 * Reservation table stand-in that enforces the confirmed-slot partial unique
 * index on save. Every call yields to the event loop, so concurrent callers
 * interleave the way separate connections would.
 */
export class InMemoryReservationStore {
  readonly rows: Reservation[] = [];
  private seq = 0;

  constructor(private readonly courts: Court[] = []) {}

  async find(options: { where?: Where } = {}): Promise<Reservation[]> {
    await Promise.resolve();
    return this.rows
      .filter((r) => matches(r, options.where))
      .map((r) => this.withCourt(r));
  }

  async findOne(options: { where?: Where } = {}): Promise<Reservation | null> {
    const [first] = await this.find(options);
    return first ?? null;
  }

  create(input: Partial<Reservation>): Reservation {
    return Object.assign(new Reservation(), input);
  }

  async save(entity: Reservation): Promise<Reservation> {
    await Promise.resolve();

    const clash = this.rows.some(
      (r) =>
        r.id !== entity.id &&
        entity.status === ReservationStatus.CONFIRMED &&
        r.status === ReservationStatus.CONFIRMED &&
        r.courtId === entity.courtId &&
        r.date === entity.date &&
        r.startTime === entity.startTime,
    );
    if (clash) throw confirmedSlotViolation();

    const now = new Date();
    if (!entity.id) {
      entity.id = `00000000-0000-4000-8000-${String(++this.seq).padStart(12, '0')}`;
      entity.createdAt = now;
    }
    entity.updatedAt = now;

    const stored = Object.assign(new Reservation(), entity);
    const index = this.rows.findIndex((r) => r.id === entity.id);
    if (index >= 0) this.rows[index] = stored;
    else this.rows.push(stored);
    return entity;
  }

  async update(
    where: Where,
    patch: Partial<Reservation>,
  ): Promise<{ affected: number }> {
    await Promise.resolve();
    const hits = this.rows.filter((r) => matches(r, where));
    hits.forEach((r) => Object.assign(r, patch));
    return { affected: hits.length };
  }

  private withCourt(row: Reservation): Reservation {
    const copy = Object.assign(new Reservation(), row);
    const court = this.courts.find((c) => c.id === row.courtId);
    if (court) copy.court = court;
    return copy;
  }
}
