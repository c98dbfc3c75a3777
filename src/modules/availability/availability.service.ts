import { BadRequestException, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';

import { Court } from '../courts/court.entity';
import { CourtsService } from '../courts/courts.service';
import { SurfaceType } from '../courts/surface-type.enum';
import {
  Reservation,
  ReservationStatus,
} from '../reservations/reservation.entity';
import {
  BookingErrorCode,
  BookingValidationException,
} from '../reservations/booking-errors';
import { DEFAULT_BOOKING_TIMEZONE } from '../../config/env.schema';
import {
  computeEnd,
  intervalsOverlap,
  isIsoDate,
  isWithinOperatingWindow,
  operatingSlots,
  toDisplayTime,
  todayIn,
  type TimeOfDay,
  type TimeRange,
} from './operating-hours';
import {
  AvailabilitySlotDto,
  BoardCourtDto,
  DayBoardDto,
} from './dto/availability-slot.dto';

export type CourtRef = Pick<Court, 'id' | 'active'>;

export type CourtSearch = {
  date: string;
  startTime: TimeOfDay;
  surfaceType?: SurfaceType;
  maxRate?: number;
};

export function hasConflict(
  existing: readonly TimeRange[],
  requested: TimeRange,
): boolean {
  return existing.some((r) => intervalsOverlap(r, requested));
}

@Injectable()
export class AvailabilityService {
  constructor(
    @InjectRepository(Reservation)
    private readonly reservationRepo: Repository<Reservation>,
    private readonly courts: CourtsService,
    private readonly config: ConfigService,
  ) {}

  get timezone(): string {
    return (
      this.config.get<string>('booking.timezone') ?? DEFAULT_BOOKING_TIMEZONE
    );
  }

  today(): string {
    return todayIn(this.timezone);
  }

  assertDate(date: string): void {
    if (!isIsoDate(date, this.timezone)) {
      throw new BadRequestException({
        statusCode: 400,
        code: 'INVALID_DATE',
        message: 'Invalid date',
      });
    }
  }

  /** Pass the transaction's manager to read through the writer's lock. */
  findConfirmedForDay(
    courtId: string,
    date: string,
    manager?: EntityManager,
  ): Promise<Reservation[]> {
    const repo = manager
      ? manager.getRepository(Reservation)
      : this.reservationRepo;
    return repo.find({
      where: { courtId, date, status: ReservationStatus.CONFIRMED },
      order: { startTime: 'ASC' },
    });
  }

  async isAvailable(
    court: CourtRef,
    date: string,
    startTime: TimeOfDay,
    endTime: TimeOfDay = computeEnd(startTime),
    manager?: EntityManager,
  ): Promise<boolean> {
    if (!court.active) return false;
    const existing = await this.findConfirmedForDay(court.id, date, manager);
    return !hasConflict(existing, { startTime, endTime });
  }

  /**
   * Slots whose start is not taken by a confirmed reservation. Matching on
   * the start alone is exact only while every booking lasts one slot.
   */
  async availableSlots(court: CourtRef, date: string): Promise<TimeOfDay[]> {
    if (!court.active) return [];
    const existing = await this.findConfirmedForDay(court.id, date);
    const taken = new Set(existing.map((r) => r.startTime));
    return operatingSlots().filter((slot) => !taken.has(slot));
  }

  async getAvailability(
    courtId: string,
    date: string,
  ): Promise<AvailabilitySlotDto[]> {
    this.assertDate(date);
    const court = await this.courts.findActiveById(courtId);
    const slots = await this.availableSlots(court, date);
    return slots.map((time) => ({ time, displayTime: toDisplayTime(time) }));
  }

  async dayBoard(date: string): Promise<DayBoardDto> {
    this.assertDate(date);
    const courts = await this.courts.findActive();
    const byCourt = await this.confirmedByCourt(
      courts.map((c) => c.id),
      date,
    );

    const rows: BoardCourtDto[] = courts.map((court) => {
      const takenAt = new Map(
        (byCourt.get(court.id) ?? []).map(
          (r): [TimeOfDay, string] => [r.startTime, r.id],
        ),
      );
      return {
        courtId: court.id,
        courtName: court.name,
        surfaceType: court.surfaceType,
        hourlyRate: court.hourlyRate,
        slots: operatingSlots().map((time) => {
          const reservationId = takenAt.get(time) ?? null;
          return {
            time,
            displayTime: toDisplayTime(time),
            available: reservationId === null,
            reservationId,
          };
        }),
      };
    });

    return { date, courts: rows };
  }

  async searchCourts(q: CourtSearch): Promise<Court[]> {
    this.assertDate(q.date);
    if (q.date < this.today()) {
      throw new BookingValidationException(BookingErrorCode.PAST_DATE);
    }
    if (!isWithinOperatingWindow(q.startTime)) {
      throw new BookingValidationException(BookingErrorCode.OUT_OF_HOURS);
    }

    const candidates = (await this.courts.findActive(q.surfaceType)).filter(
      (c) => q.maxRate === undefined || c.hourlyRate <= q.maxRate,
    );
    const byCourt = await this.confirmedByCourt(
      candidates.map((c) => c.id),
      q.date,
    );
    const requested = {
      startTime: q.startTime,
      endTime: computeEnd(q.startTime),
    };

    return candidates.filter(
      (c) => !hasConflict(byCourt.get(c.id) ?? [], requested),
    );
  }

  private async confirmedByCourt(
    courtIds: string[],
    date: string,
  ): Promise<Map<string, Reservation[]>> {
    const grouped = new Map<string, Reservation[]>();
    if (courtIds.length === 0) return grouped;

    const rows = await this.reservationRepo.find({
      where: {
        courtId: In(courtIds),
        date,
        status: ReservationStatus.CONFIRMED,
      },
      order: { startTime: 'ASC' },
    });
    for (const r of rows) {
      const list = grouped.get(r.courtId) ?? [];
      list.push(r);
      grouped.set(r.courtId, list);
    }
    return grouped;
  }
}
