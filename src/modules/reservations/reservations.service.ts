import {
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, MoreThanOrEqual, Repository } from 'typeorm';

import {
  CONFIRMED_SLOT_INDEX,
  Reservation,
  ReservationStatus,
} from './reservation.entity';
import {
  BookingErrorCode,
  BookingValidationException,
  SlotTakenException,
} from './booking-errors';
import { computeDurationHours, computePrice } from './pricing';
import {
  appendCancellationNote,
  canCancel,
  type AttendanceStatus,
} from './reservation-lifecycle';
import { ReservationViewDto } from './dto/reservation-view.dto';
import { AvailabilityService } from '../availability/availability.service';
import {
  computeEnd,
  isWithinOperatingWindow,
  toMinutes,
  type TimeOfDay,
} from '../availability/operating-hours';
import { CourtsService } from '../courts/courts.service';
import { UsersService } from '../users/users.service';
import { isPrivileged, type AuthUser } from '../auth/auth.types';
import { isUniqueViolation } from '../../database/pg-error';

export type BookingRequest = {
  courtId: string;
  date: string;
  startTime: TimeOfDay;
  notes?: string | null;
  playerId?: string;
  // overrides; the writer derives both when absent
  endTime?: TimeOfDay;
  totalPrice?: number;
};

export type AdminReservationFilter = {
  status?: ReservationStatus;
  courtId?: string;
  from?: string;
  to?: string;
};

export type BulkResult = { updated: number };

function reservationNotFound() {
  return new NotFoundException({
    statusCode: 404,
    code: 'RESERVATION_NOT_FOUND',
    message: 'Reservation not found',
  });
}

function slotLockKey(courtId: string, date: string) {
  return `${courtId}|${date}`;
}

@Injectable()
export class ReservationsService {
  private readonly logger = new Logger(ReservationsService.name);

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(Reservation)
    private readonly repo: Repository<Reservation>,
    private readonly courts: CourtsService,
    private readonly users: UsersService,
    private readonly availability: AvailabilityService,
  ) {}

  // ---------------------------
  // WRITER
  // ---------------------------

  /**
   * Validates, re-checks availability under a per-court/day advisory lock and
   * inserts a confirmed reservation. The partial unique index on confirmed
   * (court, date, start) is the last line: a violation there is a lost race
   * and surfaces as SLOT_TAKEN like any other conflict.
   */
  async createReservation(
    actor: AuthUser,
    req: BookingRequest,
  ): Promise<Reservation> {
    this.availability.assertDate(req.date);
    const court = await this.courts.findOne(req.courtId);
    const playerId = await this.resolvePlayerId(actor, req.playerId);

    if (req.date < this.availability.today()) {
      throw new BookingValidationException(BookingErrorCode.PAST_DATE);
    }
    if (!isWithinOperatingWindow(req.startTime)) {
      throw new BookingValidationException(BookingErrorCode.OUT_OF_HOURS);
    }
    const endTime = req.endTime ?? computeEnd(req.startTime);
    if (toMinutes(endTime) <= toMinutes(req.startTime)) {
      throw new BookingValidationException(BookingErrorCode.INVALID_RANGE);
    }

    try {
      const saved = await this.dataSource.transaction(async (manager) => {
        await manager.query('SELECT pg_advisory_xact_lock(hashtext($1))', [
          slotLockKey(court.id, req.date),
        ]);

        const free = await this.availability.isAvailable(
          court,
          req.date,
          req.startTime,
          endTime,
          manager,
        );
        if (!free) throw new SlotTakenException();

        const repo = manager.getRepository(Reservation);
        return repo.save(
          repo.create({
            courtId: court.id,
            playerId,
            date: req.date,
            startTime: req.startTime,
            endTime,
            status: ReservationStatus.CONFIRMED,
            totalPrice: req.totalPrice ?? computePrice(court),
            notes: req.notes?.trim() || null,
          }),
        );
      });

      this.logger.log(
        `reservation ${saved.id} court=${court.id} ${saved.date} ${saved.startTime}-${saved.endTime} player=${playerId}`,
      );
      return saved;
    } catch (e: unknown) {
      if (isUniqueViolation(e, CONFIRMED_SLOT_INDEX)) {
        this.logger.warn(
          `slot taken at commit court=${court.id} ${req.date} ${req.startTime}`,
        );
        throw new SlotTakenException();
      }
      throw e;
    }
  }

  private async resolvePlayerId(actor: AuthUser, requested?: string) {
    if (!requested || requested === actor.userId || !isPrivileged(actor)) {
      return actor.userId;
    }

    const player = await this.users.findById(requested);
    if (!player || !player.active) {
      throw new NotFoundException({
        statusCode: 404,
        code: 'PLAYER_NOT_FOUND',
        message: 'Player not found',
      });
    }
    return player.id;
  }

  // ---------------------------
  // LIFECYCLE
  // ---------------------------

  /**
   * false when the reservation is no longer cancellable; nothing is written
   * then. The write only matches a row that is still confirmed and not past,
   * so a row completed or cancelled since it was read stays as it is.
   */
  async cancel(reservation: Reservation, actorName?: string): Promise<boolean> {
    const today = this.availability.today();
    if (!canCancel(reservation, today)) return false;

    const notes = actorName
      ? appendCancellationNote(reservation.notes, actorName)
      : reservation.notes;
    const result = await this.repo.update(
      {
        id: reservation.id,
        status: ReservationStatus.CONFIRMED,
        date: MoreThanOrEqual(today),
      },
      { status: ReservationStatus.CANCELLED, notes },
    );
    if (result.affected !== 1) return false;

    reservation.status = ReservationStatus.CANCELLED;
    reservation.notes = notes;
    this.logger.log(`reservation ${reservation.id} cancelled`);
    return true;
  }

  async cancelById(id: string, actor: AuthUser): Promise<boolean> {
    const reservation = await this.findAccessible(id, actor);
    return this.cancel(reservation, actor.displayName);
  }

  /** Only confirmed rows move; ids in any other status are left as they are. */
  async markAttendance(
    ids: string[],
    status: AttendanceStatus,
    actor: AuthUser,
  ): Promise<BulkResult> {
    const result = await this.repo.update(
      { id: In(ids), status: ReservationStatus.CONFIRMED },
      { status },
    );
    const updated = result.affected ?? 0;

    this.logger.log(
      `bulk ${status}: ${updated}/${ids.length} by admin ${actor.userId}`,
    );
    return { updated };
  }

  async bulkCancel(ids: string[], actor: AuthUser): Promise<BulkResult> {
    const rows = await this.repo.find({ where: { id: In(ids) } });

    let updated = 0;
    for (const reservation of rows) {
      if (await this.cancel(reservation, actor.displayName)) updated++;
    }

    this.logger.log(
      `bulk cancelled: ${updated}/${ids.length} by admin ${actor.userId}`,
    );
    return { updated };
  }

  // ---------------------------
  // READS
  // ---------------------------

  async getById(id: string, actor: AuthUser): Promise<ReservationViewDto> {
    return this.toView(await this.findAccessible(id, actor));
  }

  async listForPlayer(playerId: string): Promise<ReservationViewDto[]> {
    const rows = await this.repo.find({
      where: { playerId },
      relations: { court: true },
      order: { date: 'DESC', startTime: 'DESC' },
    });
    return this.toViews(rows);
  }

  async listUpcoming(playerId: string): Promise<ReservationViewDto[]> {
    const rows = await this.repo.find({
      where: {
        playerId,
        status: ReservationStatus.CONFIRMED,
        date: MoreThanOrEqual(this.availability.today()),
      },
      relations: { court: true },
      order: { date: 'ASC', startTime: 'ASC' },
    });
    return this.toViews(rows);
  }

  async listAdmin(
    filter: AdminReservationFilter,
  ): Promise<ReservationViewDto[]> {
    const qb = this.repo
      .createQueryBuilder('r')
      .leftJoinAndSelect('r.court', 'c')
      .orderBy('r.date', 'DESC')
      .addOrderBy('r.startTime', 'ASC');

    if (filter.status)
      qb.andWhere('r.status = :status', { status: filter.status });
    if (filter.courtId)
      qb.andWhere('r.courtId = :courtId', { courtId: filter.courtId });
    if (filter.from) qb.andWhere('r.date >= :from', { from: filter.from });
    if (filter.to) qb.andWhere('r.date <= :to', { to: filter.to });

    return this.toViews(await qb.getMany());
  }

  toView(r: Reservation, today = this.availability.today()): ReservationViewDto {
    return {
      id: r.id,
      courtId: r.courtId,
      courtName: r.court.name,
      playerId: r.playerId,
      date: r.date,
      startTime: r.startTime,
      endTime: r.endTime,
      status: r.status,
      totalPrice: r.totalPrice,
      durationHours: computeDurationHours(r),
      notes: r.notes,
      canCancel: canCancel(r, today),
      createdAt: r.createdAt.toISOString(),
    };
  }

  private toViews(rows: Reservation[]): ReservationViewDto[] {
    const today = this.availability.today();
    return rows.map((r) => this.toView(r, today));
  }

  private async findAccessible(id: string, actor: AuthUser) {
    const reservation = await this.repo.findOne({
      where: { id },
      relations: { court: true },
    });
    if (!reservation) throw reservationNotFound();

    if (reservation.playerId !== actor.userId && !isPrivileged(actor)) {
      throw new ForbiddenException({
        statusCode: 403,
        code: 'RESERVATION_FORBIDDEN',
        message: 'You cannot access this reservation',
      });
    }
    return reservation;
  }
}
