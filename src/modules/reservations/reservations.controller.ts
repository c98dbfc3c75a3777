import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';
import { toJsonFailure, type JsonResult } from '../../common/json-result';
import { ReservationsService } from './reservations.service';
import { CreateReservationDto } from './dto/create-reservation.dto';
import { QuickReservationDto } from './dto/quick-reservation.dto';

export type BookingResult = JsonResult<{ reservationId: string }>;
export type CancelResult = JsonResult<object>;

export const NOT_CANCELLABLE_MESSAGE =
  'This reservation can no longer be cancelled.';

@Controller('reservations')
@UseGuards(JwtAuthGuard)
export class ReservationsController {
  constructor(private readonly reservations: ReservationsService) {}

  @Post()
  @HttpCode(200)
  async create(
    @Req() req: AuthenticatedRequest,
    @Body() dto: CreateReservationDto,
  ): Promise<BookingResult> {
    try {
      const reservation = await this.reservations.createReservation(
        req.user,
        dto,
      );
      return { success: true, reservationId: reservation.id };
    } catch (e: unknown) {
      return toJsonFailure(e);
    }
  }

  // calendar one-click booking: same writer, slot picked from the board
  @Post('quick')
  @HttpCode(200)
  async quick(
    @Req() req: AuthenticatedRequest,
    @Body() dto: QuickReservationDto,
  ): Promise<BookingResult> {
    try {
      const reservation = await this.reservations.createReservation(req.user, {
        courtId: dto.courtId,
        date: dto.date,
        startTime: dto.time,
      });
      return { success: true, reservationId: reservation.id };
    } catch (e: unknown) {
      return toJsonFailure(e);
    }
  }

  @Post(':id/cancel')
  @HttpCode(200)
  async cancel(
    @Req() req: AuthenticatedRequest,
    @Param('id', new ParseRequiredUuidPipe('id')) id: string,
  ): Promise<CancelResult> {
    try {
      const cancelled = await this.reservations.cancelById(id, req.user);
      if (!cancelled) return { success: false, error: NOT_CANCELLABLE_MESSAGE };
      return { success: true };
    } catch (e: unknown) {
      return toJsonFailure(e);
    }
  }

  @Get(':id')
  findOne(
    @Req() req: AuthenticatedRequest,
    @Param('id', new ParseRequiredUuidPipe('id')) id: string,
  ) {
    return this.reservations.getById(id, req.user);
  }
}
