import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { AvailabilityService } from './availability.service';
import { AvailabilityQueryDto } from './dto/availability-query.dto';
import { DayBoardQueryDto } from './dto/day-board-query.dto';
import { CourtSearchQueryDto } from './dto/court-search-query.dto';
import { AvailabilitySlotDto } from './dto/availability-slot.dto';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import {
  toJsonFailure,
  type JsonFailure,
  type JsonResult,
} from '../../common/json-result';

export type AvailabilityResult =
  | JsonResult<{ slots: AvailabilitySlotDto[] }>
  | (JsonFailure & { slots: AvailabilitySlotDto[] });

@Controller('availability')
@UseGuards(JwtAuthGuard)
export class AvailabilityController {
  constructor(private readonly service: AvailabilityService) {}

  // JSON envelope: booking widgets poll this and never expect an HTTP error
  @Get()
  async getAvailability(
    @Query() q: AvailabilityQueryDto,
  ): Promise<AvailabilityResult> {
    try {
      const slots = await this.service.getAvailability(q.courtId, q.date);
      return { success: true, slots };
    } catch (e: unknown) {
      return { ...toJsonFailure(e), slots: [] };
    }
  }

  @Get('board')
  board(@Query() q: DayBoardQueryDto) {
    return this.service.dayBoard(q.date);
  }

  @Get('search')
  search(@Query() q: CourtSearchQueryDto) {
    return this.service.searchCourts(q);
  }
}
