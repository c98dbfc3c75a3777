import {
  Body,
  Controller,
  Get,
  Patch,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { RolesGuard } from '../auth/roles.guard';
import { Roles } from '../auth/roles.decorator';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { UserRole } from '../users/user-role.enum';
import { ReservationStatus } from './reservation.entity';
import { ReservationsService } from './reservations.service';
import { AdminReservationsQueryDto } from './dto/admin-reservations-query.dto';
import { BulkReservationIdsDto } from './dto/bulk-reservation-ids.dto';

@Controller('admin/reservations')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(UserRole.ADMIN)
export class ReservationsAdminController {
  constructor(private readonly reservations: ReservationsService) {}

  @Get()
  list(@Query() q: AdminReservationsQueryDto) {
    return this.reservations.listAdmin(q);
  }

  @Patch('complete')
  complete(
    @Req() req: AuthenticatedRequest,
    @Body() dto: BulkReservationIdsDto,
  ) {
    return this.reservations.markAttendance(
      dto.ids,
      ReservationStatus.COMPLETED,
      req.user,
    );
  }

  @Patch('no-show')
  noShow(@Req() req: AuthenticatedRequest, @Body() dto: BulkReservationIdsDto) {
    return this.reservations.markAttendance(
      dto.ids,
      ReservationStatus.NO_SHOW,
      req.user,
    );
  }

  @Patch('cancel')
  cancel(@Req() req: AuthenticatedRequest, @Body() dto: BulkReservationIdsDto) {
    return this.reservations.bulkCancel(dto.ids, req.user);
  }
}
