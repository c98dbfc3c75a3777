import { Controller, Get, Req, UseGuards } from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { ReservationsService } from './reservations.service';

@Controller('me')
@UseGuards(JwtAuthGuard)
export class MeReservationsController {
  constructor(private readonly reservations: ReservationsService) {}

  @Get('reservations')
  listMine(@Req() req: AuthenticatedRequest) {
    return this.reservations.listForPlayer(req.user.userId);
  }

  @Get('reservations/upcoming')
  upcoming(@Req() req: AuthenticatedRequest) {
    return this.reservations.listUpcoming(req.user.userId);
  }
}
