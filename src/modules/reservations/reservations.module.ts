import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { Reservation } from './reservation.entity';
import { ReservationsService } from './reservations.service';
import { ReservationsController } from './reservations.controller';
import { MeReservationsController } from './me-reservations.controller';
import { ReservationsAdminController } from './reservations-admin.controller';
import { CourtsModule } from '../courts/courts.module';
import { UsersModule } from '../users/users.module';
import { AvailabilityModule } from '../availability/availability.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([Reservation]),
    CourtsModule,
    UsersModule,
    AvailabilityModule,
  ],
  controllers: [
    ReservationsController,
    MeReservationsController,
    ReservationsAdminController,
  ],
  providers: [ReservationsService],
  exports: [ReservationsService],
})
export class ReservationsModule {}
