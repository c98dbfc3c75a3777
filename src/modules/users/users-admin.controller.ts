import {
  Body,
  Controller,
  Get,
  Param,
  Patch,
  UseGuards,
} from '@nestjs/common';

import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { RolesGuard } from '../auth/roles.guard';
import { Roles } from '../auth/roles.decorator';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';

import { UsersService } from './users.service';
import { UpdateUserActiveDto } from './dto/update-user-active.dto';
import { UserRole } from './user-role.enum';

@Controller('admin/users')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(UserRole.ADMIN)
export class UsersAdminController {
  constructor(private readonly users: UsersService) {}

  // active accounts with their confirmed reservation counts
  @Get()
  list() {
    return this.users.listActiveWithReservationCounts();
  }

  // activate / deactivate an account; inactive users cannot sign in or be booked for
  @Patch(':userId/active')
  setActive(
    @Param('userId', new ParseRequiredUuidPipe('userId')) userId: string,
    @Body() dto: UpdateUserActiveDto,
  ) {
    return this.users.setActive(userId, dto.active);
  }
}
