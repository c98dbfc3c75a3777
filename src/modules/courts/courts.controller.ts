import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Patch,
  Post,
  UseGuards,
} from '@nestjs/common';
import { CourtsService } from './courts.service';
import { CreateCourtDto } from './dto/create-court.dto';
import { UpdateCourtDto } from './dto/update-court.dto';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { RolesGuard } from '../auth/roles.guard';
import { Roles } from '../auth/roles.decorator';
import { UserRole } from '../users/user-role.enum';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';

@Controller('admin/courts')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(UserRole.ADMIN)
export class CourtsController {
  constructor(private readonly service: CourtsService) {}

  @Post()
  create(@Body() dto: CreateCourtDto) {
    return this.service.create(dto);
  }

  // includes inactive courts
  @Get()
  findAll() {
    return this.service.findAll();
  }

  @Get(':id')
  findOne(@Param('id', new ParseRequiredUuidPipe('id')) id: string) {
    return this.service.findOne(id);
  }

  @Patch(':id')
  update(
    @Param('id', new ParseRequiredUuidPipe('id')) id: string,
    @Body() dto: UpdateCourtDto,
  ) {
    return this.service.update(id, dto);
  }

  @Delete(':id')
  remove(@Param('id', new ParseRequiredUuidPipe('id')) id: string) {
    return this.service.deactivate(id);
  }
}
