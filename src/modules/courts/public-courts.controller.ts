import { Controller, Get, Param, Query } from '@nestjs/common';
import { CourtsService } from './courts.service';
import { CourtsQueryDto } from './dto/courts-query.dto';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';

@Controller('courts')
export class PublicCourtsController {
  constructor(private readonly service: CourtsService) {}

  @Get()
  list(@Query() q: CourtsQueryDto) {
    return this.service.findActive(q.surfaceType);
  }

  @Get(':id')
  findOne(@Param('id', new ParseRequiredUuidPipe('id')) id: string) {
    return this.service.findActiveById(id);
  }
}
