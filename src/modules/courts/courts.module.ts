import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { Court } from './court.entity';
import { CourtsService } from './courts.service';
import { CourtsController } from './courts.controller';
import { PublicCourtsController } from './public-courts.controller';

@Module({
  imports: [TypeOrmModule.forFeature([Court])],
  controllers: [CourtsController, PublicCourtsController],
  providers: [CourtsService],
  exports: [CourtsService],
})
export class CourtsModule {}
