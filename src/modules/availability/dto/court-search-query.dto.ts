import { Type } from 'class-transformer';
import { IsEnum, IsNumber, IsOptional, Matches, Min } from 'class-validator';
import { SurfaceType } from '../../courts/surface-type.enum';
import { ISO_DATE_PATTERN, TIME_OF_DAY_PATTERN } from '../operating-hours';

export class CourtSearchQueryDto {
  @Matches(ISO_DATE_PATTERN, { message: 'date must be YYYY-MM-DD' })
  date!: string;

  @Matches(TIME_OF_DAY_PATTERN, { message: 'startTime must be HH:MM' })
  startTime!: string;

  @IsOptional()
  @IsEnum(SurfaceType)
  surfaceType?: SurfaceType;

  @IsOptional()
  @Type(() => Number)
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  maxRate?: number;
}
