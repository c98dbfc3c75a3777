import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { SurfaceType } from '../surface-type.enum';
import { MAX_PLAYER_CAPACITY, MIN_PLAYER_CAPACITY } from '../court.entity';

export class UpdateCourtDto {
  @IsOptional()
  @IsString()
  @Length(2, 100)
  name?: string;

  @IsOptional()
  @IsEnum(SurfaceType)
  surfaceType?: SurfaceType;

  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  hourlyRate?: number;

  @IsOptional()
  @IsString()
  @MaxLength(1000)
  description?: string;

  @IsOptional()
  @IsInt()
  @Min(MIN_PLAYER_CAPACITY)
  @Max(MAX_PLAYER_CAPACITY)
  playerCapacity?: number;

  @IsOptional()
  @IsBoolean()
  active?: boolean;
}
