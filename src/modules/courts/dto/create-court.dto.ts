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
import { Transform } from 'class-transformer';
import { toBoolean } from '../../../common/transforms/to-boolean.transform';
import { SurfaceType } from '../surface-type.enum';
import { MAX_PLAYER_CAPACITY, MIN_PLAYER_CAPACITY } from '../court.entity';

export class CreateCourtDto {
  @IsString()
  @Length(2, 100)
  name!: string;

  @IsEnum(SurfaceType)
  surfaceType!: SurfaceType;

  @Transform(({ value }: { value: unknown }) => Number(value))
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  hourlyRate!: number;

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
  @Transform(({ value }: { value: unknown }) => toBoolean(value))
  @IsBoolean()
  active?: boolean;
}
