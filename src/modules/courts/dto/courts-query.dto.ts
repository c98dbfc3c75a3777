import { IsEnum, IsOptional } from 'class-validator';
import { SurfaceType } from '../surface-type.enum';

export class CourtsQueryDto {
  @IsOptional()
  @IsEnum(SurfaceType)
  surfaceType?: SurfaceType;
}
