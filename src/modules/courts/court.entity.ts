import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { SurfaceType } from './surface-type.enum';

export const COURT_NAME_INDEX = 'UQ_courts_name';

export const MIN_PLAYER_CAPACITY = 2;
export const MAX_PLAYER_CAPACITY = 6;

@Entity({ name: 'courts' })
@Index(COURT_NAME_INDEX, ['name'], { unique: true })
@Check('CHK_courts_player_capacity', `"playerCapacity" BETWEEN 2 AND 6`)
@Check('CHK_courts_hourly_rate', `"hourlyRate" >= 0`)
export class Court {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'enum', enum: SurfaceType, default: SurfaceType.GLASS })
  surfaceType!: SurfaceType;

  @Column('decimal', {
    precision: 8,
    scale: 2,
    transformer: {
      to: (value: number): number => value,
      from: (value: string): number => parseFloat(value),
    },
  })
  hourlyRate!: number;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'int', default: 4 })
  playerCapacity!: number;

  // soft delete: courts are deactivated, never removed while reservations point at them
  @Column({ type: 'boolean', default: true })
  active!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
