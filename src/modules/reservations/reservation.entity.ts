import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Court } from '../courts/court.entity';
import { User } from '../users/user.entity';

export enum ReservationStatus {
  CONFIRMED = 'confirmed',
  CANCELLED = 'cancelled',
  COMPLETED = 'completed',
  NO_SHOW = 'no_show',
}

export const CONFIRMED_SLOT_INDEX = 'UQ_reservations_confirmed_slot';

@Entity({ name: 'reservations' })
// at most one confirmed reservation per court/date/start; other statuses may repeat the key
@Index(CONFIRMED_SLOT_INDEX, ['courtId', 'date', 'startTime'], {
  unique: true,
  where: `"status" = 'confirmed'`,
})
@Index('IDX_reservations_court_date_status', ['courtId', 'date', 'status'])
@Index('IDX_reservations_player_date', ['playerId', 'date'])
@Check('CHK_reservations_time_range', `"endTime" > "startTime"`)
export class Reservation {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  courtId!: string;

  @ManyToOne(() => Court, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'courtId' })
  court!: Court;

  @Column({ type: 'uuid' })
  playerId!: string;

  @ManyToOne(() => User, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'playerId' })
  player!: User;

  // YYYY-MM-DD
  @Column({ type: 'date' })
  date!: string;

  // HH:MM
  @Column({ type: 'varchar', length: 5 })
  startTime!: string;

  // HH:MM
  @Column({ type: 'varchar', length: 5 })
  endTime!: string;

  @Column({
    type: 'enum',
    enum: ReservationStatus,
    default: ReservationStatus.CONFIRMED,
  })
  status!: ReservationStatus;

  @Column('decimal', {
    precision: 8,
    scale: 2,
    transformer: {
      to: (value: number): number => value,
      from: (value: string): number => parseFloat(value),
    },
  })
  totalPrice!: number;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
