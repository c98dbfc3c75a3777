import { Court } from '../modules/courts/court.entity';
import { SurfaceType } from '../modules/courts/surface-type.enum';
import {
  Reservation,
  ReservationStatus,
} from '../modules/reservations/reservation.entity';
import { User } from '../modules/users/user.entity';
import { UserRole } from '../modules/users/user-role.enum';

export const PLAYER_ID = 'a1111111-1111-4111-8111-111111111111';
export const OTHER_PLAYER_ID = 'a2222222-2222-4222-8222-222222222222';
export const ADMIN_ID = 'a3333333-3333-4333-8333-333333333333';
export const COURT_ID = 'c1111111-1111-4111-8111-111111111111';
export const RESERVATION_ID = 'b1111111-1111-4111-8111-111111111111';

const CREATED_AT = new Date('2026-01-01T12:00:00.000Z');

export function makeUser(overrides: Partial<User> = {}): User {
  return Object.assign(
    new User(),
    {
      id: PLAYER_ID,
      email: 'player@test.com',
      passwordHash: 'hashed',
      role: UserRole.PLAYER,
      displayName: 'Test Player',
      skillLevel: null,
      phone: null,
      active: true,
      createdAt: CREATED_AT,
      updatedAt: CREATED_AT,
    },
    overrides,
  );
}

export function makeCourt(overrides: Partial<Court> = {}): Court {
  return Object.assign(
    new Court(),
    {
      id: COURT_ID,
      name: 'Central',
      surfaceType: SurfaceType.GLASS,
      hourlyRate: 80,
      description: null,
      playerCapacity: 4,
      active: true,
      createdAt: CREATED_AT,
      updatedAt: CREATED_AT,
    },
    overrides,
  );
}

export function makeReservation(
  overrides: Partial<Reservation> = {},
): Reservation {
  return Object.assign(
    new Reservation(),
    {
      id: RESERVATION_ID,
      courtId: COURT_ID,
      playerId: PLAYER_ID,
      date: '2026-05-11',
      startTime: '10:00',
      endTime: '11:00',
      status: ReservationStatus.CONFIRMED,
      totalPrice: 80,
      notes: null,
      createdAt: CREATED_AT,
      updatedAt: CREATED_AT,
    },
    overrides,
  );
}
