import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from './user.entity';
import { UserRole } from './user-role.enum';
import { SkillLevel } from './skill-level.enum';
import {
  Reservation,
  ReservationStatus,
} from '../reservations/reservation.entity';

export type UserProfile = {
  userId: string;
  email: string;
  role: UserRole;
  displayName: string | null;
  phone: string | null;
  skillLevel: SkillLevel | null;
  createdAt: string;
};

export type ProfileUpdate = {
  displayName?: string;
  phone?: string;
  skillLevel?: SkillLevel;
};

export type AdminUserView = UserProfile & { confirmedReservations: number };

type AdminUserRow = {
  userId: string;
  email: string;
  role: UserRole;
  displayName: string | null;
  phone: string | null;
  skillLevel: SkillLevel | null;
  createdAt: Date | string;
  confirmedReservations: string | number;
};

function userNotFound() {
  return new NotFoundException({
    statusCode: 404,
    code: 'USER_NOT_FOUND',
    message: 'User not found',
  });
}

function normalizeEmail(email: string) {
  return email.toLowerCase().trim();
}

/** Name shown in attributions: display name, else the email's local part. */
export function displayNameOf(user: Pick<User, 'email' | 'displayName'>) {
  const name = user.displayName?.trim();
  if (name) return name;
  return user.email.split('@')[0];
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User) private readonly repo: Repository<User>,
  ) {}

  findByEmail(email: string): Promise<User | null> {
    return this.repo.findOne({ where: { email: normalizeEmail(email) } });
  }

  findById(id: string): Promise<User | null> {
    return this.repo.findOne({ where: { id } });
  }

  create(data: Partial<User>): Promise<User> {
    const ent = this.repo.create({
      ...data,
      email: data.email ? normalizeEmail(data.email) : data.email,
    });
    return this.repo.save(ent);
  }

  async setActive(userId: string, active: boolean) {
    const user = await this.repo.findOne({ where: { id: userId } });
    if (!user) throw userNotFound();

    if (user.active !== active) {
      user.active = active;
      await this.repo.save(user);
      this.logger.log(`user ${user.id} active=${active}`);
    }

    return { ok: true, userId: user.id, active: user.active };
  }

  // newest accounts first; cancelled or finished bookings are not counted
  async listActiveWithReservationCounts(): Promise<AdminUserView[]> {
    const rows = await this.repo
      .createQueryBuilder('u')
      .leftJoin(
        Reservation,
        'r',
        'r.playerId = u.id AND r.status = :confirmed',
        { confirmed: ReservationStatus.CONFIRMED },
      )
      .select('u.id', 'userId')
      .addSelect('u.email', 'email')
      .addSelect('u.role', 'role')
      .addSelect('u.displayName', 'displayName')
      .addSelect('u.phone', 'phone')
      .addSelect('u.skillLevel', 'skillLevel')
      .addSelect('u.createdAt', 'createdAt')
      .addSelect('COUNT(r.id)', 'confirmedReservations')
      .where('u.active = true')
      .groupBy('u.id')
      .orderBy('u.createdAt', 'DESC')
      .getRawMany<AdminUserRow>();

    return rows.map((row) => ({
      userId: row.userId,
      email: row.email,
      role: row.role,
      displayName: row.displayName,
      phone: row.phone,
      skillLevel: row.skillLevel,
      createdAt: new Date(row.createdAt).toISOString(),
      confirmedReservations: Number(row.confirmedReservations),
    }));
  }

  // ---------------------------
  // OWN PROFILE
  // ---------------------------

  async getProfile(userId: string): Promise<UserProfile> {
    const user = await this.repo.findOne({ where: { id: userId } });
    if (!user) throw userNotFound();
    return this.toProfile(user);
  }

  async updateProfile(
    userId: string,
    input: ProfileUpdate,
  ): Promise<UserProfile> {
    const user = await this.repo.findOne({ where: { id: userId } });
    if (!user) throw userNotFound();

    if (input.displayName !== undefined) {
      user.displayName = input.displayName.trim();
    }
    if (input.phone !== undefined) {
      user.phone = input.phone.trim() || null;
    }
    if (input.skillLevel !== undefined) {
      user.skillLevel = input.skillLevel;
    }

    const saved = await this.repo.save(user);
    return this.toProfile(saved);
  }

  private toProfile(user: User): UserProfile {
    return {
      userId: user.id,
      email: user.email,
      role: user.role,
      displayName: user.displayName,
      phone: user.phone,
      skillLevel: user.skillLevel,
      createdAt: user.createdAt.toISOString(),
    };
  }
}
