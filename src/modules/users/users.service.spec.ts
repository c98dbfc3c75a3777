import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { displayNameOf, UsersService } from './users.service';
import { User } from './user.entity';
import { createMockRepo } from '@/test-utils/mock-repo';
import { makeUser, PLAYER_ID } from '@/test-utils/fixtures';
import { UserRole } from './user-role.enum';
import { SkillLevel } from './skill-level.enum';
import { ReservationStatus } from '../reservations/reservation.entity';

describe('UsersService', () => {
  let service: UsersService;
  const userRepo = createMockRepo();

  beforeEach(async () => {
    jest.resetAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: getRepositoryToken(User), useValue: userRepo },
      ],
    }).compile();

    service = module.get<UsersService>(UsersService);
  });

  it('normalizes the email on lookup', async () => {
    userRepo.findOne.mockResolvedValue(null);

    await service.findByEmail('  Player@Test.com ');

    expect(userRepo.findOne).toHaveBeenCalledWith({
      where: { email: 'player@test.com' },
    });
  });

  it('normalizes the email on create', async () => {
    userRepo.create.mockImplementation((input: Partial<User>) => input);
    userRepo.save.mockImplementation((input: User) => Promise.resolve(input));

    const created = await service.create({ email: 'NEW@Test.com ' });

    expect(created.email).toBe('new@test.com');
  });

  it('deactivates an active user', async () => {
    const user = makeUser({ active: true });
    userRepo.findOne.mockResolvedValue(user);
    userRepo.save.mockImplementation((input: User) => Promise.resolve(input));

    const result = await service.setActive(user.id, false);

    expect(result).toEqual({ ok: true, userId: user.id, active: false });
    expect(userRepo.save).toHaveBeenCalledTimes(1);
  });

  it('does not write when the flag is unchanged', async () => {
    const user = makeUser({ active: true });
    userRepo.findOne.mockResolvedValue(user);

    await service.setActive(user.id, true);

    expect(userRepo.save).not.toHaveBeenCalled();
  });

  it('throws when the user does not exist', async () => {
    userRepo.findOne.mockResolvedValue(null);

    await expect(service.setActive('missing', false)).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  describe('listActiveWithReservationCounts', () => {
    it('counts confirmed reservations of active users, newest first', async () => {
      const qb = {
        leftJoin: jest.fn().mockReturnThis(),
        select: jest.fn().mockReturnThis(),
        addSelect: jest.fn().mockReturnThis(),
        where: jest.fn().mockReturnThis(),
        groupBy: jest.fn().mockReturnThis(),
        orderBy: jest.fn().mockReturnThis(),
        getRawMany: jest.fn().mockResolvedValue([
          {
            userId: PLAYER_ID,
            email: 'player@test.com',
            role: UserRole.PLAYER,
            displayName: 'Test Player',
            phone: null,
            skillLevel: SkillLevel.INTERMEDIATE,
            createdAt: new Date('2026-01-01T12:00:00.000Z'),
            confirmedReservations: '3',
          },
        ]),
      };
      userRepo.createQueryBuilder.mockReturnValue(qb);

      const users = await service.listActiveWithReservationCounts();

      expect(users).toEqual([
        {
          userId: PLAYER_ID,
          email: 'player@test.com',
          role: UserRole.PLAYER,
          displayName: 'Test Player',
          phone: null,
          skillLevel: SkillLevel.INTERMEDIATE,
          createdAt: '2026-01-01T12:00:00.000Z',
          confirmedReservations: 3,
        },
      ]);
      expect(qb.leftJoin).toHaveBeenCalledWith(
        expect.anything(),
        'r',
        'r.playerId = u.id AND r.status = :confirmed',
        { confirmed: ReservationStatus.CONFIRMED },
      );
      expect(qb.where).toHaveBeenCalledWith('u.active = true');
      expect(qb.orderBy).toHaveBeenCalledWith('u.createdAt', 'DESC');
    });
  });

  describe('profile', () => {
    it('returns the own profile', async () => {
      userRepo.findOne.mockResolvedValue(makeUser());

      await expect(service.getProfile(PLAYER_ID)).resolves.toEqual({
        userId: PLAYER_ID,
        email: 'player@test.com',
        role: UserRole.PLAYER,
        displayName: 'Test Player',
        phone: null,
        skillLevel: null,
        createdAt: '2026-01-01T12:00:00.000Z',
      });
    });

    it('updates only the fields given', async () => {
      userRepo.findOne.mockResolvedValue(makeUser({ phone: '555-0100' }));
      userRepo.save.mockImplementation((input: User) => Promise.resolve(input));

      const profile = await service.updateProfile(PLAYER_ID, {
        displayName: '  Ana Rojas ',
        skillLevel: SkillLevel.ADVANCED,
      });

      expect(profile).toMatchObject({
        displayName: 'Ana Rojas',
        phone: '555-0100',
        skillLevel: SkillLevel.ADVANCED,
      });
      expect(userRepo.save).toHaveBeenCalledTimes(1);
    });

    it('throws for an unknown user', async () => {
      userRepo.findOne.mockResolvedValue(null);

      await expect(
        service.updateProfile('missing', { phone: '555-0100' }),
      ).rejects.toBeInstanceOf(NotFoundException);
      expect(userRepo.save).not.toHaveBeenCalled();
    });
  });

  describe('displayNameOf', () => {
    it('prefers the display name', () => {
      expect(
        displayNameOf({ email: 'ana@test.com', displayName: ' Ana Rojas ' }),
      ).toBe('Ana Rojas');
    });

    it('falls back to the email local part', () => {
      expect(displayNameOf({ email: 'ana@test.com', displayName: null })).toBe(
        'ana',
      );
    });
  });
});
