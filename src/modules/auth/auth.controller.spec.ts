import { Test, TestingModule } from '@nestjs/testing';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { UserRole } from '../users/user-role.enum';
import type { AuthenticatedRequest } from './auth.types';

describe('AuthController', () => {
  let controller: AuthController;
  let authService: { register: jest.Mock; login: jest.Mock };

  beforeEach(async () => {
    authService = { register: jest.fn(), login: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AuthController],
      providers: [{ provide: AuthService, useValue: authService }],
    }).compile();

    controller = module.get<AuthController>(AuthController);
  });

  it('delegates login to the service', async () => {
    authService.login.mockResolvedValue({ accessToken: 'token-123' });

    await expect(
      controller.login({ email: 'player@test.com', password: 'test-password' }),
    ).resolves.toEqual({ accessToken: 'token-123' });
  });

  it('returns the authenticated user from the request', () => {
    const user = {
      userId: 'player-id',
      email: 'player@test.com',
      role: UserRole.PLAYER,
      displayName: 'player',
    };
    const req = { user } as AuthenticatedRequest;

    expect(controller.me(req)).toBe(user);
  });
});
