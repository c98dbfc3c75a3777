import {
  ConflictException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { UsersService } from '../users/users.service';
import { UserRole } from '../users/user-role.enum';
import { User } from '../users/user.entity';
import { RegisterDto } from './dto/register.dto';
import { LoginDto } from './dto/login.dto';
import type { JwtPayload } from './jwt.strategy';

const BCRYPT_ROUNDS = 10;

export type AccessToken = { accessToken: string };

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly users: UsersService,
    private readonly jwt: JwtService,
  ) {}

  /** Self-registration always yields a player; admins are provisioned out of band. */
  async register(input: RegisterDto): Promise<AccessToken> {
    const exists = await this.users.findByEmail(input.email);
    if (exists) {
      throw new ConflictException({
        statusCode: 409,
        code: 'EMAIL_TAKEN',
        message: 'Email already in use',
      });
    }

    const passwordHash = await bcrypt.hash(input.password, BCRYPT_ROUNDS);
    const user = await this.users.create({
      email: input.email,
      passwordHash,
      role: UserRole.PLAYER,
      displayName: input.displayName?.trim() || null,
      skillLevel: input.skillLevel ?? null,
      phone: input.phone?.trim() || null,
      active: true,
    });

    this.logger.log(`registered player ${user.id}`);
    return this.issueToken(user);
  }

  async login(input: LoginDto): Promise<AccessToken> {
    const user = await this.users.findByEmail(input.email);
    if (!user || !user.active)
      throw new UnauthorizedException('Invalid credentials');

    const ok = await bcrypt.compare(input.password, user.passwordHash);
    if (!ok) throw new UnauthorizedException('Invalid credentials');

    return this.issueToken(user);
  }

  private issueToken(user: Pick<User, 'id' | 'email' | 'role'>): AccessToken {
    const payload: JwtPayload = {
      sub: user.id,
      email: user.email,
      role: user.role,
    };
    return { accessToken: this.jwt.sign(payload) };
  }
}
