import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';

import { Court, COURT_NAME_INDEX } from './court.entity';
import { CreateCourtDto } from './dto/create-court.dto';
import { UpdateCourtDto } from './dto/update-court.dto';
import { SurfaceType } from './surface-type.enum';
import { isUniqueViolation } from '../../database/pg-error';

function normalizeText(s: string) {
  return s.trim();
}

function courtNotFound() {
  return new NotFoundException({
    statusCode: 404,
    code: 'COURT_NOT_FOUND',
    message: 'Court not found',
  });
}

@Injectable()
export class CourtsService {
  private readonly logger = new Logger(CourtsService.name);

  constructor(
    @InjectRepository(Court) private readonly repo: Repository<Court>,
  ) {}

  async create(dto: CreateCourtDto) {
    const court = this.repo.create({
      name: normalizeText(dto.name),
      surfaceType: dto.surfaceType,
      hourlyRate: dto.hourlyRate,
      description: dto.description?.trim() || null,
      playerCapacity: dto.playerCapacity ?? 4,
      active: dto.active ?? true,
    });

    const saved = await this.saveUniqueName(court);
    this.logger.log(`court created id=${saved.id} name="${saved.name}"`);
    return saved;
  }

  findAll() {
    return this.repo.find({ order: { name: 'ASC' } });
  }

  findActive(surfaceType?: SurfaceType) {
    const where: FindOptionsWhere<Court> = { active: true };
    if (surfaceType) where.surfaceType = surfaceType;
    return this.repo.find({ where, order: { name: 'ASC' } });
  }

  async findOne(id: string) {
    const court = await this.repo.findOne({ where: { id } });
    if (!court) throw courtNotFound();
    return court;
  }

  async findActiveById(id: string) {
    const court = await this.repo.findOne({ where: { id, active: true } });
    if (!court) throw courtNotFound();
    return court;
  }

  async update(id: string, dto: UpdateCourtDto) {
    const court = await this.findOne(id);

    if (dto.name !== undefined) court.name = normalizeText(dto.name);
    if (dto.surfaceType !== undefined) court.surfaceType = dto.surfaceType;
    if (dto.hourlyRate !== undefined) court.hourlyRate = dto.hourlyRate;
    if (dto.description !== undefined)
      court.description = dto.description.trim() || null;
    if (dto.playerCapacity !== undefined)
      court.playerCapacity = dto.playerCapacity;
    if (dto.active !== undefined) court.active = dto.active;

    return this.saveUniqueName(court);
  }

  /**
   * Courts are never hard-deleted: reservations keep pointing at them for
   * history. Deactivation hides every slot and blocks new bookings.
   */
  async deactivate(id: string) {
    const court = await this.findOne(id);
    if (court.active) {
      court.active = false;
      await this.repo.save(court);
      this.logger.log(`court deactivated id=${court.id}`);
    }
    return { ok: true, courtId: court.id, active: court.active };
  }

  private async saveUniqueName(court: Court) {
    try {
      return await this.repo.save(court);
    } catch (e: unknown) {
      if (isUniqueViolation(e, COURT_NAME_INDEX)) {
        throw new ConflictException({
          statusCode: 409,
          code: 'COURT_NAME_TAKEN',
          message: 'A court with that name already exists',
        });
      }
      throw e;
    }
  }
}
