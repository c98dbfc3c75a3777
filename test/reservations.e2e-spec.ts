import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import request from 'supertest';
import { App } from 'supertest/types';

import {
  NOT_CANCELLABLE_MESSAGE,
  ReservationsController,
} from '../src/modules/reservations/reservations.controller';
import { MeReservationsController } from '../src/modules/reservations/me-reservations.controller';
import { ReservationsAdminController } from '../src/modules/reservations/reservations-admin.controller';
import { ReservationsService } from '../src/modules/reservations/reservations.service';
import {
  Reservation,
  ReservationStatus,
} from '../src/modules/reservations/reservation.entity';
import { SLOT_TAKEN_MESSAGE } from '../src/modules/reservations/booking-errors';
import { AvailabilityService } from '../src/modules/availability/availability.service';
import { CourtsService } from '../src/modules/courts/courts.service';
import { UsersService } from '../src/modules/users/users.service';
import { JwtAuthGuard } from '../src/modules/auth/jwt-auth.guard';
import { InMemoryReservationStore } from '../src/test-utils/in-memory-reservation-store';
import {
  COURT_ID,
  makeCourt,
  makeReservation,
  RESERVATION_ID,
} from '../src/test-utils/fixtures';
import { fakeGuard } from './test-auth';

const TODAY = '2026-05-10';
const TOMORROW = '2026-05-11';
const FIRST_ID = '00000000-0000-4000-8000-000000000001';

describe('Reservations (e2e)', () => {
  let app: INestApplication<App>;
  let store: InMemoryReservationStore;
  const central = makeCourt();

  beforeEach(async () => {
    store = new InMemoryReservationStore([central]);
    const manager = {
      query: jest.fn().mockResolvedValue([]),
      getRepository: () => store,
    };

    const moduleFixture: TestingModule = await Test.createTestingModule({
      controllers: [
        ReservationsController,
        MeReservationsController,
        ReservationsAdminController,
      ],
      providers: [
        ReservationsService,
        AvailabilityService,
        { provide: getRepositoryToken(Reservation), useValue: store },
        {
          provide: DataSource,
          useValue: {
            transaction: (cb: (m: typeof manager) => Promise<unknown>) =>
              cb(manager),
          },
        },
        {
          provide: CourtsService,
          useValue: { findOne: jest.fn().mockResolvedValue(central) },
        },
        { provide: UsersService, useValue: { findById: jest.fn() } },
        { provide: ConfigService, useValue: { get: () => 'UTC' } },
      ],
    })
      .overrideGuard(JwtAuthGuard)
      .useValue(fakeGuard())
      .compile();

    jest
      .spyOn(moduleFixture.get(AvailabilityService), 'today')
      .mockReturnValue(TODAY);

    app = moduleFixture.createNestApplication();
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        transform: true,
        forbidNonWhitelisted: true,
        transformOptions: { enableImplicitConversion: false },
      }),
    );
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  const book = (body: object, user?: string) => {
    const req = request(app.getHttpServer()).post('/reservations');
    if (user) req.set('x-test-user', user);
    return req.send(body);
  };

  describe('POST /reservations', () => {
    it('books a free slot', async () => {
      const res = await book({
        courtId: COURT_ID,
        date: TOMORROW,
        startTime: '10:00',
      }).expect(200);

      expect(res.body).toEqual({ success: true, reservationId: FIRST_ID });
      expect(store.rows[0]).toMatchObject({
        endTime: '11:00',
        totalPrice: 80,
        status: ReservationStatus.CONFIRMED,
      });
    });

    it('reports a taken slot in the envelope', async () => {
      const body = { courtId: COURT_ID, date: TOMORROW, startTime: '10:00' };
      await book(body).expect(200);

      const res = await book(body, 'outsider').expect(200);

      expect(res.body).toEqual({ success: false, error: SLOT_TAKEN_MESSAGE });
    });

    it('reports a past date in the envelope', async () => {
      const res = await book({
        courtId: COURT_ID,
        date: '2026-05-09',
        startTime: '10:00',
      }).expect(200);

      expect(res.body).toEqual({
        success: false,
        error: 'Reservations cannot be made for past dates.',
      });
      expect(store.rows).toHaveLength(0);
    });

    it('reports hours outside the window', async () => {
      const res = await book({
        courtId: COURT_ID,
        date: TOMORROW,
        startTime: '22:00',
      }).expect(200);

      expect(res.body).toEqual({
        success: false,
        error: 'Reservations are only available between 08:00 and 22:00.',
      });
    });

    it('rejects a malformed start time before reaching the writer', async () => {
      await book({ courtId: COURT_ID, date: TOMORROW, startTime: '9' }).expect(
        400,
      );
    });
  });

  describe('POST /reservations/quick', () => {
    it('books from the board', async () => {
      const res = await request(app.getHttpServer())
        .post('/reservations/quick')
        .send({ courtId: COURT_ID, date: TOMORROW, time: '18:00' })
        .expect(200);

      expect(res.body).toEqual({ success: true, reservationId: FIRST_ID });
      expect(store.rows[0].startTime).toBe('18:00');
    });
  });

  describe('POST /reservations/:id/cancel', () => {
    beforeEach(async () => {
      await store.save(makeReservation({ date: TOMORROW }));
    });

    it('lets the owner cancel', async () => {
      const res = await request(app.getHttpServer())
        .post(`/reservations/${RESERVATION_ID}/cancel`)
        .expect(200);

      expect(res.body).toEqual({ success: true });
      expect(store.rows[0]).toMatchObject({
        status: ReservationStatus.CANCELLED,
        notes: 'Cancelled by: Test Player',
      });
    });

    it('says so when it is no longer cancellable', async () => {
      await request(app.getHttpServer())
        .post(`/reservations/${RESERVATION_ID}/cancel`)
        .expect(200);

      const res = await request(app.getHttpServer())
        .post(`/reservations/${RESERVATION_ID}/cancel`)
        .expect(200);

      expect(res.body).toEqual({
        success: false,
        error: NOT_CANCELLABLE_MESSAGE,
      });
    });

    it('refuses other players', async () => {
      const res = await request(app.getHttpServer())
        .post(`/reservations/${RESERVATION_ID}/cancel`)
        .set('x-test-user', 'outsider')
        .expect(200);

      expect(res.body).toEqual({
        success: false,
        error: 'You cannot access this reservation',
      });
      expect(store.rows[0].status).toBe(ReservationStatus.CONFIRMED);
    });

    it('validates the id', async () => {
      await request(app.getHttpServer())
        .post('/reservations/not-a-uuid/cancel')
        .expect(400);
    });
  });

  describe('reads', () => {
    beforeEach(async () => {
      await store.save(makeReservation({ date: TOMORROW }));
    });

    it('GET /reservations/:id returns the view to the owner', async () => {
      const res = await request(app.getHttpServer())
        .get(`/reservations/${RESERVATION_ID}`)
        .expect(200);

      expect(res.body).toMatchObject({
        id: RESERVATION_ID,
        courtName: 'Central',
        durationHours: 1,
        canCancel: true,
      });
    });

    it('GET /reservations/:id is forbidden to others', async () => {
      const res = await request(app.getHttpServer())
        .get(`/reservations/${RESERVATION_ID}`)
        .set('x-test-user', 'outsider')
        .expect(403);

      expect(res.body.code).toBe('RESERVATION_FORBIDDEN');
    });

    it('GET /me/reservations/upcoming lists the caller bookings', async () => {
      const res = await request(app.getHttpServer())
        .get('/me/reservations/upcoming')
        .expect(200);

      expect(res.body).toHaveLength(1);
      expect(res.body[0].id).toBe(RESERVATION_ID);
    });

    it('GET /me/reservations is empty for someone else', async () => {
      const res = await request(app.getHttpServer())
        .get('/me/reservations')
        .set('x-test-user', 'outsider')
        .expect(200);

      expect(res.body).toEqual([]);
    });
  });

  describe('admin bulk transitions', () => {
    beforeEach(async () => {
      await store.save(makeReservation({ date: TOMORROW }));
    });

    it('is closed to players', async () => {
      await request(app.getHttpServer())
        .patch('/admin/reservations/complete')
        .send({ ids: [RESERVATION_ID] })
        .expect(403);
    });

    it('completes confirmed reservations', async () => {
      const res = await request(app.getHttpServer())
        .patch('/admin/reservations/complete')
        .set('x-test-user', 'admin')
        .send({ ids: [RESERVATION_ID] })
        .expect(200);

      expect(res.body).toEqual({ updated: 1 });
      expect(store.rows[0].status).toBe(ReservationStatus.COMPLETED);
    });

    it('cancels on behalf of the club', async () => {
      const res = await request(app.getHttpServer())
        .patch('/admin/reservations/cancel')
        .set('x-test-user', 'admin')
        .send({ ids: [RESERVATION_ID] })
        .expect(200);

      expect(res.body).toEqual({ updated: 1 });
      expect(store.rows[0].notes).toBe('Cancelled by: Club Admin');
    });

    it('requires a non-empty id list', async () => {
      await request(app.getHttpServer())
        .patch('/admin/reservations/no-show')
        .set('x-test-user', 'admin')
        .send({ ids: [] })
        .expect(400);
    });
  });
});
