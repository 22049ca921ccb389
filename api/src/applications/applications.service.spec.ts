import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';
import {
  SubmitApplicationResultSchema,
  type SubmitApplicationInput,
} from '@procedure-desk/contract';
import { ApplicationsService } from './applications.service';
import { QueueService } from './queue.service';
import { ApplicationMessageService } from './application-message.service';
import { APPLICATION_EVENTS } from './applications.constants';
import { submissionReceipt } from './candidate-messages';
import { NotifierService } from '../notifications/notifier.service';
import { UsersService } from '../users/users.service';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import { createDrizzleMock, type MockDb } from '../common/testing/drizzle-mock';
import {
  createMockApplication,
  createMockEvent,
  createMockUser,
} from '../common/testing/factories';

function input(overrides: Partial<SubmitApplicationInput> = {}): SubmitApplicationInput {
  return {
    candidateDiscordId: '100000000000000001',
    eventIds: [1],
    fullName: '  Olena Test ',
    phone: '+380 (50) 123-45-67',
    consent: true,
    ...overrides,
  };
}

describe('ApplicationsService', () => {
  let service: ApplicationsService;
  let mockDb: MockDb;
  let usersService: { ensureUser: jest.Mock; saveContact: jest.Mock };
  let queueService: QueueService;
  let messageService: { publishGroup: jest.Mock };
  let notifier: { notifyCandidate: jest.Mock };
  let eventEmitter: { emit: jest.Mock };

  beforeEach(async () => {
    mockDb = createDrizzleMock();
    usersService = {
      ensureUser: jest.fn().mockResolvedValue(createMockUser({ id: 1 })),
      saveContact: jest.fn().mockResolvedValue(undefined),
    };
    messageService = {
      publishGroup: jest
        .fn()
        .mockResolvedValue({ channelId: 'admin-channel', messageId: 'group-1' }),
    };
    notifier = { notifyCandidate: jest.fn().mockResolvedValue(null) };
    eventEmitter = { emit: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ApplicationsService,
        { provide: DrizzleAsyncProvider, useValue: mockDb },
        { provide: UsersService, useValue: usersService },
        QueueService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((_key: string, fallback?: string) => fallback),
          },
        },
        { provide: ApplicationMessageService, useValue: messageService },
        { provide: NotifierService, useValue: notifier },
        { provide: EventEmitter2, useValue: eventEmitter },
      ],
    }).compile();

    service = module.get(ApplicationsService);
    queueService = module.get(QueueService);
    jest.spyOn(queueService, 'recalculateInTransaction');
  });

  describe('submit', () => {
    it('stores one application per event and posts one admin message', async () => {
      const e1 = createMockEvent({ id: 1, date: '2026-03-10' });
      const e2 = createMockEvent({ id: 2, date: '2026-03-10', time: '11:00' });
      const rows = [
        createMockApplication({ id: 11, eventId: 1 }),
        createMockApplication({ id: 12, eventId: 2 }),
      ];
      mockDb.enqueue([e1, e2], [], rows);

      const result = await service.submit(input({ eventIds: [1, 2] }));

      expect(result).toEqual({ applicationIds: [11, 12], photosTruncated: false });
      expect(SubmitApplicationResultSchema.parse(result)).toEqual(result);
      expect(mockDb.for).toHaveBeenCalledWith('update');
      expect(usersService.saveContact).toHaveBeenCalledWith(
        1,
        'Olena Test',
        '380501234567',
      );
      expect(mockDb.values).toHaveBeenCalledWith([
        { eventId: 1, userId: 1, fullName: 'Olena Test', phone: '380501234567', consent: true },
        { eventId: 2, userId: 1, fullName: 'Olena Test', phone: '380501234567', consent: true },
      ]);
      expect(queueService.recalculateInTransaction).toHaveBeenCalledWith(
        mockDb,
        1,
      );
      expect(queueService.recalculateInTransaction).toHaveBeenCalledWith(
        mockDb,
        2,
      );
      expect(messageService.publishGroup).toHaveBeenCalledWith([11, 12], []);
      expect(notifier.notifyCandidate).toHaveBeenCalledWith(
        expect.objectContaining({ id: 1, botBlockedAt: null }),
        submissionReceipt(
          [
            { application: rows[0], event: e1 },
            { application: rows[1], event: e2 },
          ],
          false,
        ),
      );
      expect(eventEmitter.emit).toHaveBeenCalledWith(APPLICATION_EVENTS.SUBMITTED, {
        applicationIds: [11, 12],
        eventIds: [1, 2],
        dates: ['2026-03-10'],
      });
    });

    it('keeps the first three photos and flags the truncation', async () => {
      const event = createMockEvent({ needsPhoto: true });
      mockDb.enqueue([event], [], [createMockApplication({ id: 11 })], []);

      const result = await service.submit(
        input({ photos: ['p1', 'p2', 'p3', 'p4'] }),
      );

      expect(result).toEqual({ applicationIds: [11], photosTruncated: true });
      expect(mockDb.values).toHaveBeenLastCalledWith([
        { applicationId: 11, fileRef: 'p1' },
        { applicationId: 11, fileRef: 'p2' },
        { applicationId: 11, fileRef: 'p3' },
      ]);
      expect(messageService.publishGroup).toHaveBeenCalledWith(
        [11],
        ['p1', 'p2', 'p3'],
      );
    });

    it('still succeeds when the admin message cannot be posted', async () => {
      messageService.publishGroup.mockRejectedValue(new Error('offline'));
      mockDb.enqueue([createMockEvent()], [], [createMockApplication({ id: 11 })]);

      await expect(service.submit(input())).resolves.toEqual({
        applicationIds: [11],
        photosTruncated: false,
      });
      expect(eventEmitter.emit).toHaveBeenCalled();
    });

    it('rejects a phone number with fewer than 10 digits', async () => {
      await expect(
        service.submit(input({ phone: '123-45-67' })),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(usersService.ensureUser).not.toHaveBeenCalled();
    });

    it('rejects the same event twice in one submission', async () => {
      await expect(
        service.submit(input({ eventIds: [1, 1] })),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('forbids banned candidates', async () => {
      usersService.ensureUser.mockResolvedValue(createMockUser({ isBlocked: true }));

      await expect(service.submit(input())).rejects.toBeInstanceOf(
        ForbiddenException,
      );
      expect(mockDb.insert).not.toHaveBeenCalled();
    });

    it('throws NotFoundException for an unknown event', async () => {
      mockDb.enqueue([]);

      await expect(service.submit(input({ eventIds: [5] }))).rejects.toThrow(
        new NotFoundException('Event 5 not found'),
      );
    });

    it('refuses events that are not published', async () => {
      mockDb.enqueue([createMockEvent({ status: 'draft' })]);

      await expect(service.submit(input())).rejects.toThrow(
        'Event 1 is not accepting applications',
      );
    });

    it('checks the event status on the locked row', async () => {
      // The event was cancelled after the candidate opened the form
      mockDb.enqueue([createMockEvent({ status: 'cancelled' })]);

      await expect(service.submit(input())).rejects.toThrow(
        'Event 1 is not accepting applications',
      );
      expect(mockDb.for).toHaveBeenCalledWith('update');
      expect(mockDb.insert).not.toHaveBeenCalled();
      expect(usersService.saveContact).not.toHaveBeenCalled();
    });

    it('requires a photo for photo-required events', async () => {
      mockDb.enqueue([createMockEvent({ needsPhoto: true })]);

      await expect(service.submit(input())).rejects.toThrow(
        'A photo is required for the selected procedure',
      );
    });

    it('refuses a second active application for the same event', async () => {
      mockDb.enqueue([createMockEvent()], [{ eventId: 1 }]);

      await expect(service.submit(input())).rejects.toBeInstanceOf(
        ConflictException,
      );
      expect(mockDb.insert).not.toHaveBeenCalled();
    });
  });
});
