import { Test, TestingModule } from '@nestjs/testing';
import { DaySummaryService } from './day-summary.service';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import { NOTIFICATION_CHANNEL } from '../notifications/notification-channel';
import { ChannelConfigService } from '../settings/channel-config.service';
import { createDrizzleMock, type MockDb } from '../common/testing/drizzle-mock';
import { FakeNotificationChannel } from '../common/testing/fake-notification-channel';
import {
  createMockApplication,
  createMockEvent,
} from '../common/testing/factories';

const DATE = '2026-03-10';

describe('DaySummaryService', () => {
  let service: DaySummaryService;
  let mockDb: MockDb;
  let channel: FakeNotificationChannel;
  let channelConfig: { getAdminChannelId: jest.Mock; recordMigration: jest.Mock };

  const event = createMockEvent();
  const application = createMockApplication({ status: 'pending' });
  const storedRow = (messageId: string, channelId = 'admin-channel') => ({
    date: DATE,
    channelId,
    messageId,
    updatedAt: new Date('2026-03-09T12:00:00Z'),
  });

  beforeEach(async () => {
    mockDb = createDrizzleMock();
    channel = new FakeNotificationChannel();
    channelConfig = {
      getAdminChannelId: jest.fn().mockResolvedValue('admin-channel'),
      recordMigration: jest.fn().mockResolvedValue(undefined),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DaySummaryService,
        { provide: DrizzleAsyncProvider, useValue: mockDb },
        { provide: NOTIFICATION_CHANNEL, useValue: channel },
        { provide: ChannelConfigService, useValue: channelConfig },
      ],
    }).compile();

    service = module.get(DaySummaryService);
  });

  it('posts the first summary of a date and stores its handle', async () => {
    mockDb.enqueue([event], [application], [], []);

    await expect(service.refresh(DATE)).resolves.toBe('sent');

    const [posted] = channel.sentToChannel('admin-channel');
    expect(posted.content.split('\n')[3]).toBe(
      '⏳ Olena Test, +380 50 123 4567 · [#1](https://chat.test/admin-channel/group-1)',
    );
    expect(mockDb.onConflictDoUpdate).toHaveBeenCalledWith(
      expect.objectContaining({
        set: expect.objectContaining({ channelId: 'admin-channel', messageId: 'msg-1' }),
      }),
    );
  });

  it('counts an identical re-render as success', async () => {
    mockDb.enqueue([event], [application], [], []);
    await service.refresh(DATE);

    mockDb.enqueue([event], [application], [storedRow('msg-1')]);
    await expect(service.refresh(DATE)).resolves.toBe('unchanged');

    expect(channel.sent).toHaveLength(1);
    expect(channel.edits).toHaveLength(0);
  });

  it('reposts when the stored message was deleted', async () => {
    mockDb.enqueue([event], [application], [storedRow('gone')], [], []);

    await expect(service.refresh(DATE)).resolves.toBe('sent');

    expect(mockDb.delete).toHaveBeenCalled();
    expect(channel.sent).toHaveLength(1);
  });

  it('posts nothing for an empty day without a message', async () => {
    mockDb.enqueue([], []);

    await expect(service.refresh(DATE)).resolves.toBe('skipped');
    expect(channel.sent).toHaveLength(0);
  });

  it('empties an existing message when the day has no events left', async () => {
    const handle = { channelId: 'admin-channel', messageId: 'old' };
    channel.seed(handle, { content: 'stale', tone: 'info' });
    mockDb.enqueue([], [storedRow('old')]);

    await expect(service.refresh(DATE)).resolves.toBe('edited');
    expect(channel.current(handle)?.content).toBe(
      '📋 **Tue 10.03 (2026-03-10)**\n\nNo procedures scheduled.',
    );
  });

  it('records a channel migration and retries once in the new channel', async () => {
    const handle = { channelId: 'admin-channel', messageId: 'old' };
    channel.seed(handle, { content: 'stale' });
    channel.failNext('edit', 'migrated', 'admin-2');
    channelConfig.getAdminChannelId.mockResolvedValue('admin-2');
    mockDb.enqueue(
      [event],
      [application],
      [storedRow('old')],
      [],
      [event],
      [application],
      [],
      [],
    );

    await expect(service.refresh(DATE)).resolves.toBe('sent');

    expect(channelConfig.recordMigration).toHaveBeenCalledWith('admin', 'admin-2');
    expect(channel.sentToChannel('admin-2')).toHaveLength(1);
  });

  it('gives up after a second migration', async () => {
    channel.failNext('send', 'migrated', 'admin-2');
    channel.failNext('send', 'migrated', 'admin-3');
    mockDb.enqueue([event], [application], [], [], [event], [application], []);

    await expect(service.refresh(DATE)).rejects.toMatchObject({
      kind: 'migrated',
      migratedTo: 'admin-3',
    });
    expect(channelConfig.recordMigration).toHaveBeenCalledTimes(1);
  });

  it('runs refreshes of the same date one after another', async () => {
    mockDb.enqueue(
      [event],
      [application],
      [],
      [],
      [event],
      [application],
      [storedRow('msg-1')],
    );

    const results = await Promise.all([service.refresh(DATE), service.refresh(DATE)]);

    expect(results).toEqual(['sent', 'unchanged']);
    expect(channel.sent).toHaveLength(1);
  });
});
