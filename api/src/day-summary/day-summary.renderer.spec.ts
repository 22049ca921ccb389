import {
  countApplicationsPerUser,
  renderDaySummary,
  type DaySummaryEvent,
} from './day-summary.renderer';
import type { ApplicationRow } from '../drizzle/types';
import {
  createMockApplication,
  createMockEvent,
} from '../common/testing/factories';

function linkFor(application: ApplicationRow): string | null {
  return application.groupMessageId
    ? `https://chat.test/${application.groupChannelId}/${application.groupMessageId}`
    : null;
}

describe('renderDaySummary', () => {
  const day: DaySummaryEvent[] = [
    {
      event: createMockEvent({ id: 1 }),
      applications: [
        createMockApplication({ id: 3, userId: 1, status: 'rejected' }),
        createMockApplication({
          id: 2,
          userId: 2,
          fullName: 'Iryna Test',
          phone: '380671112233',
          status: 'approved',
          position: 2,
          groupMessageId: null,
        }),
        createMockApplication({ id: 1, userId: 1, status: 'primary', position: 1 }),
      ],
    },
    {
      event: createMockEvent({ id: 2, time: '12:30', procedureName: 'Facial cleansing' }),
      applications: [],
    },
  ];

  it('lists each event with its counts and applications', () => {
    const message = renderDaySummary({
      date: '2026-03-10',
      events: day,
      applicationsPerUser: countApplicationsPerUser(day),
      linkFor,
    });

    expect(message.content).toBe(
      [
        '📋 **Tue 10.03 (2026-03-10)**',
        '',
        '**10:00 Laser hair removal** · ⭐ 1 · ✅ 1 · ❌ 1',
        '⭐ Olena Test, +380 50 123 4567 (2 on this day) · [#1](https://chat.test/admin-channel/group-1)',
        '✅ Iryna Test, 380671112233',
        '❌ Olena Test, +380 50 123 4567 (2 on this day) · [#3](https://chat.test/admin-channel/group-1)',
        '',
        '**12:30 Facial cleansing** · no applications',
      ].join('\n'),
    );
  });

  it('renders the same text for the same input', () => {
    const input = {
      date: '2026-03-10',
      events: day,
      applicationsPerUser: countApplicationsPerUser(day),
      linkFor,
    };

    expect(renderDaySummary(input)).toEqual(renderDaySummary(input));
  });

  it('has a fixed text for a day without events', () => {
    const message = renderDaySummary({
      date: '2026-03-10',
      events: [],
      applicationsPerUser: new Map(),
      linkFor,
    });

    expect(message.content).toBe(
      '📋 **Tue 10.03 (2026-03-10)**\n\nNo procedures scheduled.',
    );
  });
});
