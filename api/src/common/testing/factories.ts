/**
 * Shared mock data factories for backend tests.
 *
 * Each factory returns a plain object matching the Drizzle row shape
 * (database columns, not DTOs).
 */
import type {
  ApplicationRow,
  EventRow,
  ProcedureTypeRow,
  UserRow,
} from '../../drizzle/types';

export function createMockUser(overrides: Partial<UserRow> = {}): UserRow {
  return {
    id: 1,
    discordId: '100000000000000001',
    fullName: 'Olena Test',
    phone: '+380 50 123 4567',
    isBlocked: false,
    botBlockedAt: null,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function createMockProcedureType(
  overrides: Partial<ProcedureTypeRow> = {},
): ProcedureTypeRow {
  return {
    id: 1,
    name: 'Laser hair removal',
    isActive: true,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function createMockEvent(overrides: Partial<EventRow> = {}): EventRow {
  return {
    id: 1,
    date: '2026-03-10',
    time: '10:00',
    procedureTypeId: 1,
    procedureName: 'Laser hair removal',
    needsPhoto: false,
    comment: null,
    status: 'published',
    channelId: 'publish-channel',
    messageId: 'announcement-1',
    publishedAt: new Date('2026-03-01T09:00:00Z'),
    cancelledAt: null,
    archivedAt: null,
    createdAt: new Date('2026-03-01T08:00:00Z'),
    updatedAt: new Date('2026-03-01T09:00:00Z'),
    ...overrides,
  };
}

export function createMockApplication(
  overrides: Partial<ApplicationRow> = {},
): ApplicationRow {
  return {
    id: 1,
    eventId: 1,
    userId: 1,
    fullName: 'Olena Test',
    phone: '+380 50 123 4567',
    consent: true,
    status: 'pending',
    position: 0,
    groupChannelId: 'admin-channel',
    groupMessageId: 'group-1',
    createdAt: new Date('2026-03-02T10:00:00Z'),
    ...overrides,
  };
}
