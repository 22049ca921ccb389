import {
  availableAdminActions,
  entersQueue,
  canTransition,
  requiresConfirmation,
} from './application-transitions';

describe('application transitions', () => {
  it.each([
    ['approve', 'pending', true],
    ['approve', 'rejected', true],
    ['approve', 'cancelled', true],
    ['approve', 'approved', false],
    ['approve', 'primary', false],
    ['promote', 'approved', true],
    ['promote', 'pending', false],
    ['promote', 'primary', false],
    ['reject', 'primary', true],
    ['reject', 'rejected', true],
    ['cancel', 'rejected', true],
    ['self-cancel', 'primary', true],
    ['self-cancel', 'rejected', false],
    ['self-cancel', 'cancelled', false],
  ] as const)('%s from %s allowed: %s', (action, from, allowed) => {
    expect(canTransition(action, from)).toBe(allowed);
  });

  it('requires confirmation only to reject or cancel a primary', () => {
    expect(requiresConfirmation('reject', 'primary')).toBe(true);
    expect(requiresConfirmation('cancel', 'primary')).toBe(true);
    expect(requiresConfirmation('reject', 'approved')).toBe(false);
    expect(requiresConfirmation('self-cancel', 'primary')).toBe(false);
  });

  it('offers the admin only meaningful actions', () => {
    expect(availableAdminActions('pending', 'published')).toEqual([
      'approve',
      'reject',
      'cancel',
    ]);
    expect(availableAdminActions('approved', 'published')).toEqual([
      'promote',
      'reject',
      'cancel',
    ]);
    expect(availableAdminActions('primary', 'published')).toEqual(['reject', 'cancel']);
    expect(availableAdminActions('rejected', 'published')).toEqual(['approve', 'cancel']);
    expect(availableAdminActions('cancelled', 'published')).toEqual(['approve', 'reject']);
  });

  it('offers nothing once the event is no longer published', () => {
    expect(availableAdminActions('cancelled', 'cancelled')).toEqual([]);
    expect(availableAdminActions('approved', 'archived')).toEqual([]);
  });

  it('knows which actions put an application into the queue', () => {
    expect(entersQueue('approve')).toBe(true);
    expect(entersQueue('promote')).toBe(true);
    expect(entersQueue('reject')).toBe(false);
    expect(entersQueue('self-cancel')).toBe(false);
  });
});
