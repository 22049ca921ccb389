import {
  compareForDisplay,
  diffQueue,
  pickPromotionCandidate,
  planQueue,
  type QueueMember,
} from './queue-planner';

function member(
  id: number,
  status: string,
  minute: number,
  position = 0,
): QueueMember {
  return {
    id,
    status,
    position,
    createdAt: new Date(Date.UTC(2026, 2, 1, 10, minute)),
  };
}

describe('planQueue', () => {
  it('gives the primary position 1 and numbers approved after it', () => {
    const plan = planQueue([
      member(1, 'approved', 0),
      member(2, 'primary', 5),
      member(3, 'approved', 10),
    ]);

    expect(plan).toEqual([
      { id: 1, status: 'approved', position: 2 },
      { id: 2, status: 'primary', position: 1 },
      { id: 3, status: 'approved', position: 3 },
    ]);
  });

  it('numbers approved from 1 when there is no primary', () => {
    const plan = planQueue([
      member(4, 'approved', 10),
      member(3, 'approved', 0),
    ]);

    expect(plan).toEqual([
      { id: 3, status: 'approved', position: 1 },
      { id: 4, status: 'approved', position: 2 },
    ]);
  });

  it('zeroes every other status', () => {
    const plan = planQueue([
      member(1, 'pending', 0, 4),
      member(2, 'rejected', 1, 2),
      member(3, 'cancelled', 2, 1),
    ]);

    expect(plan.map((s) => s.position)).toEqual([0, 0, 0]);
  });

  it('keeps the earliest primary and demotes the rest', () => {
    const plan = planQueue([
      member(1, 'primary', 10),
      member(2, 'primary', 0),
      member(3, 'approved', 5),
    ]);

    expect(plan).toEqual([
      { id: 2, status: 'primary', position: 1 },
      { id: 3, status: 'approved', position: 2 },
      { id: 1, status: 'approved', position: 3 },
    ]);
  });

  it('breaks created_at ties by id', () => {
    const plan = planQueue([member(9, 'approved', 0), member(8, 'approved', 0)]);

    expect(plan.map((s) => s.id)).toEqual([8, 9]);
  });

  it('assigns contiguous positions 1..k to primary and approved', () => {
    const plan = planQueue([
      member(1, 'approved', 0),
      member(2, 'pending', 1),
      member(3, 'primary', 2),
      member(4, 'rejected', 3),
      member(5, 'approved', 4),
      member(6, 'cancelled', 5),
    ]);

    const queued = plan
      .filter((s) => s.status === 'primary' || s.status === 'approved')
      .map((s) => s.position)
      .sort((a, b) => a - b);
    expect(queued).toEqual([1, 2, 3]);
  });

  it('is idempotent', () => {
    const members = [
      member(1, 'approved', 0, 7),
      member(2, 'primary', 1, 0),
      member(3, 'pending', 2, 3),
    ];
    const first = planQueue(members);
    const second = planQueue(
      first.map((slot) => ({
        ...slot,
        createdAt: members.find((m) => m.id === slot.id)?.createdAt ?? new Date(0),
      })),
    );

    expect(second).toEqual(first);
  });

  it('rejects unknown statuses', () => {
    expect(() => planQueue([member(1, 'waitlisted', 0)])).toThrow(
      'Unknown application status "waitlisted"',
    );
  });
});

describe('diffQueue', () => {
  it('returns only rows that change', () => {
    const members = [
      member(1, 'approved', 0, 1),
      member(2, 'approved', 1, 5),
      member(3, 'pending', 2, 0),
    ];

    expect(diffQueue(members, planQueue(members))).toEqual([
      { id: 2, status: 'approved', position: 2 },
    ]);
  });
});

describe('pickPromotionCandidate', () => {
  it('picks the earliest approved when there is no primary', () => {
    const plan = planQueue([
      member(1, 'cancelled', 0),
      member(2, 'approved', 10),
      member(3, 'approved', 5),
    ]);

    expect(pickPromotionCandidate(plan)).toEqual({
      id: 3,
      status: 'approved',
      position: 1,
    });
  });

  it('does nothing while a primary exists', () => {
    const plan = planQueue([member(1, 'primary', 0), member(2, 'approved', 1)]);

    expect(pickPromotionCandidate(plan)).toBeNull();
  });

  it('returns null when nobody is approved', () => {
    expect(pickPromotionCandidate(planQueue([member(1, 'pending', 0)]))).toBeNull();
  });
});

describe('compareForDisplay', () => {
  it('orders primary, approved by position, pending, cancelled, rejected', () => {
    const rows = [
      member(1, 'rejected', 0),
      member(2, 'approved', 1, 3),
      member(3, 'pending', 2),
      member(4, 'approved', 3, 2),
      member(5, 'cancelled', 4),
      member(6, 'primary', 5, 1),
    ];

    expect([...rows].sort(compareForDisplay).map((r) => r.id)).toEqual([
      6, 4, 2, 3, 5, 1,
    ]);
  });
});
