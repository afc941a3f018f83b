import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStore } from '../../../src/storage/memory-store.js';
import { StateConflictError } from '../../../src/core/errors.js';
import type { Session } from '../../../src/types/records.js';
import { createEntry, createReminder, createUser } from '../../helpers/factories.js';

const DAY = { start: new Date('2024-03-10T00:00:00Z'), end: new Date('2024-03-11T00:00:00Z') };

function session(overrides: Partial<Session> = {}): Session {
  return {
    userId: '1001',
    state: 'AWAITING_QUANTITY',
    buffer: { description: 'rice' },
    updatedAt: new Date('2024-03-10T12:00:00Z'),
    version: 0,
    recentMessageIds: ['m1'],
    ...overrides,
  };
}

describe('MemoryStore', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('returns copies, never the stored objects', async () => {
    const user = createUser();
    await store.saveUser(user);
    user.timezone = 'Europe/Berlin';

    const loaded = await store.getUser('1001');
    expect(loaded?.timezone).toBe('UTC');
    if (loaded) loaded.goals.calories = 1;
    expect((await store.getUser('1001'))?.goals.calories).toBeNull();
  });

  describe('sessions', () => {
    it('creates a session at version 1 and bumps it on each save', async () => {
      const first = await store.saveSession(session(), 0);
      expect(first.version).toBe(1);

      const second = await store.saveSession({ ...first, state: 'IDLE', buffer: {} }, 1);
      expect(second.version).toBe(2);
      expect((await store.getSession('1001'))?.state).toBe('IDLE');
    });

    it('rejects a stale version', async () => {
      await store.saveSession(session(), 0);
      await expect(store.saveSession(session(), 0)).rejects.toBeInstanceOf(StateConflictError);
      await expect(store.saveSession(session(), 2)).rejects.toThrow('expected version 2, found 1');
    });

    it('reports a missing session in the conflict', async () => {
      await expect(store.saveSession(session(), 3)).rejects.toThrow('expected version 3, found null');
    });
  });

  describe('entries', () => {
    it('lists entries in range oldest first, current only by default', async () => {
      await store.transaction(async (tx) => {
        await tx.insertEntry(createEntry({ id: 'late', actionId: 'a1', eatenAt: new Date('2024-03-10T18:00:00Z') }));
        await tx.insertEntry(createEntry({ id: 'early', actionId: 'a2', eatenAt: new Date('2024-03-10T08:00:00Z') }));
        await tx.insertEntry(
          createEntry({ id: 'old', actionId: 'a3', supersededBy: 'late', supersededAt: new Date('2024-03-10T18:00:00Z') })
        );
        await tx.insertEntry(createEntry({ id: 'other-user', userId: '2002', actionId: 'a4' }));
      });

      expect((await store.listEntries('1001', DAY)).map((e) => e.id)).toEqual(['early', 'late']);
      expect((await store.listEntries('1001', DAY, { includeSuperseded: true })).map((e) => e.id)).toEqual([
        'early',
        'old',
        'late',
      ]);
    });

    it('lists recent current entries newest first', async () => {
      await store.transaction(async (tx) => {
        await tx.insertEntry(createEntry({ id: 'e1', actionId: 'a1', eatenAt: new Date('2024-03-09T08:00:00Z') }));
        await tx.insertEntry(createEntry({ id: 'e2', actionId: 'a2', eatenAt: new Date('2024-03-10T08:00:00Z') }));
        await tx.insertEntry(createEntry({ id: 'e3', actionId: 'a3', eatenAt: new Date('2024-03-10T09:00:00Z') }));
      });

      expect((await store.listRecentEntries('1001', 2)).map((e) => e.id)).toEqual(['e3', 'e2']);
    });

    it('drops every write of a failed transaction', async () => {
      await expect(
        store.transaction(async (tx) => {
          await tx.insertEntry(createEntry({ id: 'e1' }));
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(await store.listEntries('1001', DAY, { includeSuperseded: true })).toEqual([]);
    });

    it('sees staged writes inside the transaction', async () => {
      const current = await store.transaction(async (tx) => {
        await tx.insertEntry(createEntry({ id: 'e1', actionId: 'a1' }));
        await tx.markSuperseded(['e1'], 'e2', new Date('2024-03-10T13:00:00Z'));
        await tx.insertEntry(createEntry({ id: 'e2', actionId: 'a1' }));
        return tx.listCurrentEntriesForAction('1001', 'a1');
      });

      expect(current.map((e) => e.id)).toEqual(['e2']);
    });
  });

  describe('reminders', () => {
    it('lists active reminders of all users', async () => {
      await store.saveReminder(createReminder({ id: 'r1' }));
      await store.saveReminder(createReminder({ id: 'r2', userId: '2002' }));
      await store.saveReminder(createReminder({ id: 'r3', active: false }));

      expect((await store.listActiveReminders()).map((r) => r.id)).toEqual(['r1', 'r2']);
      expect((await store.listReminders('1001')).map((r) => r.id)).toEqual(['r1', 'r3']);
    });

    it('records a firing once per occurrence', async () => {
      const firing = {
        reminderId: 'r1',
        occurrenceDate: '2024-03-10',
        status: 'delivered' as const,
        attempts: 1,
        recordedAt: new Date('2024-03-10T08:00:00Z'),
      };

      expect(await store.recordFiring(firing)).toBe(true);
      expect(await store.recordFiring({ ...firing, status: 'missed' })).toBe(false);
      expect((await store.getFiring('r1', '2024-03-10'))?.status).toBe('delivered');
      expect(await store.getFiring('r1', '2024-03-11')).toBeNull();
    });
  });
});
