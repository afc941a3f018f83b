import { describe, it, expect, beforeEach } from 'vitest';
import { NutritionLedger } from '../../../src/ledger/ledger.js';
import { MemoryStore } from '../../../src/storage/memory-store.js';
import { ValidationError } from '../../../src/core/errors.js';
import type { EntryDraft } from '../../../src/types/records.js';
import { createMockLogger, type MockLogger } from '../../helpers/factories.js';

const NOW = new Date('2024-03-10T12:00:00Z');
const DAY = { start: new Date('2024-03-10T00:00:00Z'), end: new Date('2024-03-11T00:00:00Z') };

function draft(overrides: Partial<EntryDraft> = {}): EntryDraft {
  return {
    userId: '1001',
    description: 'rice',
    quantity: { amount: 200, unit: 'g' },
    grams: 200,
    nutrients: { calories: 260, protein: 5.4, fat: 0.6, carbs: 56.4 },
    nutritionSource: 'catalog',
    eatenAt: new Date('2024-03-10T11:30:00Z'),
    ...overrides,
  };
}

describe('NutritionLedger', () => {
  let store: MemoryStore;
  let logger: MockLogger;
  let ledger: NutritionLedger;

  beforeEach(() => {
    store = new MemoryStore();
    logger = createMockLogger();
    ledger = new NutritionLedger(store, logger, {}, () => NOW);
  });

  describe('record', () => {
    it('stores a new entry under a new action', async () => {
      const { entry, superseded } = await ledger.record(draft({ description: '  rice  ' }));

      expect(superseded).toEqual([]);
      expect(entry.description).toBe('rice');
      expect(entry.actionId).toMatch(/^action_/);
      expect(entry.createdAt).toEqual(NOW);
      expect(entry.supersededBy).toBeNull();

      const stored = await store.listEntries('1001', DAY);
      expect(stored).toEqual([entry]);
      expect(logger.messages('info')).toContain('Entry recorded');
    });

    it('gives each record its own action', async () => {
      const first = await ledger.record(draft());
      const second = await ledger.record(draft());
      expect(first.entry.actionId).not.toBe(second.entry.actionId);
    });

    it('rejects invalid drafts without writing', async () => {
      await expect(ledger.record(draft({ description: '   ' }))).rejects.toBeInstanceOf(ValidationError);
      await expect(ledger.record(draft({ quantity: { amount: 0, unit: 'g' } }))).rejects.toThrow(
        'Quantity must be a positive number'
      );
      await expect(ledger.record(draft({ quantity: { amount: 100_001, unit: 'g' } }))).rejects.toThrow(
        'Quantity must be at most 100000'
      );
      await expect(
        ledger.record(draft({ nutrients: { calories: -1, protein: 0, fat: 0, carbs: 0 } }))
      ).rejects.toThrow('Invalid calories value');

      expect(await store.listEntries('1001', DAY)).toEqual([]);
    });

    it('rejects meals eaten in the future beyond the clock skew', async () => {
      await expect(
        ledger.record(draft({ eatenAt: new Date('2024-03-10T12:06:00Z') }))
      ).rejects.toThrow('Meal time cannot be in the future');
      await expect(ledger.record(draft({ eatenAt: new Date('2024-03-10T12:04:00Z') }))).resolves.toBeDefined();
    });

    it('accepts entries with unknown nutrients', async () => {
      const { entry } = await ledger.record(
        draft({ nutrients: { calories: null, protein: null, fat: null, carbs: null }, nutritionSource: null, grams: null })
      );
      expect(entry.nutrients.calories).toBeNull();
    });
  });

  describe('correct', () => {
    it('supersedes the current entry and keeps the action', async () => {
      const original = await ledger.record(draft());
      const corrected = await ledger.correct(
        original.entry.actionId,
        draft({ description: 'brown rice', nutrients: { calories: 246, protein: 5.4, fat: 2, carbs: 51.2 } })
      );

      expect(corrected.superseded).toEqual([original.entry.id]);
      expect(corrected.entry.actionId).toBe(original.entry.actionId);

      const current = await store.listEntries('1001', DAY);
      expect(current.map((e) => e.description)).toEqual(['brown rice']);

      const history = await store.listEntriesForAction('1001', original.entry.actionId);
      expect(history).toHaveLength(2);
      expect(history[0]?.supersededBy).toBe(corrected.entry.id);
      expect(history[0]?.supersededAt).toEqual(NOW);
    });

    it('keeps exactly one current entry after repeated corrections', async () => {
      const original = await ledger.record(draft());
      await ledger.correct(original.entry.actionId, draft({ description: 'pasta' }));
      const last = await ledger.correct(original.entry.actionId, draft({ description: 'buckwheat' }));

      const history = await store.listEntriesForAction('1001', original.entry.actionId);
      expect(history.filter((e) => e.supersededBy === null).map((e) => e.id)).toEqual([last.entry.id]);
    });

    it('refuses to correct an unknown action', async () => {
      await expect(ledger.correct('action_missing', draft())).rejects.toThrow(
        'The entry to correct no longer exists'
      );
      expect(await store.listEntries('1001', DAY, { includeSuperseded: true })).toEqual([]);
    });

    it('refuses to correct another user\'s action', async () => {
      const original = await ledger.record(draft());
      await expect(ledger.correct(original.entry.actionId, draft({ userId: '2002' }))).rejects.toBeInstanceOf(
        ValidationError
      );

      const current = await store.listEntries('1001', DAY);
      expect(current.map((e) => e.id)).toEqual([original.entry.id]);
    });
  });
});
