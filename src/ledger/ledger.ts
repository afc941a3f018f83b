import type { PersistenceAdapter } from '../ports/persistence.js';
import type { Entry, EntryDraft } from '../types/records.js';
import { NUTRIENT_KEYS, generateId } from '../types/records.js';
import type { Logger } from '../types/logger.js';
import { ValidationError } from '../core/errors.js';

/**
 * Ledger limits.
 */
export interface LedgerConfig {
  /** Largest accepted quantity amount (default: 100000) */
  maxQuantity: number;
  /** Longest accepted description (default: 200) */
  maxDescriptionLength: number;
  /** How far eatenAt may lie in the future (default: 5 min) */
  clockSkewMs: number;
}

const DEFAULT_CONFIG: LedgerConfig = {
  maxQuantity: 100_000,
  maxDescriptionLength: 200,
  clockSkewMs: 5 * 60 * 1000,
};

/**
 * Result of a ledger write.
 */
export interface LedgerWriteResult {
  entry: Entry;
  /** IDs of entries the write superseded (empty for a new action) */
  superseded: string[];
}

/**
 * Nutrition Ledger
 *
 * Append-only store of confirmed food entries. A correction never edits an
 * entry: it inserts a replacement under the same action and marks the
 * previous current entry superseded, both in one transaction, so every
 * action has exactly one current entry.
 */
export class NutritionLedger {
  private readonly store: PersistenceAdapter;
  private readonly logger: Logger;
  private readonly config: LedgerConfig;
  private readonly now: () => Date;

  constructor(
    store: PersistenceAdapter,
    logger: Logger,
    config: Partial<LedgerConfig> = {},
    now: () => Date = () => new Date()
  ) {
    this.store = store;
    this.logger = logger.child({ component: 'ledger' });
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.now = now;
  }

  /**
   * Throw ValidationError when the draft breaks a ledger rule.
   */
  validate(draft: EntryDraft): void {
    const description = draft.description.trim();
    if (!description) {
      throw new ValidationError('Description must not be empty', 'description');
    }
    if (description.length > this.config.maxDescriptionLength) {
      throw new ValidationError(
        `Description must be at most ${String(this.config.maxDescriptionLength)} characters`,
        'description'
      );
    }

    const { amount } = draft.quantity;
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new ValidationError('Quantity must be a positive number', 'quantity');
    }
    if (amount > this.config.maxQuantity) {
      throw new ValidationError(
        `Quantity must be at most ${String(this.config.maxQuantity)}`,
        'quantity'
      );
    }

    if (Number.isNaN(draft.eatenAt.getTime())) {
      throw new ValidationError('Meal time is invalid', 'eatenAt');
    }
    if (draft.eatenAt.getTime() > this.now().getTime() + this.config.clockSkewMs) {
      throw new ValidationError('Meal time cannot be in the future', 'eatenAt');
    }

    for (const key of NUTRIENT_KEYS) {
      const value = draft.nutrients[key];
      if (value !== null && (!Number.isFinite(value) || value < 0)) {
        throw new ValidationError(`Invalid ${key} value`, key);
      }
    }
    if (draft.grams !== null && (!Number.isFinite(draft.grams) || draft.grams <= 0)) {
      throw new ValidationError('Invalid weight', 'grams');
    }
  }

  /**
   * Record a new log action.
   */
  async record(draft: EntryDraft): Promise<LedgerWriteResult> {
    this.validate(draft);
    const entry = this.buildEntry(draft, generateId('action'));

    await this.store.transaction(async (tx) => {
      await tx.insertEntry(entry);
    });

    this.logger.info(
      { userId: entry.userId, entryId: entry.id, actionId: entry.actionId },
      'Entry recorded'
    );
    return { entry, superseded: [] };
  }

  /**
   * Replace the current entry of an action.
   *
   * Fails with ValidationError when the action has no current entry for
   * this user (never logged, or owned by someone else).
   */
  async correct(actionId: string, draft: EntryDraft): Promise<LedgerWriteResult> {
    this.validate(draft);
    const entry = this.buildEntry(draft, actionId);

    const superseded = await this.store.transaction(async (tx) => {
      const current = await tx.listCurrentEntriesForAction(draft.userId, actionId);
      if (current.length === 0) {
        throw new ValidationError('The entry to correct no longer exists', 'actionId');
      }
      const ids = current.map((e) => e.id);
      await tx.markSuperseded(ids, entry.id, entry.createdAt);
      await tx.insertEntry(entry);
      return ids;
    });

    this.logger.info(
      { userId: entry.userId, entryId: entry.id, actionId, superseded },
      'Entry corrected'
    );
    return { entry, superseded };
  }

  private buildEntry(draft: EntryDraft, actionId: string): Entry {
    return {
      id: generateId('entry'),
      userId: draft.userId,
      actionId,
      description: draft.description.trim(),
      quantity: { ...draft.quantity },
      grams: draft.grams,
      nutrients: { ...draft.nutrients },
      nutritionSource: draft.nutritionSource,
      eatenAt: draft.eatenAt,
      createdAt: this.now(),
      supersededBy: null,
      supersededAt: null,
    };
  }
}

export function createNutritionLedger(
  store: PersistenceAdapter,
  logger: Logger,
  config?: Partial<LedgerConfig>,
  now?: () => Date
): NutritionLedger {
  return new NutritionLedger(store, logger, config, now);
}
