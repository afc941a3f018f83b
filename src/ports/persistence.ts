/**
 * Persistence Port - Hexagonal Architecture
 *
 * Defines the storage operations the core depends on. Adapters implement it
 * for PostgreSQL and for an in-process store. Schema details belong to the
 * adapters.
 *
 * Adapters raise PersistenceError for I/O failures (retryable when a second
 * attempt could succeed) and StateConflictError when a session
 * compare-and-set fails.
 */

import type { Entry, Reminder, ReminderFiring, Session, User } from '../types/records.js';

/**
 * Half-open time range [start, end).
 */
export interface DateRange {
  start: Date;
  end: Date;
}

/**
 * Operations available inside an atomic ledger write.
 */
export interface LedgerTransaction {
  /**
   * Non-superseded entries of a log action. Rows are locked until commit.
   */
  listCurrentEntriesForAction(userId: string, actionId: string): Promise<Entry[]>;

  /**
   * Mark entries as superseded by a replacement entry.
   */
  markSuperseded(entryIds: string[], supersededBy: string, at: Date): Promise<void>;

  /**
   * Insert a new entry.
   */
  insertEntry(entry: Entry): Promise<void>;
}

export interface EntryQueryOptions {
  /** Include superseded entries (default: false) */
  includeSuperseded?: boolean;
}

/**
 * PersistenceAdapter - primary storage port.
 */
export interface PersistenceAdapter {
  /** Adapter name for logs */
  readonly name: string;

  // Users
  getUser(userId: string): Promise<User | null>;
  /** Insert or replace a user */
  saveUser(user: User): Promise<void>;

  // Sessions
  getSession(userId: string): Promise<Session | null>;
  /**
   * Compare-and-set save. `expectedVersion` is the version read before the
   * change (0 for a session that was never stored). Returns the stored
   * session with its new version.
   */
  saveSession(session: Session, expectedVersion: number): Promise<Session>;

  // Entries
  /** Entries with eatenAt in range, oldest first */
  listEntries(userId: string, range: DateRange, options?: EntryQueryOptions): Promise<Entry[]>;
  /** Most recent non-superseded entries, newest first */
  listRecentEntries(userId: string, limit: number): Promise<Entry[]>;
  /** Every entry of a log action, superseded ones included, oldest first */
  listEntriesForAction(userId: string, actionId: string): Promise<Entry[]>;
  /**
   * Run ledger writes atomically: all of them commit or none do.
   */
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;

  // Reminders
  /** Insert or replace a reminder */
  saveReminder(reminder: Reminder): Promise<void>;
  /** A user's reminders, active and disabled, oldest first */
  listReminders(userId: string): Promise<Reminder[]>;
  /** Active reminders of all users */
  listActiveReminders(): Promise<Reminder[]>;

  // Reminder firings
  getFiring(reminderId: string, occurrenceDate: string): Promise<ReminderFiring | null>;
  /**
   * Record a firing. Returns false if the occurrence was already recorded.
   */
  recordFiring(firing: ReminderFiring): Promise<boolean>;

  /**
   * Release connections.
   */
  close(): Promise<void>;
}
