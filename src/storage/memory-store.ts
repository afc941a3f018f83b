import type {
  DateRange,
  EntryQueryOptions,
  LedgerTransaction,
  PersistenceAdapter,
} from '../ports/persistence.js';
import type { Entry, Reminder, ReminderFiring, Session, User } from '../types/records.js';
import { StateConflictError } from '../core/errors.js';
import { KeyedMutex } from '../core/keyed-mutex.js';

const TX_LOCK = 'ledger';

/**
 * In-process persistence adapter.
 *
 * Used when no DATABASE_URL is configured and as the stand-in database in
 * tests. Data lives in Maps and is gone on restart.
 *
 * Records are cloned on the way in and out so callers never share state
 * with the store. Ledger transactions run one at a time; their writes are
 * staged and applied together on commit, or dropped if the work throws.
 */
export class MemoryStore implements PersistenceAdapter {
  readonly name: string = 'memory';

  private readonly users = new Map<string, User>();
  private readonly sessions = new Map<string, Session>();
  private readonly entries = new Map<string, Entry>();
  private readonly reminders = new Map<string, Reminder>();
  private readonly firings = new Map<string, ReminderFiring>();
  private readonly txMutex = new KeyedMutex();

  getUser(userId: string): Promise<User | null> {
    const user = this.users.get(userId);
    return Promise.resolve(user ? structuredClone(user) : null);
  }

  saveUser(user: User): Promise<void> {
    this.users.set(user.id, structuredClone(user));
    return Promise.resolve();
  }

  getSession(userId: string): Promise<Session | null> {
    const session = this.sessions.get(userId);
    return Promise.resolve(session ? structuredClone(session) : null);
  }

  saveSession(session: Session, expectedVersion: number): Promise<Session> {
    const stored = this.sessions.get(session.userId);
    const actualVersion = stored?.version ?? 0;
    if (actualVersion !== expectedVersion) {
      return Promise.reject(
        new StateConflictError(session.userId, expectedVersion, stored ? actualVersion : null)
      );
    }

    const next: Session = { ...structuredClone(session), version: expectedVersion + 1 };
    this.sessions.set(session.userId, next);
    return Promise.resolve(structuredClone(next));
  }

  listEntries(userId: string, range: DateRange, options: EntryQueryOptions = {}): Promise<Entry[]> {
    const start = range.start.getTime();
    const end = range.end.getTime();
    const result = [...this.entries.values()]
      .filter((e) => e.userId === userId)
      .filter((e) => options.includeSuperseded === true || e.supersededBy === null)
      .filter((e) => e.eatenAt.getTime() >= start && e.eatenAt.getTime() < end)
      .sort(byEatenAtAsc)
      .map((e) => structuredClone(e));
    return Promise.resolve(result);
  }

  listRecentEntries(userId: string, limit: number): Promise<Entry[]> {
    const result = [...this.entries.values()]
      .filter((e) => e.userId === userId && e.supersededBy === null)
      .sort((a, b) => byEatenAtAsc(b, a))
      .slice(0, limit)
      .map((e) => structuredClone(e));
    return Promise.resolve(result);
  }

  listEntriesForAction(userId: string, actionId: string): Promise<Entry[]> {
    const result = [...this.entries.values()]
      .filter((e) => e.userId === userId && e.actionId === actionId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((e) => structuredClone(e));
    return Promise.resolve(result);
  }

  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    return this.txMutex.runExclusive(TX_LOCK, async () => {
      const staged = new Map<string, Entry>();

      const read = (id: string): Entry | undefined => staged.get(id) ?? this.entries.get(id);

      const tx: LedgerTransaction = {
        listCurrentEntriesForAction: (userId, actionId) => {
          const ids = new Set([...this.entries.keys(), ...staged.keys()]);
          const current: Entry[] = [];
          for (const id of ids) {
            const entry = read(id);
            if (
              entry &&
              entry.userId === userId &&
              entry.actionId === actionId &&
              entry.supersededBy === null
            ) {
              current.push(structuredClone(entry));
            }
          }
          return Promise.resolve(current);
        },
        markSuperseded: (entryIds, supersededBy, at) => {
          for (const id of entryIds) {
            const entry = read(id);
            if (entry) {
              staged.set(id, { ...structuredClone(entry), supersededBy, supersededAt: at });
            }
          }
          return Promise.resolve();
        },
        insertEntry: (entry) => {
          staged.set(entry.id, structuredClone(entry));
          return Promise.resolve();
        },
      };

      const result = await work(tx);

      // Commit
      for (const [id, entry] of staged) {
        this.entries.set(id, entry);
      }
      return result;
    });
  }

  saveReminder(reminder: Reminder): Promise<void> {
    this.reminders.set(reminder.id, structuredClone(reminder));
    return Promise.resolve();
  }

  listReminders(userId: string): Promise<Reminder[]> {
    const result = [...this.reminders.values()]
      .filter((r) => r.userId === userId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((r) => structuredClone(r));
    return Promise.resolve(result);
  }

  listActiveReminders(): Promise<Reminder[]> {
    const result = [...this.reminders.values()]
      .filter((r) => r.active)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((r) => structuredClone(r));
    return Promise.resolve(result);
  }

  getFiring(reminderId: string, occurrenceDate: string): Promise<ReminderFiring | null> {
    const firing = this.firings.get(firingKey(reminderId, occurrenceDate));
    return Promise.resolve(firing ? structuredClone(firing) : null);
  }

  recordFiring(firing: ReminderFiring): Promise<boolean> {
    const key = firingKey(firing.reminderId, firing.occurrenceDate);
    if (this.firings.has(key)) {
      return Promise.resolve(false);
    }
    this.firings.set(key, structuredClone(firing));
    return Promise.resolve(true);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}

function firingKey(reminderId: string, occurrenceDate: string): string {
  return `${reminderId}:${occurrenceDate}`;
}

function byEatenAtAsc(a: Entry, b: Entry): number {
  const diff = a.eatenAt.getTime() - b.eatenAt.getTime();
  return diff !== 0 ? diff : a.createdAt.getTime() - b.createdAt.getTime();
}

/**
 * Factory function.
 */
export function createMemoryStore(): MemoryStore {
  return new MemoryStore();
}
