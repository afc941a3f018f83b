import { readFile } from 'node:fs/promises';
import { Pool } from 'pg';
import { z } from 'zod';
import type {
  DateRange,
  EntryQueryOptions,
  LedgerTransaction,
  PersistenceAdapter,
} from '../ports/persistence.js';
import type { Entry, Reminder, ReminderFiring, Session, User } from '../types/records.js';
import {
  DIALOGUE_STATES,
  UNITS,
  messageIdsSchema,
  parseSessionBuffer,
  recurrenceRuleSchema,
} from '../types/records.js';
import type { Logger } from '../types/logger.js';
import { BotError, PersistenceError, StateConflictError, errorMessage } from '../core/errors.js';

/**
 * Result shape the store reads from a query.
 */
export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

/**
 * A checked-out connection (used for transactions).
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  release(): void;
}

/**
 * The slice of a pg Pool the store uses. Tests pass a scripted implementation.
 */
export interface SqlPool {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

/**
 * Adapt a pg Pool to SqlPool.
 */
export function fromPgPool(pool: Pool): SqlPool {
  return {
    query: async (text, values) => {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    connect: async () => {
      const client = await pool.connect();
      return {
        query: async (text, values) => {
          const result = await client.query(text, values);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release: () => {
          client.release();
        },
      };
    },
    end: () => pool.end(),
  };
}

/**
 * SQLSTATE classes and socket errors worth a second attempt.
 */
const RETRYABLE_SQLSTATES = new Set(['40001', '40P01', '57P01', '57P02', '57P03', '53300']);
const RETRYABLE_SOCKET_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Whether a pg / socket error is transient.
 */
export function isTransientPgError(error: unknown): boolean {
  const code = errorCode(error);
  if (code === undefined) {
    // Pool/connection errors without a code ("Connection terminated ...")
    return error instanceof Error && /connection (terminated|timeout)/i.test(error.message);
  }
  return RETRYABLE_SQLSTATES.has(code) || RETRYABLE_SOCKET_CODES.has(code) || code.startsWith('08');
}

function toPersistenceError(error: unknown, operation: string): BotError {
  if (error instanceof BotError) {
    return error;
  }
  return new PersistenceError(`${operation} failed: ${errorMessage(error)}`, {
    retryable: isTransientPgError(error),
    cause: error,
  });
}

// ============================================================================
// Row schemas
// ============================================================================

const nullableNumber = z.number().nullable();

const userRow = z.object({
  id: z.string(),
  timezone: z.string(),
  goal_calories: nullableNumber,
  goal_protein: nullableNumber,
  goal_fat: nullableNumber,
  goal_carbs: nullableNumber,
  has_diabetes: z.boolean(),
  has_gout: z.boolean(),
  has_celiac: z.boolean(),
  created_at: z.date(),
});

const sessionRow = z.object({
  user_id: z.string(),
  state: z.enum(DIALOGUE_STATES),
  buffer: z.unknown(),
  recent_message_ids: messageIdsSchema,
  version: z.number().int(),
  updated_at: z.date(),
});

const entryRow = z.object({
  id: z.string(),
  user_id: z.string(),
  action_id: z.string(),
  description: z.string(),
  quantity_amount: z.number(),
  quantity_unit: z.enum(UNITS).nullable(),
  grams: nullableNumber,
  calories: nullableNumber,
  protein: nullableNumber,
  fat: nullableNumber,
  carbs: nullableNumber,
  nutrition_source: z.enum(['catalog', 'estimate']).nullable(),
  eaten_at: z.date(),
  created_at: z.date(),
  superseded_by: z.string().nullable(),
  superseded_at: z.date().nullable(),
});

const reminderRow = z.object({
  id: z.string(),
  user_id: z.string(),
  time_of_day: z.string(),
  recurrence: recurrenceRuleSchema,
  label: z.string(),
  active: z.boolean(),
  created_at: z.date(),
  deactivated_at: z.date().nullable(),
});

const firingRow = z.object({
  reminder_id: z.string(),
  occurrence_date: z.string(),
  status: z.enum(['delivered', 'missed']),
  attempts: z.number().int(),
  recorded_at: z.date(),
});

const versionRow = z.object({ version: z.number().int() });

function toUser(raw: unknown): User {
  const row = userRow.parse(raw);
  return {
    id: row.id,
    timezone: row.timezone,
    goals: {
      calories: row.goal_calories,
      protein: row.goal_protein,
      fat: row.goal_fat,
      carbs: row.goal_carbs,
    },
    health: { diabetes: row.has_diabetes, gout: row.has_gout, celiac: row.has_celiac },
    createdAt: row.created_at,
  };
}

function toSession(raw: unknown): Session {
  const row = sessionRow.parse(raw);
  return {
    userId: row.user_id,
    state: row.state,
    buffer: parseSessionBuffer(row.buffer),
    updatedAt: row.updated_at,
    version: row.version,
    recentMessageIds: row.recent_message_ids,
  };
}

function toEntry(raw: unknown): Entry {
  const row = entryRow.parse(raw);
  return {
    id: row.id,
    userId: row.user_id,
    actionId: row.action_id,
    description: row.description,
    quantity: { amount: row.quantity_amount, unit: row.quantity_unit },
    grams: row.grams,
    nutrients: {
      calories: row.calories,
      protein: row.protein,
      fat: row.fat,
      carbs: row.carbs,
    },
    nutritionSource: row.nutrition_source,
    eatenAt: row.eaten_at,
    createdAt: row.created_at,
    supersededBy: row.superseded_by,
    supersededAt: row.superseded_at,
  };
}

function toReminder(raw: unknown): Reminder {
  const row = reminderRow.parse(raw);
  return {
    id: row.id,
    userId: row.user_id,
    timeOfDay: row.time_of_day,
    recurrence: row.recurrence,
    label: row.label,
    active: row.active,
    createdAt: row.created_at,
    deactivatedAt: row.deactivated_at,
  };
}

function toFiring(raw: unknown): ReminderFiring {
  const row = firingRow.parse(raw);
  return {
    reminderId: row.reminder_id,
    occurrenceDate: row.occurrence_date,
    status: row.status,
    attempts: row.attempts,
    recordedAt: row.recorded_at,
  };
}

const ENTRY_COLUMNS = `id, user_id, action_id, description, quantity_amount, quantity_unit, grams,
  calories, protein, fat, carbs, nutrition_source, eaten_at, created_at, superseded_by, superseded_at`;

const INSERT_ENTRY = `INSERT INTO entries (${ENTRY_COLUMNS})
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)`;

function entryValues(entry: Entry): unknown[] {
  return [
    entry.id,
    entry.userId,
    entry.actionId,
    entry.description,
    entry.quantity.amount,
    entry.quantity.unit,
    entry.grams,
    entry.nutrients.calories,
    entry.nutrients.protein,
    entry.nutrients.fat,
    entry.nutrients.carbs,
    entry.nutritionSource,
    entry.eatenAt,
    entry.createdAt,
    entry.supersededBy,
    entry.supersededAt,
  ];
}

/**
 * PostgresStore configuration.
 */
export interface PostgresStoreConfig {
  pool: SqlPool;
  logger: Logger;
}

/**
 * PostgreSQL persistence adapter.
 *
 * Every I/O failure surfaces as PersistenceError, flagged retryable for
 * serialization failures, deadlocks and lost connections. Ledger writes run
 * inside BEGIN/COMMIT on a dedicated connection with the action's current
 * rows locked FOR UPDATE.
 */
export class PostgresStore implements PersistenceAdapter {
  readonly name: string = 'postgres';

  private readonly pool: SqlPool;
  private readonly logger: Logger;

  constructor(config: PostgresStoreConfig) {
    this.pool = config.pool;
    this.logger = config.logger.child({ component: 'postgres-store' });
  }

  /**
   * Apply the schema file. Statements are idempotent.
   */
  async migrate(schemaPath: string): Promise<void> {
    const sql = await readFile(schemaPath, 'utf-8');
    await this.run('migrate', sql);
    this.logger.info({ schemaPath }, 'Database schema applied');
  }

  async getUser(userId: string): Promise<User | null> {
    const result = await this.run('getUser', 'SELECT * FROM users WHERE id = $1', [userId]);
    const row = result.rows[0];
    return row === undefined ? null : toUser(row);
  }

  async saveUser(user: User): Promise<void> {
    await this.run(
      'saveUser',
      `INSERT INTO users (id, timezone, goal_calories, goal_protein, goal_fat, goal_carbs,
                          has_diabetes, has_gout, has_celiac, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       ON CONFLICT (id) DO UPDATE SET
         timezone = EXCLUDED.timezone,
         goal_calories = EXCLUDED.goal_calories,
         goal_protein = EXCLUDED.goal_protein,
         goal_fat = EXCLUDED.goal_fat,
         goal_carbs = EXCLUDED.goal_carbs,
         has_diabetes = EXCLUDED.has_diabetes,
         has_gout = EXCLUDED.has_gout,
         has_celiac = EXCLUDED.has_celiac`,
      [
        user.id,
        user.timezone,
        user.goals.calories,
        user.goals.protein,
        user.goals.fat,
        user.goals.carbs,
        user.health.diabetes,
        user.health.gout,
        user.health.celiac,
        user.createdAt,
      ]
    );
  }

  async getSession(userId: string): Promise<Session | null> {
    const result = await this.run('getSession', 'SELECT * FROM sessions WHERE user_id = $1', [
      userId,
    ]);
    const row = result.rows[0];
    return row === undefined ? null : toSession(row);
  }

  async saveSession(session: Session, expectedVersion: number): Promise<Session> {
    const nextVersion = expectedVersion + 1;
    const values = [
      session.userId,
      session.state,
      JSON.stringify(session.buffer),
      JSON.stringify(session.recentMessageIds),
      nextVersion,
      session.updatedAt,
    ];

    const result =
      expectedVersion === 0
        ? await this.run(
            'saveSession',
            `INSERT INTO sessions (user_id, state, buffer, recent_message_ids, version, updated_at)
             VALUES ($1, $2, $3, $4, $5, $6)
             ON CONFLICT (user_id) DO NOTHING`,
            values
          )
        : await this.run(
            'saveSession',
            `UPDATE sessions
             SET state = $2, buffer = $3, recent_message_ids = $4, version = $5, updated_at = $6
             WHERE user_id = $1 AND version = $7`,
            [...values, expectedVersion]
          );

    if (result.rowCount !== 1) {
      const current = await this.run('saveSession', 'SELECT version FROM sessions WHERE user_id = $1', [
        session.userId,
      ]);
      const row = current.rows[0];
      const actual = row === undefined ? null : versionRow.parse(row).version;
      throw new StateConflictError(session.userId, expectedVersion, actual);
    }

    return { ...session, version: nextVersion };
  }

  async listEntries(
    userId: string,
    range: DateRange,
    options: EntryQueryOptions = {}
  ): Promise<Entry[]> {
    const currentOnly = options.includeSuperseded === true ? '' : 'AND superseded_by IS NULL';
    const result = await this.run(
      'listEntries',
      `SELECT ${ENTRY_COLUMNS} FROM entries
       WHERE user_id = $1 AND eaten_at >= $2 AND eaten_at < $3 ${currentOnly}
       ORDER BY eaten_at ASC, created_at ASC`,
      [userId, range.start, range.end]
    );
    return result.rows.map(toEntry);
  }

  async listRecentEntries(userId: string, limit: number): Promise<Entry[]> {
    const result = await this.run(
      'listRecentEntries',
      `SELECT ${ENTRY_COLUMNS} FROM entries
       WHERE user_id = $1 AND superseded_by IS NULL
       ORDER BY eaten_at DESC, created_at DESC
       LIMIT $2`,
      [userId, limit]
    );
    return result.rows.map(toEntry);
  }

  async listEntriesForAction(userId: string, actionId: string): Promise<Entry[]> {
    const result = await this.run(
      'listEntriesForAction',
      `SELECT ${ENTRY_COLUMNS} FROM entries
       WHERE user_id = $1 AND action_id = $2
       ORDER BY created_at ASC`,
      [userId, actionId]
    );
    return result.rows.map(toEntry);
  }

  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect().catch((error: unknown) => {
      throw toPersistenceError(error, 'transaction');
    });

    const query = async (text: string, values?: unknown[]): Promise<SqlResult> => {
      try {
        return await client.query(text, values);
      } catch (error) {
        throw toPersistenceError(error, 'transaction');
      }
    };

    const tx: LedgerTransaction = {
      listCurrentEntriesForAction: async (userId, actionId) => {
        const result = await query(
          `SELECT ${ENTRY_COLUMNS} FROM entries
           WHERE user_id = $1 AND action_id = $2 AND superseded_by IS NULL
           FOR UPDATE`,
          [userId, actionId]
        );
        return result.rows.map(toEntry);
      },
      markSuperseded: async (entryIds, supersededBy, at) => {
        if (entryIds.length === 0) return;
        await query(
          'UPDATE entries SET superseded_by = $1, superseded_at = $2 WHERE id = ANY($3::text[])',
          [supersededBy, at, entryIds]
        );
      },
      insertEntry: async (entry) => {
        await query(INSERT_ENTRY, entryValues(entry));
      },
    };

    try {
      await query('BEGIN');
      const result = await work(tx);
      await query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.warn({ error: errorMessage(rollbackError) }, 'Rollback failed');
      }
      throw toPersistenceError(error, 'transaction');
    } finally {
      client.release();
    }
  }

  async saveReminder(reminder: Reminder): Promise<void> {
    await this.run(
      'saveReminder',
      `INSERT INTO reminders (id, user_id, time_of_day, recurrence, label, active, created_at, deactivated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (id) DO UPDATE SET
         time_of_day = EXCLUDED.time_of_day,
         recurrence = EXCLUDED.recurrence,
         label = EXCLUDED.label,
         active = EXCLUDED.active,
         deactivated_at = EXCLUDED.deactivated_at`,
      [
        reminder.id,
        reminder.userId,
        reminder.timeOfDay,
        JSON.stringify(reminder.recurrence),
        reminder.label,
        reminder.active,
        reminder.createdAt,
        reminder.deactivatedAt,
      ]
    );
  }

  async listReminders(userId: string): Promise<Reminder[]> {
    const result = await this.run(
      'listReminders',
      'SELECT * FROM reminders WHERE user_id = $1 ORDER BY created_at ASC',
      [userId]
    );
    return result.rows.map(toReminder);
  }

  async listActiveReminders(): Promise<Reminder[]> {
    const result = await this.run(
      'listActiveReminders',
      'SELECT * FROM reminders WHERE active ORDER BY created_at ASC'
    );
    return result.rows.map(toReminder);
  }

  async getFiring(reminderId: string, occurrenceDate: string): Promise<ReminderFiring | null> {
    const result = await this.run(
      'getFiring',
      'SELECT * FROM reminder_firings WHERE reminder_id = $1 AND occurrence_date = $2',
      [reminderId, occurrenceDate]
    );
    const row = result.rows[0];
    return row === undefined ? null : toFiring(row);
  }

  async recordFiring(firing: ReminderFiring): Promise<boolean> {
    const result = await this.run(
      'recordFiring',
      `INSERT INTO reminder_firings (reminder_id, occurrence_date, status, attempts, recorded_at)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (reminder_id, occurrence_date) DO NOTHING`,
      [firing.reminderId, firing.occurrenceDate, firing.status, firing.attempts, firing.recordedAt]
    );
    return result.rowCount === 1;
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.debug('Connection pool closed');
  }

  private async run(operation: string, text: string, values?: unknown[]): Promise<SqlResult> {
    try {
      return await this.pool.query(text, values);
    } catch (error) {
      const wrapped = toPersistenceError(error, operation);
      this.logger.debug({ operation, error: wrapped.message, retryable: wrapped.retryable }, 'Query failed');
      throw wrapped;
    }
  }
}

/**
 * Create a store over a new pg Pool.
 */
export function createPostgresStore(connectionString: string, logger: Logger): PostgresStore {
  const pool = new Pool({ connectionString, max: 10 });
  pool.on('error', (error) => {
    logger.error({ error: error.message }, 'Idle database client error');
  });
  return new PostgresStore({ pool: fromPgPool(pool), logger });
}
