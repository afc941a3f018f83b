import { randomUUID } from 'node:crypto';
import type { Gateway } from '../ports/gateway.js';
import type { PersistenceAdapter } from '../ports/persistence.js';
import type { Reminder } from '../types/records.js';
import type { Logger } from '../types/logger.js';
import { errorMessage } from '../core/errors.js';
import { createTraceContext, withTraceContext } from '../core/trace-context.js';
import { reminderMessage } from '../dialogue/replies.js';
import { dueOccurrences } from './recurrence.js';

/**
 * A reminder occurrence ready to be sent.
 */
export interface DueReminder {
  reminderId: string;
  userId: string;
  message: string;
  occurrenceDate: string;
  scheduledAt: Date;
}

/**
 * Scheduler configuration.
 */
export interface ReminderSchedulerConfig {
  /** Time between ticks in ms (default: 30s) */
  tickIntervalMs: number;
  /** Occurrences older than this are recorded as missed (default: 30 min) */
  retryWindowMs: number;
  /** Timezone for users without a stored record */
  defaultTimezone: string;
}

const DEFAULT_CONFIG: ReminderSchedulerConfig = {
  tickIntervalMs: 30_000,
  retryWindowMs: 30 * 60 * 1000,
  defaultTimezone: 'UTC',
};

/**
 * Result of one runOnce pass.
 */
export interface RunResult {
  delivered: number;
  failed: number;
  missed: number;
}

/**
 * Reminder Scheduler
 *
 * Runs on its own timer, independent of the dialogue. Each occurrence is
 * identified by (reminderId, local date) and recorded once delivered, so a
 * reminder fires at most once per day however often ticks run. Failed sends
 * are retried on later ticks until the retry window passes, after which the
 * occurrence is recorded as missed.
 */
export class ReminderScheduler {
  private readonly store: PersistenceAdapter;
  private readonly gateway: Gateway;
  private readonly logger: Logger;
  private readonly config: ReminderSchedulerConfig;
  private readonly now: () => Date;

  /** Failed delivery attempts per occurrence, cleared once recorded */
  private readonly attempts = new Map<string, { reminderId: string; count: number }>();
  private missedCount = 0;
  private running = false;
  private tickTimeout: ReturnType<typeof setTimeout> | null = null;
  private currentRun: Promise<RunResult> | null = null;

  constructor(
    store: PersistenceAdapter,
    gateway: Gateway,
    logger: Logger,
    config: Partial<ReminderSchedulerConfig> = {},
    now: () => Date = () => new Date()
  ) {
    this.store = store;
    this.gateway = gateway;
    this.logger = logger.child({ component: 'reminder-scheduler' });
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.now = now;
  }

  /**
   * Find occurrences due at `now`.
   *
   * Occurrences past the retry window are recorded as missed here and not
   * returned.
   */
  async tick(now: Date): Promise<DueReminder[]> {
    const reminders = await this.store.listActiveReminders();
    this.dropInactiveRetries(new Set(reminders.map((reminder) => reminder.id)));
    const timezones = new Map<string, string>();
    const due: DueReminder[] = [];

    for (const reminder of reminders) {
      const timezone = await this.timezoneFor(reminder.userId, timezones);

      for (const occurrence of dueOccurrences(reminder, now, timezone)) {
        const existing = await this.store.getFiring(reminder.id, occurrence.occurrenceDate);
        if (existing) continue;

        if (now.getTime() - occurrence.at.getTime() > this.config.retryWindowMs) {
          await this.recordMissed(reminder, occurrence.occurrenceDate, now);
          continue;
        }

        due.push({
          reminderId: reminder.id,
          userId: reminder.userId,
          message: reminderMessage(reminder.label),
          occurrenceDate: occurrence.occurrenceDate,
          scheduledAt: occurrence.at,
        });
      }
    }

    return due;
  }

  /**
   * Send everything due at `now` and record successful deliveries.
   */
  async runOnce(now: Date = this.now()): Promise<RunResult> {
    const result: RunResult = { delivered: 0, failed: 0, missed: 0 };
    const missedBefore = this.missedCount;
    const due = await this.tick(now);

    for (const item of due) {
      const key = occurrenceKey(item.reminderId, item.occurrenceDate);
      const sent = await this.gateway.send(item.userId, item.message, { retry: true });

      if (!sent) {
        const attempts = (this.attempts.get(key)?.count ?? 0) + 1;
        this.attempts.set(key, { reminderId: item.reminderId, count: attempts });
        result.failed++;
        this.logger.warn(
          { reminderId: item.reminderId, userId: item.userId, occurrenceDate: item.occurrenceDate, attempts },
          'Reminder delivery failed, will retry next tick'
        );
        continue;
      }

      await this.store.recordFiring({
        reminderId: item.reminderId,
        occurrenceDate: item.occurrenceDate,
        status: 'delivered',
        attempts: (this.attempts.get(key)?.count ?? 0) + 1,
        recordedAt: now,
      });
      this.attempts.delete(key);
      result.delivered++;
      this.logger.info(
        { reminderId: item.reminderId, userId: item.userId, occurrenceDate: item.occurrenceDate },
        'Reminder delivered'
      );
    }

    result.missed = this.missedCount - missedBefore;
    return result;
  }

  /**
   * Start ticking. Ticks never overlap: the next one is scheduled after the
   * previous one finishes.
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Reminder scheduler already running');
      return;
    }
    this.running = true;
    this.logger.info({ tickIntervalMs: this.config.tickIntervalMs }, 'Reminder scheduler started');
    this.scheduleTick();
  }

  /**
   * Stop ticking and wait for a tick in progress.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.tickTimeout) {
      clearTimeout(this.tickTimeout);
      this.tickTimeout = null;
    }
    if (this.currentRun) {
      await this.currentRun.catch(() => undefined);
    }
    this.logger.info('Reminder scheduler stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Occurrences that failed delivery and are waiting for another tick.
   */
  pendingRetryCount(): number {
    return this.attempts.size;
  }

  private scheduleTick(): void {
    if (!this.running) return;

    this.tickTimeout = setTimeout(() => {
      void this.runScheduledTick();
    }, this.config.tickIntervalMs);
  }

  private async runScheduledTick(): Promise<void> {
    if (!this.running) return;

    const tickId = `tick_${randomUUID().slice(0, 8)}`;
    this.currentRun = withTraceContext(createTraceContext(tickId), () => this.runOnce());
    try {
      const result = await this.currentRun;
      if (result.delivered + result.failed + result.missed > 0) {
        this.logger.debug({ ...result, pendingRetries: this.attempts.size }, 'Reminder tick complete');
      }
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Reminder tick failed');
    } finally {
      this.currentRun = null;
      this.scheduleTick();
    }
  }

  private dropInactiveRetries(activeIds: ReadonlySet<string>): void {
    for (const [key, entry] of this.attempts) {
      if (!activeIds.has(entry.reminderId)) {
        this.attempts.delete(key);
        this.logger.debug({ reminderId: entry.reminderId }, 'Dropped retry state of inactive reminder');
      }
    }
  }

  private async timezoneFor(userId: string, cache: Map<string, string>): Promise<string> {
    const cached = cache.get(userId);
    if (cached) return cached;
    const user = await this.store.getUser(userId);
    const timezone = user?.timezone ?? this.config.defaultTimezone;
    cache.set(userId, timezone);
    return timezone;
  }

  private async recordMissed(reminder: Reminder, occurrenceDate: string, now: Date): Promise<void> {
    const key = occurrenceKey(reminder.id, occurrenceDate);
    const recorded = await this.store.recordFiring({
      reminderId: reminder.id,
      occurrenceDate,
      status: 'missed',
      attempts: this.attempts.get(key)?.count ?? 0,
      recordedAt: now,
    });
    this.attempts.delete(key);
    if (recorded) {
      this.missedCount++;
      this.logger.warn(
        { reminderId: reminder.id, userId: reminder.userId, occurrenceDate },
        'Reminder missed: retry window passed'
      );
    }
  }
}

function occurrenceKey(reminderId: string, occurrenceDate: string): string {
  return `${reminderId}:${occurrenceDate}`;
}

export function createReminderScheduler(
  store: PersistenceAdapter,
  gateway: Gateway,
  logger: Logger,
  config?: Partial<ReminderSchedulerConfig>,
  now?: () => Date
): ReminderScheduler {
  return new ReminderScheduler(store, gateway, logger, config, now);
}
