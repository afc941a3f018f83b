import type { Gateway, InboundMessage } from '../ports/gateway.js';
import type { PersistenceAdapter } from '../ports/persistence.js';
import type { EntryDraft, HealthProfile, Reminder, Session, SessionBuffer, User } from '../types/records.js';
import { NO_CONDITIONS, NO_GOALS, UNRESOLVED_NUTRIENTS, generateId } from '../types/records.js';
import type { Logger } from '../types/logger.js';
import { KeyedMutex } from '../core/keyed-mutex.js';
import type { RetryOptions } from '../core/retry.js';
import { RetryAbortedError, withRetry } from '../core/retry.js';
import { PersistenceError, StateConflictError, ValidationError, errorMessage } from '../core/errors.js';
import type { NutritionLedger } from '../ledger/ledger.js';
import type { NutritionResolver } from '../nutrition/nutrition-resolver.js';
import type { DietAdvisor } from '../nutrition/diet-advisor.js';
import { dayRange, isValidTimezone, summarize, summarizeDays, weekRange } from '../nutrition/aggregation.js';
import type { SideEffect, StepLimits, StepResult, SummaryPeriod } from './dialogue-types.js';
import { isCancel } from './commands.js';
import { promptFor, step } from './state-machine.js';
import * as replies from './replies.js';

/**
 * DialogueService configuration.
 */
export interface DialogueServiceConfig {
  /** Non-idle sessions idle longer than this are reset (default: 15 min) */
  sessionTimeoutMs: number;
  /** Inbound message IDs kept per session for duplicate suppression */
  recentMessageLimit: number;
  /** Entries listed by the diary command */
  diaryLimit: number;
  /** Timezone given to new users */
  defaultTimezone: string;
  limits: StepLimits;
  /** Retry policy for storage calls */
  retry: Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'maxDelayMs'>;
}

const DEFAULT_CONFIG: DialogueServiceConfig = {
  sessionTimeoutMs: 15 * 60 * 1000,
  recentMessageLimit: 50,
  diaryLimit: 10,
  defaultTimezone: 'UTC',
  limits: { maxDescriptionLength: 200, maxQuantity: 100_000 },
  retry: { attempts: 3, baseDelayMs: 200, maxDelayMs: 2000 },
};

export interface DialogueServiceDeps {
  store: PersistenceAdapter;
  ledger: NutritionLedger;
  resolver: NutritionResolver;
  gateway: Gateway;
  logger: Logger;
  /** Answers "ask" and "plan"; both are disabled when null */
  advisor?: DietAdvisor | null;
  now?: () => Date;
}

/** Side effects that belong to an entry being confirmed */
const CANCELLABLE_EFFECTS: ReadonlySet<SideEffect['type']> = new Set(['preview', 'saveEntry']);

/**
 * Outcome of running a side effect.
 */
interface EffectOutcome {
  reply: string;
  /** Overrides the state machine's next state/buffer when set */
  next?: Pick<StepResult, 'state' | 'buffer'>;
}

/**
 * Dialogue Service
 *
 * Runs the state machine for one inbound message at a time per user:
 * lock -> load user and session -> drop duplicates -> expire stale session ->
 * step -> run side effect -> compare-and-set save -> reply.
 *
 * Different users never share a lock. A "cancel" message aborts the user's
 * in-flight entry preview or save before it queues for the lock.
 */
export class DialogueService {
  private readonly store: PersistenceAdapter;
  private readonly ledger: NutritionLedger;
  private readonly resolver: NutritionResolver;
  private readonly gateway: Gateway;
  private readonly advisor: DietAdvisor | null;
  private readonly logger: Logger;
  private readonly config: DialogueServiceConfig;
  private readonly now: () => Date;
  private readonly locks = new KeyedMutex();
  private readonly inflight = new Map<string, AbortController>();

  constructor(deps: DialogueServiceDeps, config: Partial<DialogueServiceConfig> = {}) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.resolver = deps.resolver;
    this.gateway = deps.gateway;
    this.advisor = deps.advisor ?? null;
    this.logger = deps.logger.child({ component: 'dialogue' });
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Handle one inbound message and send the reply.
   *
   * Resolves with the reply text (null when nothing was sent, e.g. for a
   * duplicate). Never rejects.
   */
  async handle(message: InboundMessage): Promise<string | null> {
    const { userId } = message;

    if (isCancel(message.text)) {
      const controller = this.inflight.get(userId);
      if (controller) {
        this.logger.info({ userId }, 'Cancel received, aborting in-flight work');
        controller.abort();
      }
    }

    return this.locks.runExclusive(userId, async () => {
      let reply: string | null;
      try {
        reply = await this.process(message);
      } catch (error) {
        reply = this.replyForFailure(userId, error);
      }

      // Replies are best-effort: one attempt, so a slow chat API never holds the lock
      if (reply !== null) {
        const sent = await this.gateway.send(userId, reply, { retry: false });
        if (!sent) {
          this.logger.warn({ userId }, 'Reply not delivered');
        }
      }
      return reply;
    });
  }

  /**
   * Whether a user has a message being processed or queued.
   */
  isBusy(userId: string): boolean {
    return this.locks.isLocked(userId);
  }

  private async process(message: InboundMessage): Promise<string | null> {
    const { userId } = message;
    const now = this.now();

    const user = await this.loadUser(userId, now);
    const stored = await this.retry('getSession', () => this.store.getSession(userId));
    const session: Session = stored ?? {
      userId,
      state: 'IDLE',
      buffer: {},
      updatedAt: now,
      version: 0,
      recentMessageIds: [],
    };

    if (message.messageId !== null && session.recentMessageIds.includes(message.messageId)) {
      this.logger.debug({ userId, messageId: message.messageId }, 'Duplicate message ignored');
      return null;
    }

    let current: { state: Session['state']; buffer: SessionBuffer } = {
      state: session.state,
      buffer: session.buffer,
    };
    let expired = false;
    if (current.state !== 'IDLE' && now.getTime() - session.updatedAt.getTime() > this.config.sessionTimeoutMs) {
      this.logger.info({ userId, state: current.state }, 'Session timed out, resetting');
      current = { state: 'IDLE', buffer: {} };
      expired = true;
    }

    const result = step(current, message.text, { now: message.timestamp, limits: this.config.limits });
    let next: Pick<StepResult, 'state' | 'buffer'> = { state: result.state, buffer: result.buffer };
    let reply = result.reply;

    if (result.effect) {
      try {
        const outcome = await this.runEffect(result.effect, user, current, result);
        reply = outcome.reply;
        if (outcome.next) next = outcome.next;
      } catch (error) {
        if (error instanceof RetryAbortedError) {
          // The queued cancel message replies and resets the session
          this.logger.info({ userId, effect: result.effect.type }, 'Side effect aborted by cancel');
          next = current;
          reply = null;
        } else if (error instanceof ValidationError) {
          next = current;
          reply = replies.invalidInput(error.message, promptFor(current));
        } else if (error instanceof PersistenceError) {
          this.logger.error(
            { userId, effect: result.effect.type, error: error.message },
            'Side effect failed after retries'
          );
          next = current;
          reply = replies.TRY_AGAIN_LATER;
        } else {
          throw error;
        }
      }
    }

    const recentMessageIds =
      message.messageId === null
        ? session.recentMessageIds
        : [...session.recentMessageIds, message.messageId].slice(-this.config.recentMessageLimit);

    await this.retry('saveSession', () =>
      this.store.saveSession(
        { userId, state: next.state, buffer: next.buffer, updatedAt: now, version: session.version, recentMessageIds },
        session.version
      )
    );

    this.logger.debug({ userId, from: session.state, to: next.state }, 'Dialogue step');

    if (expired && reply !== null) {
      return `${replies.SESSION_EXPIRED}\n\n${reply}`;
    }
    return reply;
  }

  private replyForFailure(userId: string, error: unknown): string {
    if (error instanceof StateConflictError) {
      this.logger.error({ userId, error: error.message }, 'Session invariant violated: concurrent update');
      return replies.GENERIC_ERROR;
    }
    if (error instanceof PersistenceError) {
      this.logger.error({ userId, error: error.message }, 'Storage unavailable');
      return replies.TRY_AGAIN_LATER;
    }
    this.logger.error({ userId, error: errorMessage(error) }, 'Unexpected error handling message');
    return replies.GENERIC_ERROR;
  }

  private async loadUser(userId: string, now: Date): Promise<User> {
    const existing = await this.retry('getUser', () => this.store.getUser(userId));
    if (existing) return existing;

    const user: User = {
      id: userId,
      timezone: this.config.defaultTimezone,
      goals: { ...NO_GOALS },
      health: { ...NO_CONDITIONS },
      createdAt: now,
    };
    await this.retry('saveUser', () => this.store.saveUser(user));
    this.logger.info({ userId }, 'New user');
    return user;
  }

  /**
   * Run a side effect. Effects of the entry flow register an abort handle
   * so a "cancel" can stop them; standalone commands run to completion.
   */
  private async runEffect(
    effect: SideEffect,
    user: User,
    previous: Pick<StepResult, 'state' | 'buffer'>,
    result: StepResult
  ): Promise<EffectOutcome> {
    const controller = new AbortController();
    if (CANCELLABLE_EFFECTS.has(effect.type)) {
      this.inflight.set(user.id, controller);
    }
    try {
      return await this.executeEffect(effect, user, previous, result, controller.signal);
    } finally {
      if (this.inflight.get(user.id) === controller) {
        this.inflight.delete(user.id);
      }
    }
  }

  private async executeEffect(
    effect: SideEffect,
    user: User,
    previous: Pick<StepResult, 'state' | 'buffer'>,
    result: StepResult,
    signal: AbortSignal
  ): Promise<EffectOutcome> {
    const retry = <T>(operation: string, fn: () => Promise<T>): Promise<T> => this.retry(operation, fn, signal);

    switch (effect.type) {
      case 'preview': {
        const preview = await this.resolver.resolve(effect.description, effect.quantity, signal);
        if (signal.aborted) throw new RetryAbortedError('preview');
        const buffer: SessionBuffer = { ...result.buffer, preview };
        return {
          reply: replies.confirmation(effect.description, effect.quantity, preview, buffer.correctsActionId !== undefined),
          next: { state: result.state, buffer },
        };
      }

      case 'saveEntry': {
        const { buffer } = previous;
        const { description, quantity, preview } = buffer;
        if (description === undefined || quantity === undefined) {
          throw new ValidationError('Nothing to save');
        }
        const draft: EntryDraft = {
          userId: user.id,
          description,
          quantity,
          grams: preview?.grams ?? null,
          nutrients: preview ? { ...preview.nutrients } : { ...UNRESOLVED_NUTRIENTS },
          nutritionSource: preview?.source ?? null,
          eatenAt: buffer.loggedAt ?? this.now(),
        };
        const correcting = buffer.correctsActionId;
        const written = await retry('saveEntry', () =>
          correcting !== undefined ? this.ledger.correct(correcting, draft) : this.ledger.record(draft)
        );
        return { reply: replies.entrySaved(written.entry, correcting !== undefined) };
      }

      case 'startCorrection': {
        const recent = await retry('listRecentEntries', () =>
          this.store.listRecentEntries(user.id, effect.index)
        );
        const target = recent[effect.index - 1];
        if (!target) {
          return { reply: replies.noSuchEntry(effect.index) };
        }
        return {
          reply: replies.correctionStarted(target),
          next: {
            state: 'AWAITING_DESCRIPTION',
            buffer: { loggedAt: target.eatenAt, correctsActionId: target.actionId },
          },
        };
      }

      case 'summary':
        return { reply: await this.summaryReply(user, effect.period, signal) };

      case 'diary': {
        const entries = await retry('listRecentEntries', () =>
          this.store.listRecentEntries(user.id, this.config.diaryLimit)
        );
        return { reply: replies.diaryText(entries, user.timezone) };
      }

      case 'setGoals': {
        const updated: User = { ...user, goals: effect.goals };
        await retry('saveUser', () => this.store.saveUser(updated));
        return { reply: effect.goals.calories === null ? replies.GOALS_CLEARED : replies.goalsSet(effect.goals) };
      }

      case 'setTimezone': {
        if (!isValidTimezone(effect.timezone)) {
          return { reply: replies.invalidTimezone(effect.timezone) };
        }
        await retry('saveUser', () => this.store.saveUser({ ...user, timezone: effect.timezone }));
        return { reply: replies.timezoneSet(effect.timezone) };
      }

      case 'createReminder': {
        const reminder: Reminder = {
          id: generateId('reminder'),
          userId: user.id,
          timeOfDay: effect.spec.timeOfDay,
          recurrence: effect.spec.recurrence,
          label: effect.spec.label,
          active: true,
          createdAt: this.now(),
          deactivatedAt: null,
        };
        await retry('saveReminder', () => this.store.saveReminder(reminder));
        this.logger.info({ userId: user.id, reminderId: reminder.id }, 'Reminder created');
        return { reply: replies.reminderCreated(reminder) };
      }

      case 'listReminders': {
        const reminders = await retry('listReminders', () => this.store.listReminders(user.id));
        return { reply: replies.remindersText(reminders) };
      }

      case 'deactivateReminder': {
        const reminders = await retry('listReminders', () => this.store.listReminders(user.id));
        const target = reminders[effect.index - 1];
        if (!target) {
          return { reply: replies.noSuchReminder(effect.index) };
        }
        if (!target.active) {
          return { reply: replies.reminderAlreadyOff(effect.index) };
        }
        const updated: Reminder = { ...target, active: false, deactivatedAt: this.now() };
        await retry('saveReminder', () => this.store.saveReminder(updated));
        this.logger.info({ userId: user.id, reminderId: target.id }, 'Reminder deactivated');
        return { reply: replies.reminderDeactivated(updated) };
      }

      case 'showProfile':
        return { reply: replies.profileText(user.health) };

      case 'setHealth': {
        const health: HealthProfile = { ...user.health, [effect.change.condition]: effect.change.enabled };
        await retry('saveUser', () => this.store.saveUser({ ...user, health }));
        return { reply: replies.healthSet(effect.change) };
      }

      case 'ask':
      case 'mealPlan': {
        if (!this.advisor) {
          return { reply: replies.ADVISOR_DISABLED };
        }
        const answer =
          effect.type === 'ask'
            ? await this.advisor.answer(effect.question, user.health, signal)
            : await this.advisor.mealPlan(effect.days, user.health, signal);
        if (answer === null) {
          return { reply: replies.ADVISOR_FAILED };
        }
        this.logger.info({ userId: user.id, kind: effect.type, length: answer.length }, 'Dietitian answered');
        return { reply: replies.advice(answer) };
      }
    }
  }

  private async summaryReply(user: User, period: SummaryPeriod, signal: AbortSignal): Promise<string> {
    const now = this.now();
    const range =
      period === 'week'
        ? weekRange(now, user.timezone)
        : dayRange(now, user.timezone, period === 'yesterday' ? -1 : 0);

    const entries = await this.retry('listEntries', () => this.store.listEntries(user.id, range), signal);
    const summary = summarize(entries, range, user.goals);
    const days = period === 'week' ? summarizeDays(entries, range, user.timezone, user.goals) : [];
    return replies.summaryText(period, summary, user.timezone, days);
  }

  private retry<T>(operation: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const options: RetryOptions = { ...this.config.retry, operation, logger: this.logger };
    if (signal) options.signal = signal;
    return withRetry(fn, options);
  }
}

export function createDialogueService(
  deps: DialogueServiceDeps,
  config?: Partial<DialogueServiceConfig>
): DialogueService {
  return new DialogueService(deps, config);
}
