/**
 * Dialogue types shared by the state machine and the service that runs it.
 */

import type {
  DialogueState,
  HealthCondition,
  NutritionGoals,
  Quantity,
  RecurrenceRule,
  SessionBuffer,
} from '../types/records.js';

export type SummaryPeriod = 'today' | 'yesterday' | 'week';

/**
 * Reminder fields parsed from `remind` input.
 */
export interface ReminderSpec {
  timeOfDay: string;
  recurrence: RecurrenceRule;
  label: string;
}

/**
 * One health profile flag being switched.
 */
export interface HealthChange {
  condition: HealthCondition;
  enabled: boolean;
}

/**
 * A parsed IDLE-state command.
 */
export type Command =
  | { kind: 'start' }
  | { kind: 'help' }
  | { kind: 'cancel' }
  | { kind: 'log'; args: string }
  | { kind: 'fix'; index: number }
  | { kind: 'summary'; period: SummaryPeriod }
  | { kind: 'diary' }
  | { kind: 'goal'; goals: NutritionGoals | null }
  | { kind: 'timezone'; timezone: string }
  | { kind: 'remind'; spec: ReminderSpec | null }
  | { kind: 'reminders' }
  | { kind: 'reminderOff'; index: number }
  | { kind: 'ask'; question: string | null }
  | { kind: 'plan'; days: number }
  | { kind: 'profile'; change: HealthChange | null }
  | { kind: 'invalid'; usage: string }
  | { kind: 'unknown' };

/**
 * Work the state machine asks the service to perform.
 *
 * The machine itself never touches storage; the service runs the effect and
 * renders the reply from its outcome.
 */
export type SideEffect =
  | { type: 'preview'; description: string; quantity: Quantity }
  | { type: 'saveEntry' }
  | { type: 'startCorrection'; index: number }
  | { type: 'summary'; period: SummaryPeriod }
  | { type: 'diary' }
  | { type: 'setGoals'; goals: NutritionGoals }
  | { type: 'setTimezone'; timezone: string }
  | { type: 'createReminder'; spec: ReminderSpec }
  | { type: 'listReminders' }
  | { type: 'deactivateReminder'; index: number }
  | { type: 'ask'; question: string }
  | { type: 'mealPlan'; days: number }
  | { type: 'showProfile' }
  | { type: 'setHealth'; change: HealthChange };

/**
 * Input limits the machine validates against.
 */
export interface StepLimits {
  maxDescriptionLength: number;
  maxQuantity: number;
}

/**
 * Per-message context.
 */
export interface StepContext {
  /** When the message arrived */
  now: Date;
  limits: StepLimits;
}

/**
 * Result of one state machine step.
 *
 * `reply` is null when the reply depends on the effect outcome.
 */
export interface StepResult {
  state: DialogueState;
  buffer: SessionBuffer;
  reply: string | null;
  effect: SideEffect | null;
}
