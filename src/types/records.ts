/**
 * Persisted records: users, ledger entries, dialogue sessions, reminders.
 *
 * Every record belongs to exactly one user; there are no cross-user references.
 */

import { z } from 'zod';

// ============================================================================
// Quantities & Nutrients
// ============================================================================

export const UNITS = [
  'g',
  'kg',
  'mg',
  'oz',
  'lb',
  'ml',
  'l',
  'cup',
  'tbsp',
  'tsp',
  'piece',
  'slice',
  'serving',
] as const;

export type Unit = (typeof UNITS)[number];

/**
 * Amount as the user typed it. `unit` is null for a bare number.
 */
export interface Quantity {
  amount: number;
  unit: Unit | null;
}

export interface Nutrients {
  /** kcal */
  calories: number | null;
  /** grams */
  protein: number | null;
  fat: number | null;
  carbs: number | null;
}

export const NUTRIENT_KEYS = ['calories', 'protein', 'fat', 'carbs'] as const;

export type NutrientKey = (typeof NUTRIENT_KEYS)[number];

/** Daily goals; a null field means "no goal set". */
export type NutritionGoals = Nutrients;

export const NO_GOALS: NutritionGoals = { calories: null, protein: null, fat: null, carbs: null };

export const UNRESOLVED_NUTRIENTS: Nutrients = {
  calories: null,
  protein: null,
  fat: null,
  carbs: null,
};

export type NutritionSource = 'catalog' | 'estimate';

// ============================================================================
// User
// ============================================================================

export const HEALTH_CONDITIONS = ['diabetes', 'gout', 'celiac'] as const;

export type HealthCondition = (typeof HEALTH_CONDITIONS)[number];

/** Conditions the dietitian advice takes into account */
export type HealthProfile = Record<HealthCondition, boolean>;

export const NO_CONDITIONS: HealthProfile = { diabetes: false, gout: false, celiac: false };

export interface User {
  /** Platform-assigned ID (Telegram user ID as string) */
  id: string;
  /** IANA timezone */
  timezone: string;
  goals: NutritionGoals;
  health: HealthProfile;
  createdAt: Date;
}

// ============================================================================
// Ledger
// ============================================================================

/**
 * A confirmed food log record. Never updated in place except for the
 * supersede markers set by a correction.
 */
export interface Entry {
  id: string;
  userId: string;
  /** Logical log action; corrections share it with the entry they replace */
  actionId: string;
  description: string;
  quantity: Quantity;
  /** Weight in grams when the unit could be converted */
  grams: number | null;
  nutrients: Nutrients;
  nutritionSource: NutritionSource | null;
  eatenAt: Date;
  createdAt: Date;
  supersededBy: string | null;
  supersededAt: Date | null;
}

/**
 * Entry fields supplied by the dialogue before the ledger assigns IDs.
 */
export interface EntryDraft {
  userId: string;
  description: string;
  quantity: Quantity;
  grams: number | null;
  nutrients: Nutrients;
  nutritionSource: NutritionSource | null;
  eatenAt: Date;
}

// ============================================================================
// Dialogue Session
// ============================================================================

export const DIALOGUE_STATES = [
  'IDLE',
  'AWAITING_DESCRIPTION',
  'AWAITING_QUANTITY',
  'AWAITING_CONFIRMATION',
  'AWAITING_REMINDER_TIME',
  'AWAITING_QUESTION',
] as const;

export type DialogueState = (typeof DIALOGUE_STATES)[number];

/**
 * Nutrition preview computed before confirmation.
 */
export interface NutritionPreview {
  grams: number | null;
  nutrients: Nutrients;
  source: NutritionSource | null;
  /** Catalog name the description matched, if any */
  matchedName: string | null;
}

/**
 * Partially entered fields collected across turns.
 */
export interface SessionBuffer {
  description?: string;
  quantity?: Quantity;
  preview?: NutritionPreview;
  /** When the meal was eaten (set when the log flow starts) */
  loggedAt?: Date;
  /** Set when the flow corrects an existing action */
  correctsActionId?: string;
}

export interface Session {
  userId: string;
  state: DialogueState;
  buffer: SessionBuffer;
  updatedAt: Date;
  /** Incremented on every save; used for compare-and-set */
  version: number;
  /** Recently handled inbound message IDs (duplicate suppression) */
  recentMessageIds: string[];
}

// ============================================================================
// Reminders
// ============================================================================

export type RecurrenceRule =
  | { frequency: 'daily' }
  | {
      frequency: 'weekly';
      /** ISO weekdays, 1 = Monday ... 7 = Sunday */
      daysOfWeek: number[];
    };

export interface Reminder {
  id: string;
  userId: string;
  /** Local time of day, HH:mm */
  timeOfDay: string;
  recurrence: RecurrenceRule;
  label: string;
  active: boolean;
  createdAt: Date;
  deactivatedAt: Date | null;
}

export type FiringStatus = 'delivered' | 'missed';

/**
 * Dedup record for one reminder occurrence.
 */
export interface ReminderFiring {
  reminderId: string;
  /** Local calendar date of the occurrence, yyyy-MM-dd */
  occurrenceDate: string;
  status: FiringStatus;
  attempts: number;
  recordedAt: Date;
}

/**
 * Generate a prefixed record ID.
 */
export function generateId(prefix: 'user' | 'entry' | 'action' | 'reminder'): string {
  const rand = Math.random().toString(36).slice(2, 8);
  return `${prefix}_${Date.now().toString(36)}_${rand}`;
}

// ============================================================================
// Schemas for JSON columns
// ============================================================================

const quantitySchema = z.object({
  amount: z.number(),
  unit: z.enum(UNITS).nullable(),
});

const nutrientsSchema = z.object({
  calories: z.number().nullable(),
  protein: z.number().nullable(),
  fat: z.number().nullable(),
  carbs: z.number().nullable(),
});

const previewSchema = z.object({
  grams: z.number().nullable(),
  nutrients: nutrientsSchema,
  source: z.enum(['catalog', 'estimate']).nullable(),
  matchedName: z.string().nullable(),
});

const sessionBufferSchema = z.object({
  description: z.string().optional(),
  quantity: quantitySchema.optional(),
  preview: previewSchema.optional(),
  loggedAt: z.coerce.date().optional(),
  correctsActionId: z.string().optional(),
});

export const recurrenceRuleSchema = z.discriminatedUnion('frequency', [
  z.object({ frequency: z.literal('daily') }),
  z.object({
    frequency: z.literal('weekly'),
    daysOfWeek: z.array(z.number().int().min(1).max(7)).min(1),
  }),
]);

export const messageIdsSchema = z.array(z.string());

/**
 * Parse a stored session buffer (dates arrive as ISO strings).
 */
export function parseSessionBuffer(raw: unknown): SessionBuffer {
  const parsed = sessionBufferSchema.parse(raw);
  const buffer: SessionBuffer = {};
  if (parsed.description !== undefined) buffer.description = parsed.description;
  if (parsed.quantity !== undefined) buffer.quantity = parsed.quantity;
  if (parsed.preview !== undefined) buffer.preview = parsed.preview;
  if (parsed.loggedAt !== undefined) buffer.loggedAt = parsed.loggedAt;
  if (parsed.correctsActionId !== undefined) buffer.correctsActionId = parsed.correctsActionId;
  return buffer;
}
