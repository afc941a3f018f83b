/**
 * Aggregation Engine
 *
 * Pure functions turning ledger entries into summaries. Nothing here is
 * stored; a summary is recomputed from the entries every time.
 */

import { DateTime } from 'luxon';
import type { DateRange } from '../ports/persistence.js';
import type { Entry, Nutrients, NutritionGoals } from '../types/records.js';
import { NO_GOALS, NUTRIENT_KEYS } from '../types/records.js';

export type NutrientTotals = Record<keyof Nutrients, number>;

export interface DailySummary {
  range: DateRange;
  /** Whole days covered by the range (goal multiplier) */
  days: number;
  totals: NutrientTotals;
  goals: NutritionGoals;
  /** actual - goal × days; null where no goal is set */
  deltas: Nutrients;
  entryCount: number;
  /** Entries with at least one unknown nutrient value */
  unresolvedCount: number;
  /** True when unresolvedCount > 0; totals are then lower bounds */
  incomplete: boolean;
}

const DAY_MS = 86_400_000;

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function inRange(entry: Entry, range: DateRange): boolean {
  const t = entry.eatenAt.getTime();
  return t >= range.start.getTime() && t < range.end.getTime();
}

/**
 * Summarize the current (non-superseded) entries eaten within `range`.
 *
 * Entries are deduplicated by ID and summed in ID order, so the result does
 * not depend on input order or repeated entries.
 */
export function summarize(
  entries: readonly Entry[],
  range: DateRange,
  goals: NutritionGoals = NO_GOALS
): DailySummary {
  const unique = new Map<string, Entry>();
  for (const entry of entries) {
    if (entry.supersededBy === null && inRange(entry, range)) {
      unique.set(entry.id, entry);
    }
  }
  const ordered = [...unique.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  const sums: NutrientTotals = { calories: 0, protein: 0, fat: 0, carbs: 0 };
  let unresolvedCount = 0;

  for (const entry of ordered) {
    let unresolved = false;
    for (const key of NUTRIENT_KEYS) {
      const value = entry.nutrients[key];
      if (value === null) {
        unresolved = true;
      } else {
        sums[key] += value;
      }
    }
    if (unresolved) unresolvedCount++;
  }

  const days = Math.max(1, Math.round((range.end.getTime() - range.start.getTime()) / DAY_MS));

  const totals: NutrientTotals = {
    calories: round1(sums.calories),
    protein: round1(sums.protein),
    fat: round1(sums.fat),
    carbs: round1(sums.carbs),
  };

  const delta = (key: keyof Nutrients): number | null => {
    const goal = goals[key];
    return goal === null ? null : round1(totals[key] - goal * days);
  };

  return {
    range: { start: new Date(range.start), end: new Date(range.end) },
    days,
    totals,
    goals: { ...goals },
    deltas: {
      calories: delta('calories'),
      protein: delta('protein'),
      fat: delta('fat'),
      carbs: delta('carbs'),
    },
    entryCount: ordered.length,
    unresolvedCount,
    incomplete: unresolvedCount > 0,
  };
}

/**
 * Local calendar day containing `at`, shifted by `offsetDays`.
 */
export function dayRange(at: Date, timezone: string, offsetDays = 0): DateRange {
  const start = DateTime.fromJSDate(at, { zone: timezone }).startOf('day').plus({ days: offsetDays });
  return { start: start.toJSDate(), end: start.plus({ days: 1 }).toJSDate() };
}

/**
 * The last `days` local calendar days, today included.
 */
export function weekRange(at: Date, timezone: string, days = 7): DateRange {
  const today = DateTime.fromJSDate(at, { zone: timezone }).startOf('day');
  return {
    start: today.minus({ days: days - 1 }).toJSDate(),
    end: today.plus({ days: 1 }).toJSDate(),
  };
}

/**
 * Split a range into local days and summarize each (oldest first).
 * Goal deltas apply per day.
 */
export function summarizeDays(
  entries: readonly Entry[],
  range: DateRange,
  timezone: string,
  goals: NutritionGoals = NO_GOALS
): DailySummary[] {
  const result: DailySummary[] = [];
  let day = DateTime.fromJSDate(range.start, { zone: timezone }).startOf('day');
  const end = range.end.getTime();

  while (day.toMillis() < end) {
    const next = day.plus({ days: 1 });
    result.push(summarize(entries, { start: day.toJSDate(), end: next.toJSDate() }, goals));
    day = next;
  }
  return result;
}

/**
 * yyyy-MM-dd of `at` in the given timezone.
 */
export function localDateKey(at: Date, timezone: string): string {
  return DateTime.fromJSDate(at, { zone: timezone }).toFormat('yyyy-MM-dd');
}

/**
 * Whether luxon accepts the IANA zone name.
 */
export function isValidTimezone(timezone: string): boolean {
  return timezone.trim() !== '' && DateTime.now().setZone(timezone).isValid;
}
