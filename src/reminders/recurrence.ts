/**
 * Reminder recurrence matching in the user's local time.
 */

import { DateTime } from 'luxon';
import type { RecurrenceRule, Reminder } from '../types/records.js';

/**
 * One concrete occurrence of a reminder.
 */
export interface Occurrence {
  /** Local calendar date, yyyy-MM-dd */
  occurrenceDate: string;
  /** Instant the reminder is due */
  at: Date;
}

/**
 * Whether the rule fires on the given local day.
 */
export function matchesDay(rule: RecurrenceRule, day: DateTime): boolean {
  if (rule.frequency === 'daily') return true;
  return rule.daysOfWeek.includes(day.weekday);
}

/**
 * The instant of `timeOfDay` (HH:mm) on a local day.
 */
export function occurrenceOn(timeOfDay: string, day: DateTime): DateTime {
  const [hours, minutes] = timeOfDay.split(':').map(Number);
  return day.startOf('day').set({ hour: hours ?? 0, minute: minutes ?? 0, second: 0, millisecond: 0 });
}

function floorToMinute(date: Date): number {
  return Math.floor(date.getTime() / 60_000) * 60_000;
}

/**
 * Occurrences of a reminder that are due at `now`: on today's or yesterday's
 * local date, at or before now, and not before the reminder was created.
 * Oldest first. Minute precision.
 */
export function dueOccurrences(reminder: Reminder, now: Date, timezone: string): Occurrence[] {
  const today = DateTime.fromJSDate(now, { zone: timezone }).startOf('day');
  const nowMinute = floorToMinute(now);
  const createdMinute = floorToMinute(reminder.createdAt);

  const result: Occurrence[] = [];
  for (const day of [today.minus({ days: 1 }), today]) {
    if (!matchesDay(reminder.recurrence, day)) continue;

    const at = occurrenceOn(reminder.timeOfDay, day);
    const atMs = at.toMillis();
    if (atMs <= nowMinute && atMs >= createdMinute) {
      result.push({ occurrenceDate: day.toFormat('yyyy-MM-dd'), at: at.toJSDate() });
    }
  }
  return result;
}
