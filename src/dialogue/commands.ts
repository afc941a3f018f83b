/**
 * Command parsing for IDLE-state input and the confirmation vocabulary.
 */

import type { HealthCondition, NutritionGoals, RecurrenceRule } from '../types/records.js';
import { NO_GOALS } from '../types/records.js';
import type { Command, HealthChange, ReminderSpec } from './dialogue-types.js';

const AFFIRMATIVE = new Set(['yes', 'y', 'ok', 'confirm', 'save']);
const NEGATIVE = new Set(['no', 'n']);
const CANCEL = new Set(['cancel', 'stop', '/cancel', '/stop']);

export const DEFAULT_REMINDER_LABEL = 'Time to log your meal';
const MAX_LABEL_LENGTH = 100;
const MAX_CALORIE_GOAL = 20_000;
const MAX_MACRO_GOAL = 2_000;
export const MAX_QUESTION_LENGTH = 500;
export const DEFAULT_PLAN_DAYS = 7;
const MAX_PLAN_DAYS = 7;

const CONDITION_WORDS = new Map<string, HealthCondition>([
  ['diabetes', 'diabetes'],
  ['gout', 'gout'],
  ['celiac', 'celiac'],
  ['coeliac', 'celiac'],
]);

export const USAGE = {
  fix: 'Usage: fix [n] (n = position in your diary, 1 = latest)',
  goal: 'Usage: goal <kcal> [protein <g>] [fat <g>] [carbs <g>], or goal off',
  timezone: 'Usage: timezone <IANA name>, e.g. timezone Europe/Berlin',
  remind: 'Usage: remind <HH:mm> [daily|weekdays|weekends|mon,wed,...] [label]',
  reminderOff: 'Usage: reminder off <n> (n = position in your reminders list)',
  ask: `Usage: ask <question> (up to ${String(MAX_QUESTION_LENGTH)} characters)`,
  plan: `Usage: plan [days] (1-${String(MAX_PLAN_DAYS)}, default ${String(DEFAULT_PLAN_DAYS)})`,
  profile: 'Usage: profile, or profile <diabetes|gout|celiac> <on|off>',
} as const;

function normalizeToken(text: string): string {
  return text.trim().toLowerCase().replace(/[.!]+$/, '');
}

export function isAffirmative(text: string): boolean {
  return AFFIRMATIVE.has(normalizeToken(text));
}

export function isNegative(text: string): boolean {
  return NEGATIVE.has(normalizeToken(text));
}

export function isCancel(text: string): boolean {
  return CANCEL.has(normalizeToken(text));
}

export function isHelp(text: string): boolean {
  const token = normalizeToken(text);
  return token === 'help' || token === '/help';
}

/**
 * Split input into a lower-cased command word (leading "/" and a Telegram
 * "@botname" suffix dropped) and the remaining arguments.
 */
export function splitCommand(text: string): { name: string; args: string } {
  const trimmed = text.trim();
  const match = /^(\S+)\s*([\s\S]*)$/.exec(trimmed);
  if (!match?.[1]) return { name: '', args: '' };

  const name = match[1].replace(/^\//, '').replace(/@\w+$/, '').toLowerCase();
  return { name, args: (match[2] ?? '').trim() };
}

function parsePositiveIndex(text: string): number | null {
  if (!/^\d+$/.test(text)) return null;
  const value = Number(text);
  return value >= 1 ? value : null;
}

/**
 * Parse "<kcal> [protein <g>] [fat <g>] [carbs <g>]".
 */
export function parseGoals(args: string): NutritionGoals | null {
  const tokens = args.toLowerCase().split(/\s+/).filter(Boolean);
  const [first, ...rest] = tokens;
  if (first === undefined) return null;

  const calories = Number(first.replace(/kcal$/, ''));
  if (!Number.isFinite(calories) || calories <= 0 || calories > MAX_CALORIE_GOAL) return null;

  const goals: NutritionGoals = { ...NO_GOALS, calories };
  if (rest.length % 2 !== 0) return null;

  for (let i = 0; i < rest.length; i += 2) {
    const key = rest[i];
    const value = Number((rest[i + 1] ?? '').replace(/g$/, ''));
    if (!Number.isFinite(value) || value <= 0 || value > MAX_MACRO_GOAL) return null;
    if (key === 'protein' || key === 'fat' || key === 'carbs') {
      goals[key] = value;
    } else {
      return null;
    }
  }
  return goals;
}

const DAY_NAMES = new Map<string, number>([
  ['mon', 1],
  ['monday', 1],
  ['tue', 2],
  ['tues', 2],
  ['tuesday', 2],
  ['wed', 3],
  ['wednesday', 3],
  ['thu', 4],
  ['thur', 4],
  ['thurs', 4],
  ['thursday', 4],
  ['fri', 5],
  ['friday', 5],
  ['sat', 6],
  ['saturday', 6],
  ['sun', 7],
  ['sunday', 7],
]);

/**
 * Parse a recurrence word. Null when the token is not one.
 */
export function parseRecurrence(token: string): RecurrenceRule | null {
  const word = token.toLowerCase();
  if (word === 'daily' || word === 'everyday') return { frequency: 'daily' };
  if (word === 'weekdays') return { frequency: 'weekly', daysOfWeek: [1, 2, 3, 4, 5] };
  if (word === 'weekends') return { frequency: 'weekly', daysOfWeek: [6, 7] };

  const days = word.split(',').filter(Boolean);
  if (days.length === 0) return null;

  const numbers: number[] = [];
  for (const day of days) {
    const value = DAY_NAMES.get(day);
    if (value === undefined) return null;
    numbers.push(value);
  }
  const unique = [...new Set(numbers)].sort((a, b) => a - b);
  return unique.length === 7 ? { frequency: 'daily' } : { frequency: 'weekly', daysOfWeek: unique };
}

/**
 * Parse a time of day ("8:00", "08:30") to "HH:mm".
 */
export function parseTimeOfDay(text: string): string | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(text.trim());
  if (!match?.[1] || !match[2]) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Parse "<HH:mm> [recurrence] [label]".
 */
export function parseReminderSpec(text: string): ReminderSpec | null {
  const tokens = text.trim().split(/\s+/).filter(Boolean);
  const [first, second, ...rest] = tokens;
  if (first === undefined) return null;

  const timeOfDay = parseTimeOfDay(first);
  if (!timeOfDay) return null;

  let recurrence: RecurrenceRule = { frequency: 'daily' };
  let labelTokens = second === undefined ? [] : [second, ...rest];
  if (second !== undefined) {
    const parsed = parseRecurrence(second);
    if (parsed) {
      recurrence = parsed;
      labelTokens = rest;
    }
  }

  const label = labelTokens.join(' ').slice(0, MAX_LABEL_LENGTH) || DEFAULT_REMINDER_LABEL;
  return { timeOfDay, recurrence, label };
}

/**
 * Parse "<condition> on|off".
 */
export function parseHealthChange(args: string): HealthChange | null {
  const [word, toggle, ...rest] = args.toLowerCase().split(/\s+/).filter(Boolean);
  if (word === undefined || rest.length > 0) return null;

  const condition = CONDITION_WORDS.get(word);
  if (!condition) return null;
  if (toggle === 'on' || toggle === 'yes') return { condition, enabled: true };
  if (toggle === 'off' || toggle === 'no') return { condition, enabled: false };
  return null;
}

/**
 * Parse IDLE-state input into a command.
 */
export function parseCommand(text: string): Command {
  if (isCancel(text)) return { kind: 'cancel' };

  const { name, args } = splitCommand(text);

  switch (name) {
    case 'start':
      return { kind: 'start' };
    case 'help':
      return { kind: 'help' };
    case 'log':
      return { kind: 'log', args };
    case 'fix': {
      if (!args) return { kind: 'fix', index: 1 };
      const index = parsePositiveIndex(args);
      return index === null ? { kind: 'invalid', usage: USAGE.fix } : { kind: 'fix', index };
    }
    case 'today':
      return { kind: 'summary', period: 'today' };
    case 'yesterday':
      return { kind: 'summary', period: 'yesterday' };
    case 'week':
      return { kind: 'summary', period: 'week' };
    case 'diary':
      return { kind: 'diary' };
    case 'goal': {
      if (args.toLowerCase() === 'off') return { kind: 'goal', goals: null };
      const goals = parseGoals(args);
      return goals ? { kind: 'goal', goals } : { kind: 'invalid', usage: USAGE.goal };
    }
    case 'timezone':
      return args && !/\s/.test(args)
        ? { kind: 'timezone', timezone: args }
        : { kind: 'invalid', usage: USAGE.timezone };
    case 'remind': {
      if (!args) return { kind: 'remind', spec: null };
      const spec = parseReminderSpec(args);
      return spec ? { kind: 'remind', spec } : { kind: 'invalid', usage: USAGE.remind };
    }
    case 'reminders':
      return { kind: 'reminders' };
    case 'reminder': {
      const match = /^off\s+(\S+)$/i.exec(args);
      const index = match?.[1] ? parsePositiveIndex(match[1]) : null;
      return index === null ? { kind: 'invalid', usage: USAGE.reminderOff } : { kind: 'reminderOff', index };
    }
    case 'ask':
      if (!args) return { kind: 'ask', question: null };
      return args.length > MAX_QUESTION_LENGTH ? { kind: 'invalid', usage: USAGE.ask } : { kind: 'ask', question: args };
    case 'plan': {
      if (!args) return { kind: 'plan', days: DEFAULT_PLAN_DAYS };
      const days = parsePositiveIndex(args);
      return days === null || days > MAX_PLAN_DAYS ? { kind: 'invalid', usage: USAGE.plan } : { kind: 'plan', days };
    }
    case 'profile': {
      if (!args) return { kind: 'profile', change: null };
      const change = parseHealthChange(args);
      return change ? { kind: 'profile', change } : { kind: 'invalid', usage: USAGE.profile };
    }
    default:
      return { kind: 'unknown' };
  }
}
