/**
 * Reply texts. Plain text, no markup.
 */

import { DateTime } from 'luxon';
import type {
  Entry,
  HealthCondition,
  HealthProfile,
  NutritionGoals,
  NutritionPreview,
  Quantity,
  Reminder,
  RecurrenceRule,
} from '../types/records.js';
import { HEALTH_CONDITIONS } from '../types/records.js';
import type { DailySummary } from '../nutrition/aggregation.js';
import { formatQuantity } from '../nutrition/quantity-parser.js';
import type { HealthChange, SummaryPeriod } from './dialogue-types.js';

export const WELCOME = [
  'Hi! I keep a food diary for you.',
  'Send "log" to record a meal, "today" to see how your day adds up, or "help" for everything I can do.',
].join('\n');

export const HELP = [
  'Commands:',
  'log - record a meal step by step',
  'log 200g rice - record with the amount in one message',
  'fix [n] - correct the n-th latest entry (default: latest)',
  'today / yesterday / week - totals and goal progress',
  'diary - your last entries',
  'goal 2000 [protein 120] [fat 70] [carbs 250] - set daily goals; goal off to clear',
  'timezone Europe/Berlin - set your timezone',
  'remind 08:00 [daily|weekdays|weekends|mon,wed] [label] - add a reminder',
  'reminders - list reminders; reminder off <n> to disable one',
  'ask <question> - ask the dietitian',
  'plan [days] - get a meal plan (default: 7 days)',
  'profile [diabetes|gout|celiac on|off] - health conditions the dietitian considers',
  'cancel - abandon the current step',
].join('\n');

export const PROMPT_DESCRIPTION = 'What did you eat? Send a short description, e.g. "rice" or "200g chicken breast".';
export const PROMPT_CORRECTION_DESCRIPTION = 'Send the corrected description, e.g. "rice" or "150g rice".';
export const INVALID_QUANTITY =
  "I couldn't read that amount. Send a positive number with an optional unit, e.g. 150g, 2, 1/2 cup.";
export const PROMPT_CONFIRMATION_AGAIN = 'Reply "yes" to save, "no" to change it, or "cancel".';
export const PROMPT_REMINDER_TIME =
  'When should I remind you? Send a time like 08:00, optionally with days and a label, e.g. "12:30 weekdays Lunch".';
export const CANCELLED = 'Cancelled.';
export const NOTHING_TO_CANCEL = 'Nothing to cancel.';
export const SESSION_EXPIRED = 'Your unfinished entry timed out and was discarded.';
export const TRY_AGAIN_LATER = "Sorry, I couldn't complete that right now. Please try again later.";
export const GENERIC_ERROR = 'Something went wrong. Please start again.';
export const GOALS_CLEARED = 'Daily goals cleared.';
export const PROMPT_QUESTION = 'What would you like to ask the dietitian?';
export const ADVISOR_DISABLED = 'The dietitian is not available: no language model is configured.';
export const ADVISOR_FAILED = "The dietitian couldn't answer right now. Please try again later.";
export const ADVICE_DISCLAIMER = 'This is general advice, not a diagnosis. See a doctor for medical concerns.';

export function formatNumber(value: number): string {
  const rounded = Math.round(value * 10) / 10;
  return Number.isInteger(rounded) ? String(rounded) : rounded.toFixed(1);
}

function formatMaybe(value: number | null, unit: string): string {
  return value === null ? `? ${unit}` : `${formatNumber(value)} ${unit}`;
}

export function promptQuantity(description: string): string {
  return `How much ${description}? e.g. 200g, 2 pieces, 1 cup.`;
}

export function invalidInput(message: string, prompt: string): string {
  return `${message}. ${prompt}`;
}

export function confirmation(
  description: string,
  quantity: Quantity,
  preview: NutritionPreview,
  correcting: boolean
): string {
  const lines = [correcting ? 'Replace the entry with:' : 'Save this entry?', `${description}, ${formatQuantity(quantity)}`];

  if (preview.source === null) {
    lines.push('Nutrition: unknown (not in my food list). It will count as incomplete in summaries.');
  } else {
    const { nutrients } = preview;
    const basis = preview.source === 'catalog' ? `as "${preview.matchedName ?? description}"` : 'estimated';
    const weight = preview.grams === null ? '' : `, ${formatNumber(preview.grams)} g`;
    lines.push(
      `Nutrition (${basis}${weight}): ${formatMaybe(nutrients.calories, 'kcal')}, ` +
        `P ${formatMaybe(nutrients.protein, 'g')}, F ${formatMaybe(nutrients.fat, 'g')}, C ${formatMaybe(nutrients.carbs, 'g')}`
    );
  }

  lines.push(PROMPT_CONFIRMATION_AGAIN);
  return lines.join('\n');
}

export function entrySaved(entry: Entry, corrected: boolean): string {
  const calories = entry.nutrients.calories === null ? '' : ` (${formatNumber(entry.nutrients.calories)} kcal)`;
  const verb = corrected ? 'Corrected' : 'Saved';
  return `${verb}: ${entry.description}, ${formatQuantity(entry.quantity)}${calories}.`;
}

export function correctionStarted(entry: Entry): string {
  return `Correcting "${entry.description}, ${formatQuantity(entry.quantity)}". ${PROMPT_CORRECTION_DESCRIPTION}`;
}

export function noSuchEntry(index: number): string {
  return index === 1 ? 'Your diary is empty.' : `There is no entry #${String(index)} in your diary.`;
}

const PERIOD_TITLES: Record<SummaryPeriod, string> = {
  today: 'Today',
  yesterday: 'Yesterday',
  week: 'Last 7 days',
};

function nutrientLine(label: string, actual: number, goal: number | null, delta: number | null, unit: string): string {
  if (goal === null || delta === null) {
    return `${label}: ${formatNumber(actual)} ${unit}`;
  }
  const diff = delta > 0 ? `${formatNumber(delta)} over` : `${formatNumber(-delta)} left`;
  return `${label}: ${formatNumber(actual)} / ${formatNumber(goal)} ${unit} (${diff})`;
}

export function summaryText(
  period: SummaryPeriod,
  summary: DailySummary,
  timezone: string,
  days: DailySummary[] = []
): string {
  const start = DateTime.fromJSDate(summary.range.start, { zone: timezone });
  const header =
    period === 'week'
      ? `${PERIOD_TITLES[period]} (from ${start.toFormat('d LLL')})`
      : `${PERIOD_TITLES[period]} (${start.toFormat('ccc d LLL')})`;

  if (summary.entryCount === 0) {
    return `${header}\nNo entries yet.`;
  }

  const scale = summary.days;
  const goal = (key: keyof NutritionGoals): number | null => {
    const value = summary.goals[key];
    return value === null ? null : value * scale;
  };

  const lines = [
    header,
    nutrientLine('Calories', summary.totals.calories, goal('calories'), summary.deltas.calories, 'kcal'),
    nutrientLine('Protein', summary.totals.protein, goal('protein'), summary.deltas.protein, 'g'),
    nutrientLine('Fat', summary.totals.fat, goal('fat'), summary.deltas.fat, 'g'),
    nutrientLine('Carbs', summary.totals.carbs, goal('carbs'), summary.deltas.carbs, 'g'),
    `Entries: ${String(summary.entryCount)}`,
  ];

  if (days.length > 0) {
    lines.push('');
    for (const day of days) {
      const label = DateTime.fromJSDate(day.range.start, { zone: timezone }).toFormat('ccc d LLL');
      lines.push(`${label}: ${formatNumber(day.totals.calories)} kcal${day.incomplete ? ' *' : ''}`);
    }
  }

  if (summary.incomplete) {
    const count = summary.unresolvedCount;
    lines.push(
      '',
      `Note: ${String(count)} ${count === 1 ? 'entry has' : 'entries have'} no nutrition data, so totals are incomplete.`
    );
  }
  return lines.join('\n');
}

export function diaryText(entries: Entry[], timezone: string): string {
  if (entries.length === 0) {
    return 'Your diary is empty. Send "log" to add a meal.';
  }
  const lines = entries.map((entry, i) => {
    const when = DateTime.fromJSDate(entry.eatenAt, { zone: timezone }).toFormat('d LLL HH:mm');
    return `${String(i + 1)}. ${when} ${entry.description}, ${formatQuantity(entry.quantity)} - ${formatMaybe(entry.nutrients.calories, 'kcal')}`;
  });
  return ['Latest entries:', ...lines, '', 'Send "fix <n>" to correct one.'].join('\n');
}

export function goalsSet(goals: NutritionGoals): string {
  const parts = [`${formatNumber(goals.calories ?? 0)} kcal`];
  if (goals.protein !== null) parts.push(`protein ${formatNumber(goals.protein)} g`);
  if (goals.fat !== null) parts.push(`fat ${formatNumber(goals.fat)} g`);
  if (goals.carbs !== null) parts.push(`carbs ${formatNumber(goals.carbs)} g`);
  return `Daily goals set: ${parts.join(', ')}.`;
}

export function timezoneSet(timezone: string): string {
  return `Timezone set to ${timezone}.`;
}

export function invalidTimezone(timezone: string): string {
  return `"${timezone}" is not a timezone I know. Use an IANA name such as Europe/Berlin or America/New_York.`;
}

const DAY_LABELS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

export function describeRecurrence(rule: RecurrenceRule): string {
  if (rule.frequency === 'daily') return 'daily';
  const days = [...rule.daysOfWeek].sort((a, b) => a - b);
  if (days.join(',') === '1,2,3,4,5') return 'weekdays';
  if (days.join(',') === '6,7') return 'weekends';
  return days.map((d) => DAY_LABELS[d - 1] ?? String(d)).join(', ');
}

export function reminderCreated(reminder: Reminder): string {
  return `Reminder set: ${reminder.timeOfDay} ${describeRecurrence(reminder.recurrence)} - ${reminder.label}.`;
}

export function remindersText(reminders: Reminder[]): string {
  if (reminders.length === 0) {
    return 'No reminders. Add one with "remind 08:00".';
  }
  const lines = reminders.map(
    (r, i) =>
      `${String(i + 1)}. ${r.timeOfDay} ${describeRecurrence(r.recurrence)} - ${r.label}${r.active ? '' : ' (off)'}`
  );
  return ['Your reminders:', ...lines].join('\n');
}

export function reminderDeactivated(reminder: Reminder): string {
  return `Reminder off: ${reminder.timeOfDay} ${reminder.label}.`;
}

export function reminderAlreadyOff(index: number): string {
  return `Reminder #${String(index)} is already off.`;
}

export function noSuchReminder(index: number): string {
  return `There is no reminder #${String(index)}.`;
}

export function reminderMessage(label: string): string {
  return `⏰ Reminder: ${label}`;
}

const CONDITION_LABELS: Record<HealthCondition, string> = {
  diabetes: 'Diabetes',
  gout: 'Gout',
  celiac: 'Celiac disease',
};

export function profileText(health: HealthProfile): string {
  const lines = HEALTH_CONDITIONS.map(
    (condition) => `${CONDITION_LABELS[condition]}: ${health[condition] ? 'yes' : 'no'}`
  );
  return ['Your health profile:', ...lines, 'Change it with e.g. "profile diabetes on".'].join('\n');
}

export function healthSet(change: HealthChange): string {
  return `${CONDITION_LABELS[change.condition]}: ${change.enabled ? 'yes' : 'no'}. The dietitian will take it into account.`;
}

export function advice(answer: string): string {
  return `${answer}\n\n${ADVICE_DISCLAIMER}`;
}
