/**
 * Dialogue State Machine
 *
 * Pure transition function: (state, buffer, input) -> (state, buffer, reply,
 * effect). No I/O happens here; storage work is returned as a SideEffect for
 * the DialogueService to run.
 *
 * States:
 *   IDLE --log--> AWAITING_DESCRIPTION --text--> AWAITING_QUANTITY
 *        --log <desc>----------------------------^        |
 *        --log <qty> <desc>--(preview)--> AWAITING_CONFIRMATION <--qty (preview)
 *   AWAITING_CONFIRMATION --yes (saveEntry)--> IDLE
 *                         --no--> AWAITING_DESCRIPTION
 *   IDLE --remind--> AWAITING_REMINDER_TIME --HH:mm (createReminder)--> IDLE
 *   IDLE --ask--> AWAITING_QUESTION --text (ask)--> IDLE
 *   any AWAITING_* --cancel--> IDLE
 */

import type { DialogueState, SessionBuffer } from '../types/records.js';
import { NO_GOALS } from '../types/records.js';
import { parseQuantity, splitQuantityAndDescription } from '../nutrition/quantity-parser.js';
import type { StepContext, StepResult } from './dialogue-types.js';
import {
  MAX_QUESTION_LENGTH,
  USAGE,
  isAffirmative,
  isCancel,
  isHelp,
  isNegative,
  parseCommand,
  parseReminderSpec,
} from './commands.js';
import * as replies from './replies.js';

export interface DialogueSnapshot {
  state: DialogueState;
  buffer: SessionBuffer;
}

function stay(snapshot: DialogueSnapshot, reply: string): StepResult {
  return { state: snapshot.state, buffer: snapshot.buffer, reply, effect: null };
}

function idle(reply: string | null, effect: StepResult['effect'] = null): StepResult {
  return { state: 'IDLE', buffer: {}, reply, effect };
}

/**
 * Re-prompt for the current state (used for blank and unrecognized input).
 */
export function promptFor(snapshot: DialogueSnapshot): string {
  switch (snapshot.state) {
    case 'IDLE':
      return replies.HELP;
    case 'AWAITING_DESCRIPTION':
      return snapshot.buffer.correctsActionId ? replies.PROMPT_CORRECTION_DESCRIPTION : replies.PROMPT_DESCRIPTION;
    case 'AWAITING_QUANTITY':
      return replies.promptQuantity(snapshot.buffer.description ?? 'of it');
    case 'AWAITING_CONFIRMATION':
      return replies.PROMPT_CONFIRMATION_AGAIN;
    case 'AWAITING_REMINDER_TIME':
      return replies.PROMPT_REMINDER_TIME;
    case 'AWAITING_QUESTION':
      return replies.PROMPT_QUESTION;
  }
}

/**
 * Accept a description (optionally with a quantity) in a log flow.
 */
function acceptDescription(
  buffer: SessionBuffer,
  text: string,
  ctx: StepContext,
  fallback: DialogueSnapshot
): StepResult {
  const split = splitQuantityAndDescription(text);
  const description = (split?.description ?? text).trim();

  if (description.length > ctx.limits.maxDescriptionLength) {
    return stay(
      fallback,
      replies.invalidInput(
        `Description is too long (max ${String(ctx.limits.maxDescriptionLength)} characters)`,
        promptFor(fallback)
      )
    );
  }

  if (split) {
    if (split.quantity.amount > ctx.limits.maxQuantity) {
      return {
        state: 'AWAITING_QUANTITY',
        buffer: { ...buffer, description },
        reply: replies.invalidInput('That amount is too large', replies.promptQuantity(description)),
        effect: null,
      };
    }
    return {
      state: 'AWAITING_CONFIRMATION',
      buffer: { ...buffer, description, quantity: split.quantity },
      reply: null,
      effect: { type: 'preview', description, quantity: split.quantity },
    };
  }

  return {
    state: 'AWAITING_QUANTITY',
    buffer: { ...buffer, description },
    reply: replies.promptQuantity(description),
    effect: null,
  };
}

function stepIdle(text: string, ctx: StepContext): StepResult {
  const command = parseCommand(text);
  const snapshot: DialogueSnapshot = { state: 'IDLE', buffer: {} };

  switch (command.kind) {
    case 'start':
      return idle(replies.WELCOME);
    case 'help':
    case 'unknown':
      return idle(replies.HELP);
    case 'cancel':
      return idle(replies.NOTHING_TO_CANCEL);
    case 'invalid':
      return idle(command.usage);
    case 'log': {
      const buffer: SessionBuffer = { loggedAt: ctx.now };
      if (!command.args) {
        return { state: 'AWAITING_DESCRIPTION', buffer, reply: replies.PROMPT_DESCRIPTION, effect: null };
      }
      return acceptDescription(buffer, command.args, ctx, snapshot);
    }
    case 'fix':
      return idle(null, { type: 'startCorrection', index: command.index });
    case 'summary':
      return idle(null, { type: 'summary', period: command.period });
    case 'diary':
      return idle(null, { type: 'diary' });
    case 'goal':
      return idle(null, { type: 'setGoals', goals: command.goals ?? { ...NO_GOALS } });
    case 'timezone':
      return idle(null, { type: 'setTimezone', timezone: command.timezone });
    case 'remind':
      return command.spec === null
        ? { state: 'AWAITING_REMINDER_TIME', buffer: {}, reply: replies.PROMPT_REMINDER_TIME, effect: null }
        : idle(null, { type: 'createReminder', spec: command.spec });
    case 'reminders':
      return idle(null, { type: 'listReminders' });
    case 'reminderOff':
      return idle(null, { type: 'deactivateReminder', index: command.index });
    case 'ask':
      return command.question === null
        ? { state: 'AWAITING_QUESTION', buffer: {}, reply: replies.PROMPT_QUESTION, effect: null }
        : idle(null, { type: 'ask', question: command.question });
    case 'plan':
      return idle(null, { type: 'mealPlan', days: command.days });
    case 'profile':
      return command.change === null
        ? idle(null, { type: 'showProfile' })
        : idle(null, { type: 'setHealth', change: command.change });
  }
}

/**
 * Advance the dialogue by one inbound message.
 */
export function step(snapshot: DialogueSnapshot, rawText: string, ctx: StepContext): StepResult {
  const text = rawText.trim();

  if (!text) {
    return stay(snapshot, promptFor(snapshot));
  }

  if (snapshot.state === 'IDLE') {
    return stepIdle(text, ctx);
  }

  if (isCancel(text)) {
    return idle(replies.CANCELLED);
  }
  if (isHelp(text)) {
    return stay(snapshot, `${replies.HELP}\n\n${promptFor(snapshot)}`);
  }

  const { buffer } = snapshot;

  switch (snapshot.state) {
    case 'AWAITING_DESCRIPTION':
      return acceptDescription(buffer, text, ctx, snapshot);

    case 'AWAITING_QUANTITY': {
      const quantity = parseQuantity(text);
      if (!quantity) {
        return stay(snapshot, replies.INVALID_QUANTITY);
      }
      if (quantity.amount > ctx.limits.maxQuantity) {
        return stay(snapshot, replies.invalidInput('That amount is too large', promptFor(snapshot)));
      }
      const description = buffer.description ?? '';
      return {
        state: 'AWAITING_CONFIRMATION',
        buffer: { ...buffer, quantity },
        reply: null,
        effect: { type: 'preview', description, quantity },
      };
    }

    case 'AWAITING_CONFIRMATION': {
      if (isAffirmative(text)) {
        return idle(null, { type: 'saveEntry' });
      }
      if (isNegative(text)) {
        const restart: SessionBuffer = {};
        if (buffer.loggedAt) restart.loggedAt = buffer.loggedAt;
        if (buffer.correctsActionId) restart.correctsActionId = buffer.correctsActionId;
        return {
          state: 'AWAITING_DESCRIPTION',
          buffer: restart,
          reply: restart.correctsActionId ? replies.PROMPT_CORRECTION_DESCRIPTION : replies.PROMPT_DESCRIPTION,
          effect: null,
        };
      }
      return stay(snapshot, replies.PROMPT_CONFIRMATION_AGAIN);
    }

    case 'AWAITING_REMINDER_TIME': {
      const spec = parseReminderSpec(text);
      if (!spec) {
        return stay(snapshot, `${USAGE.remind}\n${replies.PROMPT_REMINDER_TIME}`);
      }
      return idle(null, { type: 'createReminder', spec });
    }

    case 'AWAITING_QUESTION': {
      if (text.length > MAX_QUESTION_LENGTH) {
        return stay(snapshot, `${USAGE.ask}\n${replies.PROMPT_QUESTION}`);
      }
      return idle(null, { type: 'ask', question: text });
    }
  }
}
