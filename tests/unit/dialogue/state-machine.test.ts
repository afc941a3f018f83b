import { describe, it, expect } from 'vitest';
import { promptFor, step, type DialogueSnapshot } from '../../../src/dialogue/state-machine.js';
import type { StepContext } from '../../../src/dialogue/dialogue-types.js';
import { USAGE } from '../../../src/dialogue/commands.js';
import * as replies from '../../../src/dialogue/replies.js';

const NOW = new Date('2024-03-10T12:00:00Z');
const EARLIER = new Date('2024-03-10T11:55:00Z');
const ctx: StepContext = { now: NOW, limits: { maxDescriptionLength: 20, maxQuantity: 1000 } };

const IDLE: DialogueSnapshot = { state: 'IDLE', buffer: {} };

describe('step', () => {
  describe('log flow', () => {
    it('asks for a description', () => {
      expect(step(IDLE, 'log', ctx)).toEqual({
        state: 'AWAITING_DESCRIPTION',
        buffer: { loggedAt: NOW },
        reply: replies.PROMPT_DESCRIPTION,
        effect: null,
      });
    });

    it('asks for the quantity after the description', () => {
      const snapshot: DialogueSnapshot = { state: 'AWAITING_DESCRIPTION', buffer: { loggedAt: EARLIER } };
      expect(step(snapshot, ' rice ', ctx)).toEqual({
        state: 'AWAITING_QUANTITY',
        buffer: { loggedAt: EARLIER, description: 'rice' },
        reply: 'How much rice? e.g. 200g, 2 pieces, 1 cup.',
        effect: null,
      });
    });

    it('requests a preview once the quantity is known', () => {
      const snapshot: DialogueSnapshot = {
        state: 'AWAITING_QUANTITY',
        buffer: { loggedAt: EARLIER, description: 'rice' },
      };
      expect(step(snapshot, '200g', ctx)).toEqual({
        state: 'AWAITING_CONFIRMATION',
        buffer: { loggedAt: EARLIER, description: 'rice', quantity: { amount: 200, unit: 'g' } },
        reply: null,
        effect: { type: 'preview', description: 'rice', quantity: { amount: 200, unit: 'g' } },
      });
    });

    it('skips the quantity prompt when the description carries one', () => {
      const result = step(IDLE, 'log 2 slices bread', ctx);
      expect(result.state).toBe('AWAITING_CONFIRMATION');
      expect(result.effect).toEqual({ type: 'preview', description: 'bread', quantity: { amount: 2, unit: 'slice' } });
    });

    it('re-prompts on an unreadable quantity', () => {
      const snapshot: DialogueSnapshot = { state: 'AWAITING_QUANTITY', buffer: { description: 'rice' } };
      expect(step(snapshot, 'a lot', ctx)).toEqual({ ...snapshot, reply: replies.INVALID_QUANTITY, effect: null });
    });

    it('rejects a quantity above the limit', () => {
      const snapshot: DialogueSnapshot = { state: 'AWAITING_QUANTITY', buffer: { description: 'rice' } };
      const result = step(snapshot, '5000 g', ctx);
      expect(result.state).toBe('AWAITING_QUANTITY');
      expect(result.reply).toBe('That amount is too large. How much rice? e.g. 200g, 2 pieces, 1 cup.');
    });

    it('rejects a description above the limit', () => {
      const snapshot: DialogueSnapshot = { state: 'AWAITING_DESCRIPTION', buffer: {} };
      const result = step(snapshot, 'a very long description of lunch', ctx);
      expect(result.state).toBe('AWAITING_DESCRIPTION');
      expect(result.reply).toBe(`Description is too long (max 20 characters). ${replies.PROMPT_DESCRIPTION}`);
    });
  });

  describe('confirmation', () => {
    const snapshot: DialogueSnapshot = {
      state: 'AWAITING_CONFIRMATION',
      buffer: {
        loggedAt: EARLIER,
        description: 'rice',
        quantity: { amount: 200, unit: 'g' },
        correctsActionId: 'action_1',
      },
    };

    it('saves on yes', () => {
      expect(step(snapshot, 'Yes', ctx)).toEqual({ state: 'IDLE', buffer: {}, reply: null, effect: { type: 'saveEntry' } });
    });

    it('goes back to the description on no, keeping meal time and correction target', () => {
      expect(step(snapshot, 'no', ctx)).toEqual({
        state: 'AWAITING_DESCRIPTION',
        buffer: { loggedAt: EARLIER, correctsActionId: 'action_1' },
        reply: replies.PROMPT_CORRECTION_DESCRIPTION,
        effect: null,
      });
    });

    it('asks again on anything else', () => {
      expect(step(snapshot, 'maybe', ctx)).toEqual({
        ...snapshot,
        reply: replies.PROMPT_CONFIRMATION_AGAIN,
        effect: null,
      });
    });
  });

  describe('in any awaiting state', () => {
    const snapshot: DialogueSnapshot = { state: 'AWAITING_QUANTITY', buffer: { description: 'rice' } };

    it('cancel resets to idle', () => {
      expect(step(snapshot, 'cancel', ctx)).toEqual({ state: 'IDLE', buffer: {}, reply: replies.CANCELLED, effect: null });
    });

    it('blank input re-prompts', () => {
      expect(step(snapshot, '   ', ctx).reply).toBe(promptFor(snapshot));
    });

    it('help shows the command list and the current prompt', () => {
      const result = step(snapshot, 'help', ctx);
      expect(result.state).toBe('AWAITING_QUANTITY');
      expect(result.reply).toBe(`${replies.HELP}\n\nHow much rice? e.g. 200g, 2 pieces, 1 cup.`);
    });
  });

  describe('idle commands', () => {
    it('has nothing to cancel', () => {
      expect(step(IDLE, 'cancel', ctx).reply).toBe(replies.NOTHING_TO_CANCEL);
    });

    it('answers unknown text with help', () => {
      expect(step(IDLE, 'pizza', ctx)).toEqual({ state: 'IDLE', buffer: {}, reply: replies.HELP, effect: null });
    });

    it('shows usage for malformed commands', () => {
      expect(step(IDLE, 'fix abc', ctx).reply).toBe(USAGE.fix);
    });

    it('delegates storage commands as effects', () => {
      expect(step(IDLE, 'fix 2', ctx).effect).toEqual({ type: 'startCorrection', index: 2 });
      expect(step(IDLE, 'today', ctx).effect).toEqual({ type: 'summary', period: 'today' });
      expect(step(IDLE, 'diary', ctx).effect).toEqual({ type: 'diary' });
      expect(step(IDLE, 'goal off', ctx).effect).toEqual({
        type: 'setGoals',
        goals: { calories: null, protein: null, fat: null, carbs: null },
      });
      expect(step(IDLE, 'reminder off 1', ctx).effect).toEqual({ type: 'deactivateReminder', index: 1 });
    });
  });

  describe('reminder flow', () => {
    it('asks for a time, then creates the reminder', () => {
      const asked = step(IDLE, 'remind', ctx);
      expect(asked.state).toBe('AWAITING_REMINDER_TIME');
      expect(asked.reply).toBe(replies.PROMPT_REMINDER_TIME);

      const created = step({ state: asked.state, buffer: asked.buffer }, '08:00 weekends Brunch', ctx);
      expect(created).toEqual({
        state: 'IDLE',
        buffer: {},
        reply: null,
        effect: {
          type: 'createReminder',
          spec: { timeOfDay: '08:00', recurrence: { frequency: 'weekly', daysOfWeek: [6, 7] }, label: 'Brunch' },
        },
      });
    });

    it('re-prompts on an invalid time', () => {
      const snapshot: DialogueSnapshot = { state: 'AWAITING_REMINDER_TIME', buffer: {} };
      expect(step(snapshot, 'soon', ctx).reply).toBe(`${USAGE.remind}\n${replies.PROMPT_REMINDER_TIME}`);
    });
  });

  describe('dietitian questions', () => {
    it('answers an inline question as an effect', () => {
      expect(step(IDLE, 'ask Is fruit juice healthy?', ctx)).toEqual({
        state: 'IDLE',
        buffer: {},
        reply: null,
        effect: { type: 'ask', question: 'Is fruit juice healthy?' },
      });
    });

    it('asks for the question, then answers it', () => {
      const asked = step(IDLE, 'ask', ctx);
      expect(asked.state).toBe('AWAITING_QUESTION');
      expect(asked.reply).toBe(replies.PROMPT_QUESTION);

      expect(step({ state: asked.state, buffer: asked.buffer }, 'How much fibre per day?', ctx).effect).toEqual({
        type: 'ask',
        question: 'How much fibre per day?',
      });
    });

    it('re-prompts on a question that is too long', () => {
      const snapshot: DialogueSnapshot = { state: 'AWAITING_QUESTION', buffer: {} };
      expect(step(snapshot, 'x'.repeat(501), ctx)).toEqual({
        state: 'AWAITING_QUESTION',
        buffer: {},
        reply: `${USAGE.ask}\n${replies.PROMPT_QUESTION}`,
        effect: null,
      });
    });

    it('delegates plan and profile as effects', () => {
      expect(step(IDLE, 'plan 2', ctx).effect).toEqual({ type: 'mealPlan', days: 2 });
      expect(step(IDLE, 'profile', ctx).effect).toEqual({ type: 'showProfile' });
      expect(step(IDLE, 'profile celiac on', ctx).effect).toEqual({
        type: 'setHealth',
        change: { condition: 'celiac', enabled: true },
      });
    });
  });
});
