import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  OpenRouterAdvisor,
  buildMealPlanPrompt,
  buildQuestionPrompt,
} from '../../../src/nutrition/diet-advisor.js';
import { NO_CONDITIONS } from '../../../src/types/records.js';
import { createMockLogger, type MockLogger } from '../../helpers/factories.js';

const mocks = vi.hoisted(() => ({
  generateText: vi.fn(),
}));

vi.mock('ai', () => ({ generateText: mocks.generateText }));
vi.mock('@openrouter/ai-sdk-provider', () => ({ createOpenRouter: () => () => ({}) }));

describe('buildQuestionPrompt', () => {
  it('states that there are no diagnoses', () => {
    expect(buildQuestionPrompt('Is rice healthy?', NO_CONDITIONS)).toBe(
      "The user has no special diagnoses.\nQuestion: Is rice healthy?\nAnswer with the user's health in mind."
    );
  });

  it('lists the enabled conditions', () => {
    expect(buildQuestionPrompt('Can I eat bread?', { diabetes: true, gout: false, celiac: true })).toBe(
      "The user has: diabetes, celiac disease.\nQuestion: Can I eat bread?\nAnswer with the user's health in mind."
    );
  });
});

describe('buildMealPlanPrompt', () => {
  it('asks for a balanced plan without conditions', () => {
    expect(buildMealPlanPrompt(1, NO_CONDITIONS)).toBe(
      'Create a meal plan for 1 day. Make it a balanced plan. ' +
        'For each day list breakfast, lunch, dinner and a snack, with approximate calories and macronutrients.'
    );
  });

  it('turns conditions into restrictions', () => {
    expect(buildMealPlanPrompt(3, { diabetes: false, gout: true, celiac: true })).toContain(
      'Create a meal plan for 3 days. The plan must be low in purines, gluten-free.'
    );
  });
});

describe('OpenRouterAdvisor', () => {
  let logger: MockLogger;
  let advisor: OpenRouterAdvisor;

  beforeEach(() => {
    mocks.generateText.mockReset();
    logger = createMockLogger();
    advisor = new OpenRouterAdvisor(
      { apiKey: 'test-key', model: 'test/model', timeoutMs: 1000, appName: 'Test', maxAnswerTokens: 500 },
      logger
    );
  });

  it('returns the trimmed answer', async () => {
    mocks.generateText.mockResolvedValue({ text: '  Brown rice has more fibre.\n' });

    expect(await advisor.answer('Is rice healthy?', NO_CONDITIONS)).toBe('Brown rice has more fibre.');
    expect(mocks.generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        prompt: buildQuestionPrompt('Is rice healthy?', NO_CONDITIONS),
        maxOutputTokens: 500,
        maxRetries: 0,
      })
    );
  });

  it('gives long meal plans more room', async () => {
    mocks.generateText.mockResolvedValue({ text: 'Day 1: oatmeal' });

    expect(await advisor.mealPlan(7, NO_CONDITIONS)).toBe('Day 1: oatmeal');
    expect(mocks.generateText).toHaveBeenCalledWith(expect.objectContaining({ maxOutputTokens: 2100 }));
  });

  it('resolves null when the request fails', async () => {
    mocks.generateText.mockRejectedValue(new Error('401 Unauthorized'));

    expect(await advisor.answer('Is rice healthy?', NO_CONDITIONS)).toBeNull();
    expect(logger.messages('warn')).toEqual(['Advisor request failed']);
  });

  it('resolves null for an empty answer', async () => {
    mocks.generateText.mockResolvedValue({ text: '   ' });

    expect(await advisor.mealPlan(1, NO_CONDITIONS)).toBeNull();
    expect(logger.messages('warn')).toEqual(['Empty advisor response']);
  });
});
