import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { generateText } from 'ai';
import type { HealthCondition, HealthProfile } from '../types/records.js';
import { HEALTH_CONDITIONS } from '../types/records.js';
import type { Logger } from '../types/logger.js';

/**
 * Advisor port: free-form dietary answers and meal plans.
 * Implementations resolve null when no answer could be produced.
 */
export interface DietAdvisor {
  answer(question: string, health: HealthProfile, signal?: AbortSignal): Promise<string | null>;
  mealPlan(days: number, health: HealthProfile, signal?: AbortSignal): Promise<string | null>;
}

export interface OpenRouterAdvisorConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
  appName: string;
  /** Upper bound on the length of one answer */
  maxAnswerTokens: number;
}

const SYSTEM_PROMPT = `You are a professional dietitian with 20 years of experience.
Answer questions about nutrition briefly, clearly and based on evidence.
Always recommend seeing a doctor for serious health problems.
Reply in plain text without markdown.`;

const CONDITION_NAMES: Record<HealthCondition, string> = {
  diabetes: 'diabetes',
  gout: 'gout',
  celiac: 'celiac disease',
};

const PLAN_RESTRICTIONS: Record<HealthCondition, string> = {
  diabetes: 'low glycemic index',
  gout: 'low in purines',
  celiac: 'gluten-free',
};

function enabled(health: HealthProfile): HealthCondition[] {
  return HEALTH_CONDITIONS.filter((condition) => health[condition]);
}

/**
 * Prompt for a question, with the user's conditions as context.
 */
export function buildQuestionPrompt(question: string, health: HealthProfile): string {
  const conditions = enabled(health).map((key) => CONDITION_NAMES[key]);
  const context =
    conditions.length > 0 ? `The user has: ${conditions.join(', ')}.` : 'The user has no special diagnoses.';
  return `${context}\nQuestion: ${question}\nAnswer with the user's health in mind.`;
}

export function buildMealPlanPrompt(days: number, health: HealthProfile): string {
  const restrictions = enabled(health).map((key) => PLAN_RESTRICTIONS[key]);
  const plan =
    restrictions.length > 0 ? `The plan must be ${restrictions.join(', ')}.` : 'Make it a balanced plan.';
  const span = days === 1 ? '1 day' : `${String(days)} days`;
  return (
    `Create a meal plan for ${span}. ${plan} ` +
    'For each day list breakfast, lunch, dinner and a snack, with approximate calories and macronutrients.'
  );
}

/**
 * LLM-backed advisor (OpenRouter through the AI SDK).
 */
export class OpenRouterAdvisor implements DietAdvisor {
  private readonly config: OpenRouterAdvisorConfig;
  private readonly logger: Logger;

  constructor(config: OpenRouterAdvisorConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: 'diet-advisor' });
  }

  answer(question: string, health: HealthProfile, signal?: AbortSignal): Promise<string | null> {
    return this.complete('answer', buildQuestionPrompt(question, health), this.config.maxAnswerTokens, signal);
  }

  mealPlan(days: number, health: HealthProfile, signal?: AbortSignal): Promise<string | null> {
    // Plans run long: a few hundred tokens per day
    const maxTokens = Math.max(this.config.maxAnswerTokens, days * 300);
    return this.complete('mealPlan', buildMealPlanPrompt(days, health), maxTokens, signal);
  }

  private async complete(
    kind: 'answer' | 'mealPlan',
    prompt: string,
    maxOutputTokens: number,
    signal?: AbortSignal
  ): Promise<string | null> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const abortSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    try {
      const model = createOpenRouter({ apiKey: this.config.apiKey })(this.config.model);
      const result = await generateText({
        model,
        system: SYSTEM_PROMPT,
        prompt,
        temperature: 0.7,
        maxOutputTokens,
        maxRetries: 0,
        abortSignal,
        headers: { 'X-Title': this.config.appName },
      });

      const text = result.text.trim();
      if (!text) {
        this.logger.warn({ kind }, 'Empty advisor response');
        return null;
      }
      this.logger.debug({ kind, length: text.length }, 'Advisor response received');
      return text;
    } catch (error) {
      this.logger.warn({ kind, error: error instanceof Error ? error.message : String(error) }, 'Advisor request failed');
      return null;
    }
  }
}

export function createOpenRouterAdvisor(config: OpenRouterAdvisorConfig, logger: Logger): OpenRouterAdvisor {
  return new OpenRouterAdvisor(config, logger);
}
