import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { generateText } from 'ai';
import { z } from 'zod';
import type { Nutrients, Quantity } from '../types/records.js';
import type { Logger } from '../types/logger.js';
import { formatQuantity } from './quantity-parser.js';

/**
 * Nutrition estimate for a food the catalog does not know.
 */
export interface NutritionEstimate {
  grams: number | null;
  nutrients: Nutrients;
}

/**
 * Estimator port. Implementations resolve null when they cannot estimate.
 */
export interface NutritionEstimator {
  estimate(description: string, quantity: Quantity, signal?: AbortSignal): Promise<NutritionEstimate | null>;
}

export interface OpenRouterEstimatorConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
  appName: string;
}

const estimateSchema = z.object({
  grams: z.number().positive().nullable(),
  calories: z.number().nonnegative(),
  protein: z.number().nonnegative(),
  fat: z.number().nonnegative(),
  carbs: z.number().nonnegative(),
});

const SYSTEM_PROMPT = `You are a dietician estimating nutrition facts for a logged meal.
Reply with one JSON object and nothing else:
{"grams": <total weight in grams or null>, "calories": <kcal>, "protein": <g>, "fat": <g>, "carbs": <g>}
Values are totals for the whole quantity given, not per 100 g.`;

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Extract and validate the JSON object from model output.
 */
export function parseEstimate(text: string): NutritionEstimate | null {
  const match = /\{[\s\S]*\}/.exec(text);
  if (!match) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(match[0]);
  } catch {
    return null;
  }

  const result = estimateSchema.safeParse(raw);
  if (!result.success) return null;

  const { grams, calories, protein, fat, carbs } = result.data;
  return {
    grams: grams === null ? null : round1(grams),
    nutrients: {
      calories: round1(calories),
      protein: round1(protein),
      fat: round1(fat),
      carbs: round1(carbs),
    },
  };
}

/**
 * LLM-backed estimator (OpenRouter through the AI SDK).
 *
 * Failures resolve null so a logging flow never depends on the model being
 * reachable; the entry is then stored without nutrients.
 */
export class OpenRouterEstimator implements NutritionEstimator {
  private readonly config: OpenRouterEstimatorConfig;
  private readonly logger: Logger;

  constructor(config: OpenRouterEstimatorConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: 'nutrition-estimator' });
  }

  async estimate(
    description: string,
    quantity: Quantity,
    signal?: AbortSignal
  ): Promise<NutritionEstimate | null> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const abortSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    try {
      const model = createOpenRouter({ apiKey: this.config.apiKey })(this.config.model);
      const result = await generateText({
        model,
        system: SYSTEM_PROMPT,
        prompt: `Food: ${description}\nQuantity: ${formatQuantity(quantity)}`,
        temperature: 0,
        maxOutputTokens: 200,
        maxRetries: 0,
        abortSignal,
        headers: { 'X-Title': this.config.appName },
      });

      const estimate = parseEstimate(result.text);
      if (!estimate) {
        this.logger.warn({ description, output: result.text.slice(0, 200) }, 'Unparseable nutrition estimate');
      }
      return estimate;
    } catch (error) {
      this.logger.warn(
        { description, error: error instanceof Error ? error.message : String(error) },
        'Nutrition estimate failed'
      );
      return null;
    }
  }
}

export function createOpenRouterEstimator(
  config: OpenRouterEstimatorConfig,
  logger: Logger
): OpenRouterEstimator {
  return new OpenRouterEstimator(config, logger);
}
