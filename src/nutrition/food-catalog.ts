/**
 * Food catalog: per-100 g nutrient values, looked up by fuzzy name match.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Nutrients, Quantity, Unit } from '../types/records.js';
import { ConfigError } from '../core/errors.js';

const nutrientValue = z.number().nonnegative();

const foodSchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  per100g: z.object({
    calories: nutrientValue,
    protein: nutrientValue,
    fat: nutrientValue,
    carbs: nutrientValue,
  }),
  /** g per ml, for volume units */
  density: z.number().positive().optional(),
  /** Weight in grams of one piece, slice, serving or cup */
  portions: z.record(z.enum(['piece', 'slice', 'serving', 'cup']), z.number().positive()).default({}),
});

const catalogFileSchema = z.object({
  version: z.number().int().positive(),
  foods: z.array(foodSchema),
});

export type Food = z.infer<typeof foodSchema>;

export interface FoodMatch {
  food: Food;
  /** Name similarity 0..1 */
  score: number;
}

export interface CatalogResolution {
  matchedName: string;
  grams: number | null;
  nutrients: Nutrients;
}

const MASS_IN_GRAMS: Partial<Record<Unit, number>> = {
  g: 1,
  kg: 1000,
  mg: 0.001,
  oz: 28.3495,
  lb: 453.592,
};

const VOLUME_IN_ML: Partial<Record<Unit, number>> = {
  ml: 1,
  l: 1000,
  tbsp: 15,
  tsp: 5,
  cup: 240,
};

const STOPWORDS = new Set(['a', 'an', 'the', 'some', 'of', 'my', 'with']);

export function normalizeName(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter((t) => t && !STOPWORDS.has(t))
    .join(' ');
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  const n = b.length;
  let prev = new Array<number>(n + 1);
  let curr = new Array<number>(n + 1);

  for (let j = 0; j <= n; j++) {
    prev[j] = j;
  }

  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= n; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min((prev[j] ?? 0) + 1, (curr[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[n] ?? 0;
}

/**
 * Normalized Levenshtein similarity, 1 for identical strings.
 */
export function similarity(a: string, b: string): number {
  if (!a || !b) return 0;
  return 1 - levenshtein(a, b) / Math.max(a.length, b.length);
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * FoodCatalog - in-memory catalog loaded from data/foods.json.
 */
export class FoodCatalog {
  private readonly foods: Food[];
  private readonly matchThreshold: number;

  constructor(foods: Food[], matchThreshold = 0.8) {
    this.foods = foods;
    this.matchThreshold = matchThreshold;
  }

  get size(): number {
    return this.foods.length;
  }

  /**
   * Best catalog match at or above the threshold, or null.
   */
  match(description: string): FoodMatch | null {
    const query = normalizeName(description);
    if (!query) return null;

    let best: FoodMatch | null = null;
    for (const food of this.foods) {
      for (const name of [food.name, ...food.aliases]) {
        const score = similarity(query, normalizeName(name));
        if (!best || score > best.score) {
          best = { food, score };
        }
      }
    }

    return best && best.score >= this.matchThreshold ? best : null;
  }

  /**
   * Convert a quantity of a food to grams. Null when the unit does not apply
   * (volume without density, a portion the food does not define).
   *
   * A bare number counts as pieces when the food has a piece weight,
   * otherwise as grams.
   */
  toGrams(food: Food, quantity: Quantity): number | null {
    const { amount, unit } = quantity;

    if (unit === null) {
      const piece = food.portions.piece;
      return piece !== undefined ? amount * piece : amount;
    }

    const massFactor = MASS_IN_GRAMS[unit];
    if (massFactor !== undefined) {
      return amount * massFactor;
    }

    if (unit === 'piece' || unit === 'slice' || unit === 'serving' || unit === 'cup') {
      const portion = food.portions[unit];
      if (portion !== undefined) return amount * portion;
    }

    const ml = VOLUME_IN_ML[unit];
    if (ml !== undefined && food.density !== undefined) {
      return amount * ml * food.density;
    }

    return null;
  }

  /**
   * Match a description and compute nutrients for the quantity.
   * Null when there is no match or the quantity cannot be weighed.
   */
  resolve(description: string, quantity: Quantity): CatalogResolution | null {
    const match = this.match(description);
    if (!match) return null;

    const grams = this.toGrams(match.food, quantity);
    if (grams === null) return null;

    const factor = grams / 100;
    const { per100g } = match.food;
    return {
      matchedName: match.food.name,
      grams: round1(grams),
      nutrients: {
        calories: round1(per100g.calories * factor),
        protein: round1(per100g.protein * factor),
        fat: round1(per100g.fat * factor),
        carbs: round1(per100g.carbs * factor),
      },
    };
  }
}

/**
 * Parse catalog JSON content.
 */
export function parseCatalog(raw: unknown): Food[] {
  const result = catalogFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(
      `Invalid food catalog: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`
    );
  }
  return result.data.foods;
}

/**
 * Load the catalog file.
 */
export async function loadFoodCatalog(path: string, matchThreshold?: number): Promise<FoodCatalog> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read food catalog ${path}: ${message}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Food catalog ${path} is not valid JSON: ${message}`);
  }
  return new FoodCatalog(parseCatalog(raw), matchThreshold);
}
