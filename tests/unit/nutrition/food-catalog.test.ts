import { describe, it, expect } from 'vitest';
import {
  FoodCatalog,
  loadFoodCatalog,
  normalizeName,
  parseCatalog,
  similarity,
  type Food,
} from '../../../src/nutrition/food-catalog.js';
import { ConfigError } from '../../../src/core/errors.js';

const FOODS: Food[] = [
  {
    name: 'rice',
    aliases: ['white rice'],
    per100g: { calories: 130, protein: 2.7, fat: 0.3, carbs: 28.2 },
    portions: { cup: 158 },
  },
  {
    name: 'egg',
    aliases: ['eggs'],
    per100g: { calories: 155, protein: 12.6, fat: 10.6, carbs: 1.1 },
    portions: { piece: 50 },
  },
  {
    name: 'milk',
    aliases: [],
    per100g: { calories: 61, protein: 3.2, fat: 3.3, carbs: 4.8 },
    density: 1.03,
    portions: {},
  },
];

describe('normalizeName', () => {
  it('lowercases, strips punctuation and stopwords', () => {
    expect(normalizeName('Some of THE Rice!')).toBe('rice');
    expect(normalizeName('  Chicken-Breast ')).toBe('chicken breast');
  });
});

describe('similarity', () => {
  it('is 1 for identical strings and 0 for empty ones', () => {
    expect(similarity('rice', 'rice')).toBe(1);
    expect(similarity('', 'rice')).toBe(0);
  });

  it('scales edit distance by the longer string', () => {
    expect(similarity('ryce', 'rice')).toBe(0.75);
  });
});

describe('FoodCatalog', () => {
  const catalog = new FoodCatalog(FOODS, 0.8);

  it('matches names, aliases and near misses above the threshold', () => {
    expect(catalog.match('Rice')?.food.name).toBe('rice');
    expect(catalog.match('eggs')?.food.name).toBe('egg');
    expect(catalog.match('white rce')?.food.name).toBe('rice');
  });

  it('returns null below the threshold', () => {
    expect(catalog.match('ryce')).toBeNull();
    expect(catalog.match('pizza')).toBeNull();
    expect(catalog.match('the')).toBeNull();
  });

  it('scales per-100 g values by weight', () => {
    expect(catalog.resolve('rice', { amount: 200, unit: 'g' })).toEqual({
      matchedName: 'rice',
      grams: 200,
      nutrients: { calories: 260, protein: 5.4, fat: 0.6, carbs: 56.4 },
    });
  });

  it('counts a bare number as pieces when the food has a piece weight', () => {
    expect(catalog.resolve('eggs', { amount: 2, unit: null })).toEqual({
      matchedName: 'egg',
      grams: 100,
      nutrients: { calories: 155, protein: 12.6, fat: 10.6, carbs: 1.1 },
    });
  });

  it('counts a bare number as grams otherwise', () => {
    expect(catalog.resolve('rice', { amount: 150, unit: null })?.nutrients.calories).toBe(195);
  });

  it('uses portion weights', () => {
    expect(catalog.resolve('rice', { amount: 1, unit: 'cup' })?.grams).toBe(158);
  });

  it('converts volume through density', () => {
    const result = catalog.resolve('milk', { amount: 1, unit: 'cup' });
    expect(result?.grams).toBe(247.2);
    expect(result?.nutrients.calories).toBe(150.8);
  });

  it('cannot weigh a volume without density', () => {
    expect(catalog.resolve('rice', { amount: 1, unit: 'l' })).toBeNull();
  });

  it('cannot weigh a portion the food does not define', () => {
    expect(catalog.resolve('milk', { amount: 1, unit: 'slice' })).toBeNull();
  });
});

describe('parseCatalog', () => {
  it('fills defaults for aliases and portions', () => {
    const foods = parseCatalog({
      version: 1,
      foods: [{ name: 'tofu', per100g: { calories: 76, protein: 8, fat: 4.8, carbs: 1.9 } }],
    });
    expect(foods[0]?.aliases).toEqual([]);
    expect(foods[0]?.portions).toEqual({});
  });

  it('rejects invalid content', () => {
    expect(() => parseCatalog({ version: 1, foods: [{ name: '' }] })).toThrow(ConfigError);
    expect(() => parseCatalog([])).toThrow(ConfigError);
  });
});

describe('loadFoodCatalog', () => {
  it('loads the bundled catalog', async () => {
    const catalog = await loadFoodCatalog('data/foods.json');
    expect(catalog.size).toBe(44);
    expect(catalog.resolve('bread', { amount: 2, unit: 'slice' })?.nutrients.calories).toBe(159);
  });

  it('fails with ConfigError for a missing file', async () => {
    await expect(loadFoodCatalog('data/does-not-exist.json')).rejects.toBeInstanceOf(ConfigError);
  });
});
