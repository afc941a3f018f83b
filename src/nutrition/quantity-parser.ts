/**
 * Quantity parsing for free-text input ("200", "1,5", "1/2", "2 cups", "200g").
 */

import type { Quantity, Unit } from '../types/records.js';
import { UNITS } from '../types/records.js';

const UNIT_ALIASES: Record<Unit, readonly string[]> = {
  g: ['g', 'gr', 'gram', 'grams', 'gramme', 'grammes'],
  kg: ['kg', 'kgs', 'kilo', 'kilos', 'kilogram', 'kilograms'],
  mg: ['mg', 'milligram', 'milligrams'],
  oz: ['oz', 'ounce', 'ounces'],
  lb: ['lb', 'lbs', 'pound', 'pounds'],
  ml: ['ml', 'milliliter', 'milliliters', 'millilitre', 'millilitres'],
  l: ['l', 'liter', 'liters', 'litre', 'litres'],
  cup: ['cup', 'cups'],
  tbsp: ['tbsp', 'tbs', 'tablespoon', 'tablespoons'],
  tsp: ['tsp', 'teaspoon', 'teaspoons'],
  piece: ['piece', 'pieces', 'pc', 'pcs'],
  slice: ['slice', 'slices'],
  serving: ['serving', 'servings', 'portion', 'portions'],
};

const UNIT_BY_ALIAS = new Map<string, Unit>(
  UNITS.flatMap((unit) => UNIT_ALIASES[unit].map((alias): [string, Unit] => [alias, unit]))
);

const QUANTITY_RE = /^(\d+\/\d+|\d+(?:[.,]\d+)?|[.,]\d+)\s*([a-z]+)?\.?$/i;

/**
 * Parse a unit word. Returns null for unknown words.
 */
export function parseUnit(text: string): Unit | null {
  return UNIT_BY_ALIAS.get(text.trim().toLowerCase()) ?? null;
}

function parseAmount(text: string): number | null {
  const fraction = /^(\d+)\/(\d+)$/.exec(text);
  if (fraction?.[1] && fraction[2]) {
    const denominator = Number(fraction[2]);
    return denominator === 0 ? null : Number(fraction[1]) / denominator;
  }
  const normalized = text.replace(',', '.');
  return Number(normalized.startsWith('.') ? `0${normalized}` : normalized);
}

/**
 * Parse a quantity string.
 *
 * Returns null unless the text is a single positive finite number with an
 * optional known unit. Zero is never accepted.
 */
export function parseQuantity(text: string): Quantity | null {
  const match = QUANTITY_RE.exec(text.trim());
  if (!match?.[1]) return null;

  const amount = parseAmount(match[1]);
  if (amount === null || !Number.isFinite(amount) || amount <= 0) return null;

  if (match[2] === undefined) {
    return { amount, unit: null };
  }
  const unit = parseUnit(match[2]);
  return unit ? { amount, unit } : null;
}

/**
 * Split "<quantity> <description>" or "<description> <quantity>".
 *
 * A leading quantity is tried first. Returns null when neither end of the
 * text holds a quantity or nothing is left for the description.
 */
export function splitQuantityAndDescription(
  text: string
): { quantity: Quantity; description: string } | null {
  const tokens = text.trim().split(/\s+/).filter(Boolean);
  if (tokens.length < 2) return null;

  for (const size of [2, 1]) {
    if (tokens.length <= size) continue;

    const leading = parseQuantity(tokens.slice(0, size).join(' '));
    if (leading) {
      const description = cleanDescription(tokens.slice(size).join(' '));
      if (description) return { quantity: leading, description };
    }

    const trailing = parseQuantity(tokens.slice(-size).join(' '));
    if (trailing) {
      const description = cleanDescription(tokens.slice(0, -size).join(' '));
      if (description) return { quantity: trailing, description };
    }
  }

  return null;
}

function cleanDescription(text: string): string {
  return text.replace(/^of\s+/i, '').trim();
}

/**
 * Render a quantity for replies ("200 g", "1.5 cup", "2").
 */
export function formatQuantity(quantity: Quantity): string {
  const amount = Number.isInteger(quantity.amount)
    ? String(quantity.amount)
    : String(Math.round(quantity.amount * 100) / 100);
  return quantity.unit ? `${amount} ${quantity.unit}` : amount;
}
