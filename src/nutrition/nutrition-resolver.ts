import type { NutritionPreview, Quantity } from '../types/records.js';
import { UNRESOLVED_NUTRIENTS } from '../types/records.js';
import type { Logger } from '../types/logger.js';
import type { FoodCatalog } from './food-catalog.js';
import type { NutritionEstimator } from './nutrition-estimator.js';

/**
 * Resolves nutrition for a description and quantity: catalog first, then the
 * estimator when one is configured. An unresolved preview has null nutrients.
 */
export class NutritionResolver {
  private readonly catalog: FoodCatalog;
  private readonly estimator: NutritionEstimator | null;
  private readonly logger: Logger;

  constructor(catalog: FoodCatalog, estimator: NutritionEstimator | null, logger: Logger) {
    this.catalog = catalog;
    this.estimator = estimator;
    this.logger = logger.child({ component: 'nutrition-resolver' });
  }

  async resolve(description: string, quantity: Quantity, signal?: AbortSignal): Promise<NutritionPreview> {
    const fromCatalog = this.catalog.resolve(description, quantity);
    if (fromCatalog) {
      return {
        grams: fromCatalog.grams,
        nutrients: fromCatalog.nutrients,
        source: 'catalog',
        matchedName: fromCatalog.matchedName,
      };
    }

    if (this.estimator) {
      const estimate = await this.estimator.estimate(description, quantity, signal);
      if (estimate) {
        return { grams: estimate.grams, nutrients: estimate.nutrients, source: 'estimate', matchedName: null };
      }
    }

    this.logger.debug({ description }, 'Nutrition unresolved');
    return { grams: null, nutrients: { ...UNRESOLVED_NUTRIENTS }, source: null, matchedName: null };
  }
}

export function createNutritionResolver(
  catalog: FoodCatalog,
  estimator: NutritionEstimator | null,
  logger: Logger
): NutritionResolver {
  return new NutritionResolver(catalog, estimator, logger);
}
