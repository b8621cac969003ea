/**
 * KubeQuery AI - Cost Accountant
 * ==============================
 * Converts token counts into USD using an injected pricing table.
 */

import { DEFAULT_MODEL_PRICING, pricingTableSchema, type PricingTable } from './types';

export class CostAccountant {
  private readonly pricing: PricingTable;

  constructor(pricing: PricingTable = DEFAULT_MODEL_PRICING) {
    this.pricing = Object.freeze({ ...pricing });
  }

  /**
   * USD cost of one call. Unknown models cost 0; negative counts count as 0.
   */
  cost(modelId: string, promptTokens: number, completionTokens: number): number {
    const price = Object.prototype.hasOwnProperty.call(this.pricing, modelId) ? this.pricing[modelId] : undefined;
    if (!price) {
      return 0;
    }

    const promptCost = (Math.max(0, promptTokens) / 1_000_000) * price.prompt;
    const completionCost = (Math.max(0, completionTokens) / 1_000_000) * price.completion;

    return promptCost + completionCost;
  }

  hasModel(modelId: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.pricing, modelId);
  }
}

/**
 * Merge a PRICING_TABLE JSON string over the defaults.
 * Throws when the JSON is invalid or a price is negative.
 */
export function loadPricingTable(raw: string | undefined, defaults: PricingTable = DEFAULT_MODEL_PRICING): PricingTable {
  if (!raw) {
    return defaults;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`PRICING_TABLE is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  return { ...defaults, ...pricingTableSchema.parse(parsed) };
}
