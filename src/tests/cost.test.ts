/**
 * Cost accountant tests
 */

import { describe, it, expect } from 'vitest';
import { CostAccountant, loadPricingTable } from '@/ai/llm/cost';
import { DEFAULT_MODEL_PRICING } from '@/ai/llm/types';

describe('CostAccountant', () => {
  const accountant = new CostAccountant({ 'test-model': { prompt: 2, completion: 8 } });

  it('costs nothing for zero tokens', () => {
    expect(accountant.cost('test-model', 0, 0)).toBe(0);
  });

  it('prices tokens per million', () => {
    expect(accountant.cost('test-model', 1_000_000, 0)).toBe(2);
    expect(accountant.cost('test-model', 0, 1_000_000)).toBe(8);
    expect(accountant.cost('test-model', 500_000, 250_000)).toBeCloseTo(3, 10);
  });

  it('never decreases when either count grows', () => {
    const base = accountant.cost('test-model', 1000, 1000);
    expect(accountant.cost('test-model', 1001, 1000)).toBeGreaterThan(base);
    expect(accountant.cost('test-model', 1000, 1001)).toBeGreaterThan(base);
  });

  it('reports unknown models at zero cost', () => {
    expect(accountant.cost('unpriced-model', 1000, 1000)).toBe(0);
    expect(accountant.hasModel('unpriced-model')).toBe(false);
    expect(accountant.cost('toString', 1000, 1000)).toBe(0);
  });

  it('treats negative counts as zero', () => {
    expect(accountant.cost('test-model', -50, 1_000_000)).toBe(8);
  });

  it('uses the default table when none is given', () => {
    expect(new CostAccountant().cost('gpt-4o', 1_000_000, 1_000_000)).toBe(12.5);
  });
});

describe('loadPricingTable', () => {
  it('returns the defaults when unset', () => {
    expect(loadPricingTable(undefined)).toBe(DEFAULT_MODEL_PRICING);
  });

  it('merges overrides over the defaults', () => {
    const table = loadPricingTable('{"gpt-4o":{"prompt":1,"completion":2},"local":{"prompt":0,"completion":0}}');

    expect(table['gpt-4o']).toEqual({ prompt: 1, completion: 2 });
    expect(table['local']).toEqual({ prompt: 0, completion: 0 });
    expect(table['gpt-4o-mini']).toEqual({ prompt: 0.15, completion: 0.6 });
  });

  it('rejects invalid JSON', () => {
    expect(() => loadPricingTable('{not json')).toThrow(/^PRICING_TABLE is not valid JSON/);
  });

  it('rejects negative prices', () => {
    expect(() => loadPricingTable('{"m":{"prompt":-1,"completion":1}}')).toThrow();
  });
});
