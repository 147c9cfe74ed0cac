import { parseConfig } from "../../src/config/schema.js";
import type { BudgetConfig, PricingConfig, TokentabConfig } from "../../src/config/types.js";

export const PRICING: PricingConfig = {
  tokenPrice: 0.002,
  transcriptionPrice: 0.006,
  imagePrices: [0.016, 0.018, 0.02],
};

export function makeConfig(budget: Partial<BudgetConfig> = {}): TokentabConfig {
  const base = parseConfig({});
  return { ...base, pricing: PRICING, budget: { ...base.budget, ...budget } };
}

export interface TestClock {
  now: () => Date;
  set(year: number, month: number, day: number): void;
}

/** Clock fixed at local noon of the given date; `set` moves it. */
export function makeClock(year: number, month: number, day: number): TestClock {
  let current = new Date(year, month - 1, day, 12);
  return {
    now: () => current,
    set(y, m, d) {
      current = new Date(y, m - 1, d, 12);
    },
  };
}
