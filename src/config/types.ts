export type BudgetPeriod = "daily" | "monthly" | "all-time";

export interface TokentabConfig {
  readonly pricing: PricingConfig;
  readonly budget: BudgetConfig;
  readonly usage: UsageConfig;
  readonly logging?: LoggingConfig;
}

export interface PricingConfig {
  /** USD per 1000 chat tokens */
  readonly tokenPrice: number;
  /** USD per minute of transcribed audio */
  readonly transcriptionPrice: number;
  /** USD per image for the 256x256, 512x512 and 1024x1024 tiers */
  readonly imagePrices: readonly [number, number, number];
}

export interface BudgetConfig {
  readonly period: BudgetPeriod;
  readonly allowedUserIds: "*" | readonly string[];
  readonly adminUserIds: "-" | readonly string[];
  readonly userBudgets: "*" | readonly number[];
  readonly guestBudget: number;
}

export interface UsageConfig {
  readonly logsDir?: string;
}

export interface LoggingConfig {
  /** Unset means each entry point picks its own default. */
  readonly level?: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
