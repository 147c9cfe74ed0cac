import { z } from "zod";
import type { TokentabConfig } from "./types.js";

// Env-substituted values arrive as "1,2,3"; "*" and "-" are sentinels.
function splitList(value: unknown): unknown {
  if (typeof value !== "string" || value === "*" || value === "-") return value;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const userIdSchema = z
  .union([z.string().min(1), z.number().int()])
  .transform((id) => String(id).trim());

const priceSchema = z.coerce.number().nonnegative();

const pricingSchema = z.object({
  tokenPrice: priceSchema.default(0.002),
  transcriptionPrice: priceSchema.default(0.006),
  imagePrices: z
    .preprocess(splitList, z.tuple([priceSchema, priceSchema, priceSchema]))
    .default([0.016, 0.018, 0.02]),
});

const budgetSchema = z.object({
  period: z.enum(["daily", "monthly", "all-time"]).default("monthly"),
  allowedUserIds: z
    .preprocess(splitList, z.union([z.literal("*"), z.array(userIdSchema)]))
    .default("*"),
  adminUserIds: z
    .preprocess(splitList, z.union([z.literal("-"), z.array(userIdSchema)]))
    .default("-"),
  userBudgets: z
    .preprocess(splitList, z.union([z.literal("*"), z.array(priceSchema)]))
    .default("*"),
  guestBudget: priceSchema.default(100),
});

const usageSchema = z.object({
  logsDir: z.string().min(1).optional(),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).optional(),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const tokentabConfigSchema = z.object({
  pricing: pricingSchema.default({}),
  budget: budgetSchema.default({}),
  usage: usageSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): TokentabConfig {
  return tokentabConfigSchema.parse(raw);
}
