import type { PricingConfig } from "../config/types.js";
import { InvalidInputError } from "./errors.js";
import { IMAGE_SIZES, type ImageCounts, type ImageTier, type UsageEvent } from "./types.js";

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

/** @param tokenPrice USD per 1000 tokens */
export function chatTokenCost(tokens: number, tokenPrice: number): number {
  return roundTo((tokens * tokenPrice) / 1000, 6);
}

/** @param minutePrice USD per minute of audio */
export function transcriptionCost(seconds: number, minutePrice: number): number {
  return roundTo((seconds * minutePrice) / 60, 2);
}

export function imageTier(size: string): ImageTier {
  switch (size) {
    case "256x256":
      return 0;
    case "512x512":
      return 1;
    case "1024x1024":
      return 2;
    default:
      throw new InvalidInputError(
        `Unknown image size "${size}", expected one of ${IMAGE_SIZES.join(", ")}`,
      );
  }
}

export function imageCost(size: string, imagePrices: PricingConfig["imagePrices"]): number {
  return imagePrices[imageTier(size)];
}

function assertQuantity(value: number, label: string, integer: boolean): void {
  if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
    throw new InvalidInputError(
      `${label} must be a non-negative ${integer ? "integer" : "number"}, got ${value}`,
    );
  }
}

export function eventCost(event: UsageEvent, pricing: PricingConfig): number {
  switch (event.kind) {
    case "chat":
      assertQuantity(event.tokens, "tokens", true);
      return chatTokenCost(event.tokens, pricing.tokenPrice);
    case "transcription":
      assertQuantity(event.seconds, "seconds", false);
      return transcriptionCost(event.seconds, pricing.transcriptionPrice);
    case "image":
      return imageCost(event.size, pricing.imagePrices);
  }
}

/**
 * Prices a whole history at once. Token and transcription totals are rounded
 * after summing, the same way a single event of that size would be.
 */
export function historyCost(
  totals: { tokens: number; seconds: number; images: ImageCounts },
  pricing: PricingConfig,
): number {
  const images = totals.images.reduce(
    (sum, count, tier) => sum + count * (pricing.imagePrices[tier] ?? 0),
    0,
  );
  return (
    chatTokenCost(totals.tokens, pricing.tokenPrice) +
    transcriptionCost(totals.seconds, pricing.transcriptionPrice) +
    images
  );
}
