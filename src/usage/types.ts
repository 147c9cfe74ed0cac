import type { IsoDate } from "./dates.js";

export const IMAGE_SIZES = ["256x256", "512x512", "1024x1024"] as const;

export type ImageSize = (typeof IMAGE_SIZES)[number];

/** Index into a per-day image count vector: small, medium, large. */
export type ImageTier = 0 | 1 | 2;

export type ImageCounts = [number, number, number];

export type UsageEvent =
  | { readonly kind: "chat"; readonly tokens: number }
  | { readonly kind: "transcription"; readonly seconds: number }
  | { readonly kind: "image"; readonly size: string };

export interface CurrentCost {
  day: number;
  month: number;
  /** Absent in records written before all-time tracking existed. */
  all_time?: number;
  last_update: IsoDate;
}

export interface UsageHistory {
  chat_tokens: Record<IsoDate, number>;
  transcription_seconds: Record<IsoDate, number>;
  number_images: Record<IsoDate, ImageCounts>;
}

/** On-disk shape of one identity's ledger. */
export interface UsageRecord {
  user_name: string;
  current_cost: CurrentCost;
  usage_history: UsageHistory;
}

export interface CostSnapshot {
  readonly costToday: number;
  readonly costMonth: number;
  readonly costAllTime: number;
}

export interface TranscriptionDuration {
  readonly minutesToday: number;
  readonly secondsToday: number;
  readonly minutesMonth: number;
  readonly secondsMonth: number;
}

export interface DayMonth {
  readonly today: number;
  readonly month: number;
}

export interface UsageReport {
  readonly identity: string;
  readonly displayName: string;
  readonly date: IsoDate;
  readonly cost: CostSnapshot;
  readonly chatTokens: DayMonth;
  readonly images: DayMonth;
  readonly transcription: TranscriptionDuration;
}
