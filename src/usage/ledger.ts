import type { PricingConfig } from "../config/types.js";
import { eventCost, historyCost, imageTier, roundTo } from "./cost.js";
import { yearMonth, type IsoDate } from "./dates.js";
import { applyCost, costAsOf } from "./periods.js";
import type {
  CostSnapshot,
  DayMonth,
  ImageCounts,
  TranscriptionDuration,
  UsageEvent,
  UsageRecord,
} from "./types.js";

function sumValues(series: Record<IsoDate, number>): number {
  return Object.values(series).reduce((sum, value) => sum + value, 0);
}

function dayAndMonth<V>(
  series: Record<IsoDate, V>,
  today: IsoDate,
  measure: (value: V) => number,
): DayMonth {
  const month = yearMonth(today);
  let total = 0;
  for (const [date, value] of Object.entries(series)) {
    if (date.startsWith(month)) total += measure(value);
  }
  const entry = series[today];
  return { today: entry === undefined ? 0 : measure(entry), month: total };
}

function splitMinutes(totalSeconds: number): [number, number] {
  const minutes = Math.floor(totalSeconds / 60);
  return [minutes, roundTo(totalSeconds - minutes * 60, 2)];
}

/**
 * Usage and cost record of one identity. Pure in-memory state; persistence
 * and locking belong to {@link LedgerRegistry}.
 */
export class UsageLedger {
  private constructor(
    readonly identity: string,
    private readonly record: UsageRecord,
    private readonly pricing: PricingConfig,
  ) {}

  static create(
    identity: string,
    displayName: string,
    today: IsoDate,
    pricing: PricingConfig,
  ): UsageLedger {
    return new UsageLedger(
      identity,
      {
        user_name: displayName,
        current_cost: { day: 0, month: 0, all_time: 0, last_update: today },
        usage_history: { chat_tokens: {}, transcription_seconds: {}, number_images: {} },
      },
      pricing,
    );
  }

  static fromRecord(identity: string, record: UsageRecord, pricing: PricingConfig): UsageLedger {
    return new UsageLedger(identity, structuredClone(record), pricing);
  }

  get displayName(): string {
    return this.record.user_name;
  }

  get lastUpdate(): IsoDate {
    return this.record.current_cost.last_update;
  }

  /**
   * Prices the event, folds it into the running totals and adds it to the
   * dated history. Throws {@link InvalidInputError} before touching any state.
   */
  apply(event: UsageEvent, today: IsoDate): number {
    const cost = eventCost(event, this.pricing);
    // Must run before the history update so the new event is not counted twice.
    const allTimeBase = this.record.current_cost.all_time ?? this.initializeAllTimeCost();
    this.record.current_cost = applyCost(this.record.current_cost, cost, today, allTimeBase);

    const history = this.record.usage_history;
    switch (event.kind) {
      case "chat":
        history.chat_tokens[today] = (history.chat_tokens[today] ?? 0) + event.tokens;
        break;
      case "transcription":
        history.transcription_seconds[today] =
          (history.transcription_seconds[today] ?? 0) + event.seconds;
        break;
      case "image": {
        const counts: ImageCounts = history.number_images[today] ?? [0, 0, 0];
        counts[imageTier(event.size)] += 1;
        history.number_images[today] = counts;
        break;
      }
    }
    return cost;
  }

  addChatTokens(tokens: number, today: IsoDate): number {
    return this.apply({ kind: "chat", tokens }, today);
  }

  addTranscriptionSeconds(seconds: number, today: IsoDate): number {
    return this.apply({ kind: "transcription", seconds }, today);
  }

  addImageRequest(size: string, today: IsoDate): number {
    return this.apply({ kind: "image", size }, today);
  }

  getCurrentCost(today: IsoDate): CostSnapshot {
    const { day, month } = costAsOf(this.record.current_cost, today);
    return {
      costToday: day,
      costMonth: month,
      costAllTime: this.record.current_cost.all_time ?? this.initializeAllTimeCost(),
    };
  }

  /** Total cost of the entire history at the configured prices. */
  initializeAllTimeCost(): number {
    const history = this.record.usage_history;
    const images: ImageCounts = [0, 0, 0];
    for (const counts of Object.values(history.number_images)) {
      images[0] += counts[0];
      images[1] += counts[1];
      images[2] += counts[2];
    }
    return historyCost(
      {
        tokens: sumValues(history.chat_tokens),
        seconds: sumValues(history.transcription_seconds),
        images,
      },
      this.pricing,
    );
  }

  getTokenUsage(today: IsoDate): DayMonth {
    return dayAndMonth(this.record.usage_history.chat_tokens, today, (tokens) => tokens);
  }

  getImageCount(today: IsoDate): DayMonth {
    return dayAndMonth(
      this.record.usage_history.number_images,
      today,
      (counts) => counts[0] + counts[1] + counts[2],
    );
  }

  getTranscriptionDuration(today: IsoDate): TranscriptionDuration {
    const seconds = dayAndMonth(
      this.record.usage_history.transcription_seconds,
      today,
      (value) => value,
    );
    const [minutesToday, secondsToday] = splitMinutes(seconds.today);
    const [minutesMonth, secondsMonth] = splitMinutes(seconds.month);
    return { minutesToday, secondsToday, minutesMonth, secondsMonth };
  }

  toRecord(): UsageRecord {
    return structuredClone(this.record);
  }
}
