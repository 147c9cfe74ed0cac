import { isSameMonth, type IsoDate } from "./dates.js";
import type { CurrentCost } from "./types.js";

export type RolloverKind = "same-day" | "same-month" | "new-month";

export function classifyRollover(lastUpdate: IsoDate, today: IsoDate): RolloverKind {
  if (today === lastUpdate) return "same-day";
  if (isSameMonth(today, lastUpdate)) return "same-month";
  return "new-month";
}

/**
 * Folds one event's cost into the running totals. `allTimeBase` is the
 * all-time total before this event; callers compute it from history when the
 * record has none yet.
 */
export function applyCost(
  current: CurrentCost,
  cost: number,
  today: IsoDate,
  allTimeBase: number,
): CurrentCost {
  const next: CurrentCost = {
    day: current.day,
    month: current.month,
    all_time: allTimeBase + cost,
    last_update: today,
  };

  switch (classifyRollover(current.last_update, today)) {
    case "same-day":
      next.day += cost;
      next.month += cost;
      break;
    case "same-month":
      next.day = cost;
      next.month += cost;
      break;
    case "new-month":
      next.day = cost;
      next.month = cost;
      break;
  }

  return next;
}

/** Day and month totals as of `today`, without mutating the cache. */
export function costAsOf(current: CurrentCost, today: IsoDate): { day: number; month: number } {
  switch (classifyRollover(current.last_update, today)) {
    case "same-day":
      return { day: current.day, month: current.month };
    case "same-month":
      return { day: 0, month: current.month };
    case "new-month":
      return { day: 0, month: 0 };
  }
}
