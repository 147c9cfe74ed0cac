/** Calendar date as YYYY-MM-DD in local time. */
export type IsoDate = string;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): value is IsoDate {
  return ISO_DATE.test(value);
}

export function toIsoDate(date: Date): IsoDate {
  const y = String(date.getFullYear()).padStart(4, "0");
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/** "2024-03-14" -> "2024-03" */
export function yearMonth(date: IsoDate): string {
  return date.slice(0, 7);
}

export function isSameMonth(a: IsoDate, b: IsoDate): boolean {
  return yearMonth(a) === yearMonth(b);
}
