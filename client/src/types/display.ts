export type FormatKind = "compact-number" | "number" | "youtube-date" | "youtube-day-date";

export type AbsoluteDateStyle = "year" | "monthYear" | "dayMonthYear" | "today" | "future";

export type RelativeDateUnit = "day" | "hour" | "minute" | "second";

export type AgeTier =
  | { kind: "absolute"; style: AbsoluteDateStyle }
  | { kind: "relative"; unit: RelativeDateUnit; value: number };

export type RawValue =
  | { ok: true; value: number }
  | { ok: false; reason: "missing" | "not-a-number"; raw: string | null };

export interface Formatters {
  readonly locale: string;
  readonly compactNumber: Intl.NumberFormat;
  readonly number: Intl.NumberFormat;
  readonly year: Intl.DateTimeFormat;
  readonly monthYear: Intl.DateTimeFormat;
  readonly dayMonthYear: Intl.DateTimeFormat;
  readonly today: Intl.DateTimeFormat;
  readonly future: Intl.DateTimeFormat;
  readonly relative: Intl.RelativeTimeFormat;
}
