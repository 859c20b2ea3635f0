/**
 * Module `client/src/text/formatters.ts`: locale-bound number and date formatting.
 */

import type { AbsoluteDateStyle, AgeTier, Formatters } from "../types/display";

export interface FormatterOptions {
  locale: string;
  timeZone?: string;
}

/**
 * Handle create formatters.
 * Built once at startup; every formatting call receives the result.
 */
export function createFormatters({ locale, timeZone }: FormatterOptions): Formatters {
  const zone = timeZone ? { timeZone } : {};
  return Object.freeze({
    locale,
    compactNumber: new Intl.NumberFormat(locale, { notation: "compact" }),
    number: new Intl.NumberFormat(locale),
    year: new Intl.DateTimeFormat(locale, { ...zone, year: "numeric" }),
    monthYear: new Intl.DateTimeFormat(locale, { ...zone, month: "short", year: "numeric" }),
    dayMonthYear: new Intl.DateTimeFormat(locale, {
      ...zone,
      day: "numeric",
      month: "short",
      year: "numeric",
    }),
    today: new Intl.DateTimeFormat(locale, { ...zone, hour: "numeric", minute: "numeric" }),
    future: new Intl.DateTimeFormat(locale, {
      ...zone,
      month: "short",
      day: "numeric",
      hour: "numeric",
      minute: "numeric",
    }),
    relative: new Intl.RelativeTimeFormat(locale, { numeric: "auto", style: "short" }),
  });
}

/**
 * Handle describe age.
 * Thresholds are inclusive lower bounds, checked from the largest unit down.
 */
export function describeAge(timestampSeconds: number, nowMs: number): AgeTier {
  const secondsAgo = (nowMs - timestampSeconds * 1000) / 1000;
  const minutesAgo = Math.floor(secondsAgo / 60);
  const hoursAgo = Math.floor(minutesAgo / 60);
  const daysAgo = Math.floor(hoursAgo / 24);

  if (daysAgo >= 365) return absolute("year");
  if (daysAgo >= 31) return absolute("monthYear");
  if (daysAgo >= 3) return absolute("dayMonthYear");
  if (daysAgo >= 1) return { kind: "relative", unit: "day", value: -daysAgo };
  if (hoursAgo >= 1) return { kind: "relative", unit: "hour", value: -hoursAgo };
  if (minutesAgo >= 1) return { kind: "relative", unit: "minute", value: -minutesAgo };
  if (secondsAgo >= 0) {
    return { kind: "relative", unit: "second", value: -Math.floor(secondsAgo) };
  }
  if (daysAgo >= -1) return absolute("today");
  return absolute("future");
}

export function formatYoutubeDate(
  timestampSeconds: number,
  formatters: Formatters,
  nowMs: number = Date.now()
): string {
  const tier = describeAge(timestampSeconds, nowMs);
  if (tier.kind === "relative") {
    return formatters.relative.format(tier.value, tier.unit);
  }
  return formatters[tier.style].format(new Date(timestampSeconds * 1000));
}

export function formatYoutubeDayDate(timestampSeconds: number, formatters: Formatters): string {
  return formatters.dayMonthYear.format(new Date(timestampSeconds * 1000));
}

function absolute(style: AbsoluteDateStyle): AgeTier {
  return { kind: "absolute", style };
}
