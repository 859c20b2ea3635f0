/**
 * Module `client/src/config.ts`: resolve client settings from build variables and page markup.
 */

export interface ClientEnv {
  VITE_LOCALE?: string;
  VITE_TIME_ZONE?: string;
  VITE_SLIDESHOW_INTERVAL_MS?: string;
  VITE_INVALID_NUMBER_PLACEHOLDER?: string;
}

export interface ClientConfig {
  locale: string;
  timeZone: string | undefined;
  slideshowIntervalMs: number;
  invalidNumberPlaceholder: string;
  liveReload: boolean;
}

export const DEFAULT_SLIDESHOW_INTERVAL_MS = 1000;
export const DEFAULT_INVALID_NUMBER_PLACEHOLDER = "?";
const FALLBACK_LOCALE = "en-US";

/**
 * Handle resolve client config.
 * The page body may override the locale the bundle was built with.
 */
export function resolveClientConfig(
  env: ClientEnv = import.meta.env,
  dataset: DOMStringMap = document.body?.dataset ?? {}
): ClientConfig {
  return {
    locale:
      normalizeLocale(dataset.locale) ??
      normalizeLocale(env.VITE_LOCALE) ??
      normalizeLocale(navigator.language) ??
      FALLBACK_LOCALE,
    timeZone: normalizeTimeZone(env.VITE_TIME_ZONE),
    slideshowIntervalMs:
      normalizeInterval(env.VITE_SLIDESHOW_INTERVAL_MS) ?? DEFAULT_SLIDESHOW_INTERVAL_MS,
    invalidNumberPlaceholder:
      normalizePlaceholder(env.VITE_INVALID_NUMBER_PLACEHOLDER) ??
      DEFAULT_INVALID_NUMBER_PLACEHOLDER,
    liveReload: dataset.liveReload !== undefined && dataset.liveReload !== "false",
  };
}

function normalizeLocale(value?: string | null): string | null {
  const locale = (value ?? "").trim();
  if (!locale) return null;
  try {
    return Intl.getCanonicalLocales(locale)[0] ?? null;
  } catch {
    return null;
  }
}

function normalizeTimeZone(value?: string | null): string | undefined {
  const timeZone = (value ?? "").trim();
  if (!timeZone) return undefined;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return timeZone;
  } catch {
    return undefined;
  }
}

function normalizeInterval(value?: string | null): number | null {
  const parsed = Number((value ?? "").trim());
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

function normalizePlaceholder(value?: string | null): string | null {
  const placeholder = (value ?? "").trim();
  return placeholder ? placeholder : null;
}
