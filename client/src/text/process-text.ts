/**
 * Module `client/src/text/process-text.ts`: rewrite server-rendered raw values into display text.
 */

import type { FormatKind, Formatters, RawValue } from "../types/display";
import { formatYoutubeDate, formatYoutubeDayDate } from "./formatters";

export interface ProcessTextOptions {
  nowMs?: number;
  invalidPlaceholder?: string;
}

type KindFormatter = (value: number, formatters: Formatters, nowMs: number) => string;

const KIND_FORMATTERS: Record<FormatKind, KindFormatter> = {
  "compact-number": (value, formatters) => formatters.compactNumber.format(value),
  number: (value, formatters) => formatters.number.format(value),
  "youtube-date": (value, formatters, nowMs) => formatYoutubeDate(value, formatters, nowMs),
  "youtube-day-date": (value, formatters) => formatYoutubeDayDate(value, formatters),
};

export const FORMAT_KINDS: readonly FormatKind[] = [
  "compact-number",
  "number",
  "youtube-date",
  "youtube-day-date",
];

// Server timestamps may carry a fractional part ("1718452800.0"); it is dropped.
const NUMBER_PATTERN = /^[+-]?\d+(\.\d*)?$/;

/**
 * Handle parse raw value.
 */
export function parseRawValue(element: Element): RawValue {
  const raw = element.getAttribute("raw");
  if (raw === null) return { ok: false, reason: "missing", raw };
  const trimmed = raw.trim();
  if (!NUMBER_PATTERN.test(trimmed)) return { ok: false, reason: "not-a-number", raw };
  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) return { ok: false, reason: "not-a-number", raw };
  return { ok: true, value };
}

/**
 * Handle process text.
 * Returns how many elements of this kind were rewritten.
 */
export function processText(
  root: ParentNode,
  kind: FormatKind,
  formatters: Formatters,
  options: ProcessTextOptions = {}
): number {
  const nowMs = options.nowMs ?? Date.now();
  const placeholder = options.invalidPlaceholder ?? "?";
  const format = KIND_FORMATTERS[kind];
  const elements = collect(root, `.${kind}`);

  for (const element of elements) {
    const prefix = element.getAttribute("prefix") ?? "";
    const suffix = element.getAttribute("suffix") ?? "";
    const parsed = parseRawValue(element);
    let text = placeholder;
    if (parsed.ok) {
      text = format(parsed.value, formatters, nowMs);
    } else {
      console.warn(`[format] ${kind}: ${parsed.reason} raw value`, parsed.raw);
    }
    element.textContent = prefix + text + suffix;
  }
  return elements.length;
}

/**
 * Handle process all text.
 */
export function processAllText(
  root: ParentNode,
  formatters: Formatters,
  options: ProcessTextOptions = {}
): number {
  const resolved = { ...options, nowMs: options.nowMs ?? Date.now() };
  let total = 0;
  for (const kind of FORMAT_KINDS) {
    total += processText(root, kind, formatters, resolved);
  }
  return total;
}

function collect(root: ParentNode, selector: string): Element[] {
  const found = Array.from(root.querySelectorAll(selector));
  if (root instanceof Element && root.matches(selector)) {
    found.unshift(root);
  }
  return found;
}
