/**
 * Display mappings for validated field values. Fixed at startup, never mutated.
 */

import type { StatusCode } from "@shared/schema";

// Typed over StatusCode so a status added to the enum without a symbol fails to compile.
export const STATUS_SYMBOLS: Readonly<Record<StatusCode, string>> = Object.freeze({
  OK: "✅",
  ATTN: "⚠️",
  FAIL: "❌",
  TBD: "TBD",
  FYI: "FYI",
});

export const REGION_FALLBACK_FLAG = "\u{1F310}"; // 🌐

// Canonical keys are the single source of truth; aliases below point at them.
export const REGION_FLAGS: Readonly<Record<string, string>> = Object.freeze({
  USA: "\u{1F1FA}\u{1F1F8}", // 🇺🇸
  EU: "\u{1F1EA}\u{1F1FA}", // 🇪🇺
  UK: "\u{1F1EC}\u{1F1E7}", // 🇬🇧
  CA: "\u{1F1E8}\u{1F1E6}", // 🇨🇦
  AU: "\u{1F1E6}\u{1F1FA}", // 🇦🇺
  OTHER: REGION_FALLBACK_FLAG,
});

export const REGION_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  US: "USA",
  "UNITED STATES": "USA",
  "EUROPEAN UNION": "EU",
  "UNITED KINGDOM": "UK",
  GB: "UK",
  "GREAT BRITAIN": "UK",
  CANADA: "CA",
  AUSTRALIA: "AU",
});

export function statusSymbol(code: StatusCode): string {
  return STATUS_SYMBOLS[code];
}

export function yesNo(value: boolean): string {
  return value ? "Yes" : "No";
}

export function checkMark(value: boolean): string {
  return value ? STATUS_SYMBOLS.OK : STATUS_SYMBOLS.FAIL;
}

/** Trim, upper-case, drop periods, then follow the alias table. Idempotent. */
export function canonicalRegionKey(label: string): string {
  const key = label.trim().toUpperCase().replace(/\./g, "");
  return Object.hasOwn(REGION_ALIASES, key) ? REGION_ALIASES[key] : key;
}

export function regionFlag(label: string): string {
  const key = canonicalRegionKey(label);
  return Object.hasOwn(REGION_FLAGS, key) ? REGION_FLAGS[key] : REGION_FALLBACK_FLAG;
}

/** Flag plus the label exactly as supplied. */
export function formatRegion(label: string): string {
  return `${regionFlag(label)} ${label}`.trim();
}

export function formatRegionList(labels: readonly string[]): string {
  return labels.map(formatRegion).join(", ");
}
