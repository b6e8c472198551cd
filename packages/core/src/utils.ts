import os from "node:os";
import path from "node:path";

const RFC3339_PATTERN = /^\d{4}-\d{2}-\d{2}[Tt]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:[Zz]|[+-]\d{2}:\d{2})$/;

export const ZERO_SPAN_ID = "0000000000000000";

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

export function asString(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function isRootParentId(parentId: string): boolean {
  return parentId === "" || parentId === ZERO_SPAN_ID;
}

/**
 * Parses an RFC3339 timestamp (optional fractional seconds, `Z` or numeric offset).
 * Returns epoch milliseconds, or null for anything else, including the looser
 * formats `Date.parse` would otherwise accept.
 */
export function parseRfc3339(value: string): number | null {
  const trimmed = value.trim();
  if (!RFC3339_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}

export function durationBetween(startTime: string, endTime: string): number {
  if (!startTime || !endTime) return 0;
  const start = parseRfc3339(startTime);
  if (start === null) return 0;
  const end = parseRfc3339(endTime);
  if (end === null) return 0;
  return Math.trunc(end - start);
}

/** Counts and cuts by code point so a surrogate pair is never split. */
export function truncateText(text: string, maxLen: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLen) {
    return text;
  }
  return `${chars.slice(0, Math.max(0, maxLen - 3)).join("")}...`;
}
