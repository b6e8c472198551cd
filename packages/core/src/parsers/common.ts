import { asRecord } from "../utils.js";

function parseJsonObject(line: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return null;
  }
  return asRecord(parsed);
}

/** Parses JSONL text into its object records, skipping blank, malformed and non-object lines. */
export function parseJsonLines(text: string | string[]): Array<Record<string, unknown>> {
  const lines = typeof text === "string" ? text.split(/\r?\n/) : text;
  const out: Array<Record<string, unknown>> = [];
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const record = parseJsonObject(trimmed);
    if (record) out.push(record);
  }
  return out;
}

const NEWLINE = 0x0a;

/**
 * Splits bytes read from a growing JSONL file at the last newline. Only the complete
 * records are decoded; `consumedBytes` stops short of the unfinished tail, so a record
 * (or a multi-byte character) cut by a concurrent write is read whole next time.
 */
export function splitCompleteJsonlBytes(chunk: Buffer): { completeText: string; consumedBytes: number } {
  const lastNewline = chunk.lastIndexOf(NEWLINE);
  if (lastNewline < 0) {
    return { completeText: "", consumedBytes: 0 };
  }
  return {
    completeText: chunk.subarray(0, lastNewline + 1).toString("utf8"),
    consumedBytes: lastNewline + 1,
  };
}
