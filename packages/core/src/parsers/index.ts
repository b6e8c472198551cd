import { readFile } from "node:fs/promises";
import type { Span } from "@spanscope/contracts";
import { TraceReadError } from "../errors.js";
import { parseSpans } from "./spans.js";

export { parseJsonLines, splitCompleteJsonlBytes } from "./common.js";
export {
  flattenAttributes,
  friendlyName,
  getAttribute,
  importantAttributes,
  isInternalSpan,
  isWorkflowStep,
  parseSpanLine,
  parseSpans,
  spanDurationMs,
  spanFromRecord,
  spanKind,
} from "./spans.js";

export async function readSpanFile(filePath: string): Promise<Span[]> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    throw new TraceReadError(filePath, error);
  }
  return parseSpans(text);
}
