import { EventEmitter } from "node:events";
import { open, stat } from "node:fs/promises";
import type { Span, SpanForest, TraceMetrics } from "@spanscope/contracts";
import { TraceReadError } from "./errors.js";
import { computeTraceMetrics } from "./metrics.js";
import { splitCompleteJsonlBytes } from "./parsers/common.js";
import { parseSpans } from "./parsers/spans.js";
import { buildSpanForest } from "./tree.js";

export interface PollResult {
  spans: Span[];
  /** Byte offset just past the last complete line; an unfinished tail is re-read next poll. */
  offset: number;
  /** The file is now smaller than `lastOffset`. */
  truncated: boolean;
}

export interface LiveTailUpdate {
  added: Span[];
  spans: Span[];
  forest: SpanForest;
  metrics: TraceMetrics;
}

async function readFileChunk(filePath: string, offset: number, length: number): Promise<Buffer> {
  if (length <= 0) return Buffer.alloc(0);
  const fileHandle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(Math.max(0, length));
    const { bytesRead } = await fileHandle.read(buffer, 0, buffer.length, offset);
    return buffer.subarray(0, Math.max(0, bytesRead));
  } finally {
    await fileHandle.close();
  }
}

/**
 * Reads whatever was appended to `filePath` since `lastOffset`. The file is opened
 * read-only for the duration of the call only. A file that has not grown yields no
 * spans and the same offset.
 */
export async function pollTraceFile(filePath: string, lastOffset: number): Promise<PollResult> {
  let size: number;
  try {
    size = (await stat(filePath)).size;
  } catch (error) {
    throw new TraceReadError(filePath, error);
  }

  if (size <= lastOffset) {
    return { spans: [], offset: lastOffset, truncated: size < lastOffset };
  }

  let chunk: Buffer;
  try {
    chunk = await readFileChunk(filePath, lastOffset, size - lastOffset);
  } catch (error) {
    throw new TraceReadError(filePath, error);
  }

  const split = splitCompleteJsonlBytes(chunk);
  return {
    spans: split.completeText ? parseSpans(split.completeText) : [],
    offset: lastOffset + split.consumedBytes,
    truncated: false,
  };
}

/**
 * Follows one trace file. Each poll that finds new spans rebuilds the forest and metrics
 * from the full span list and emits "update"; failures are emitted as "error".
 */
export class LiveTailMonitor extends EventEmitter {
  readonly filePath: string;
  private readonly intervalMs: number;
  private offset = 0;
  private spans: Span[] = [];
  private forest: SpanForest = { nodes: [], roots: [] };
  private metrics: TraceMetrics = computeTraceMetrics(this.forest);
  private timer: NodeJS.Timeout | null = null;
  private started = false;

  constructor(filePath: string, intervalMs = 500) {
    super();
    this.filePath = filePath;
    this.intervalMs = Math.max(25, intervalMs);
  }

  getSpans(): Span[] {
    return this.spans;
  }

  getOffset(): number {
    return this.offset;
  }

  snapshot(): LiveTailUpdate {
    return { added: [], spans: this.spans, forest: this.forest, metrics: this.metrics };
  }

  /** Returns the spans appended by this poll. */
  async poll(): Promise<Span[]> {
    let result = await pollTraceFile(this.filePath, this.offset);
    let reset = false;
    if (result.truncated) {
      reset = true;
      this.spans = [];
      result = await pollTraceFile(this.filePath, 0);
    }

    this.offset = result.offset;
    if (result.spans.length === 0 && !reset) {
      return [];
    }

    this.spans = this.spans.concat(result.spans);
    this.forest = buildSpanForest(this.spans);
    this.metrics = computeTraceMetrics(this.forest);
    const update: LiveTailUpdate = {
      added: result.spans,
      spans: this.spans,
      forest: this.forest,
      metrics: this.metrics,
    };
    this.emit("update", update);
    return result.spans;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.schedule();
  }

  stop(): void {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(): void {
    if (!this.started) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, this.intervalMs);
  }

  private async tick(): Promise<void> {
    try {
      await this.poll();
    } catch (error) {
      this.emit("error", error);
    } finally {
      this.schedule();
    }
  }
}
