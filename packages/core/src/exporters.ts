import type { AttributeValue, ExportFormat, Span } from "@spanscope/contracts";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["json", "jaeger", "otel"];

export function parseExportFormat(value: string): ExportFormat | null {
  const normalized = value.trim().toLowerCase();
  if (normalized === "otlp") return "otel";
  return EXPORT_FORMATS.find((format) => format === normalized) ?? null;
}

function spanRecord(span: Span): Record<string, unknown> {
  return {
    Name: span.name,
    StartTime: span.startTime,
    EndTime: span.endTime,
    SpanContext: { TraceID: span.traceId, SpanID: span.spanId },
    Parent: { TraceID: span.traceId, SpanID: span.parentSpanId },
    Attributes: span.attributes.map((attribute) => ({ Key: attribute.key, Value: { Value: attribute.value } })),
    Status: { Code: span.status.code, Description: span.status.description },
  };
}

function otlpValue(value: AttributeValue): Record<string, AttributeValue> {
  if (typeof value === "boolean") return { boolValue: value };
  if (typeof value === "number") return Number.isInteger(value) ? { intValue: value } : { doubleValue: value };
  return { stringValue: value };
}

function toJaeger(spans: Span[]): Record<string, unknown> {
  return {
    traceID: spans[0]?.traceId ?? "",
    spans: spans.map((span) => ({
      traceID: span.traceId,
      spanID: span.spanId,
      parentSpanID: span.parentSpanId,
      operationName: span.name,
      startTime: span.startTime,
      endTime: span.endTime,
      tags: span.attributes.map((attribute) => ({ key: attribute.key, value: attribute.value })),
    })),
  };
}

function toOtel(spans: Span[]): Record<string, unknown> {
  return {
    resourceSpans: [
      {
        resource: {
          attributes: [{ key: "service.name", value: { stringValue: "spanscope" } }],
        },
        scopeSpans: [
          {
            scope: { name: "spanscope" },
            spans: spans.map((span) => ({
              traceId: span.traceId,
              spanId: span.spanId,
              parentSpanId: span.parentSpanId,
              name: span.name,
              startTime: span.startTime,
              endTime: span.endTime,
              attributes: span.attributes.map((attribute) => ({
                key: attribute.key,
                value: otlpValue(attribute.value),
              })),
              status: { code: span.status.code, message: span.status.description },
            })),
          },
        ],
      },
    ],
  };
}

/** Loose Jaeger-like and OTLP-like shapes; neither is checked against a collector. */
export function exportSpans(spans: Span[], format: ExportFormat): unknown {
  switch (format) {
    case "json":
      return spans.map(spanRecord);
    case "jaeger":
      return toJaeger(spans);
    case "otel":
      return toOtel(spans);
  }
}

export function exportSpansText(spans: Span[], format: ExportFormat): string {
  return JSON.stringify(exportSpans(spans, format), null, 2);
}
