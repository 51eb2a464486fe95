/**
 * stderr-exporter.ts - Console span exporter that writes to stderr
 *
 * The SDK's ConsoleSpanExporter prints to stdout, which the MCP stdio
 * transport owns: a span printed there corrupts the JSON-RPC stream. This
 * exporter prints the same fields, one JSON object per line, to stderr.
 */

import { ExportResultCode, hrTimeToMicroseconds, type ExportResult } from "@opentelemetry/core";
import type { ReadableSpan, SpanExporter } from "@opentelemetry/sdk-trace-node";

export interface StderrSpanExporterOptions {
  /** Line sink; defaults to process.stderr */
  write?: (line: string) => void;
}

export class StderrSpanExporter implements SpanExporter {
  private readonly write: (line: string) => void;
  private stopped = false;

  constructor(options: StderrSpanExporterOptions = {}) {
    this.write = options.write ?? ((line) => process.stderr.write(line));
  }

  export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
    if (this.stopped) {
      resultCallback({
        code: ExportResultCode.FAILED,
        error: new Error("Exporter has been shut down"),
      });
      return;
    }
    for (const span of spans) {
      this.write(`${JSON.stringify(describeSpan(span))}\n`);
    }
    resultCallback({ code: ExportResultCode.SUCCESS });
  }

  async shutdown(): Promise<void> {
    this.stopped = true;
  }

  async forceFlush(): Promise<void> {}
}

/**
 * The fields ConsoleSpanExporter prints, times in microseconds.
 */
export function describeSpan(span: ReadableSpan) {
  const context = span.spanContext();
  return {
    traceId: context.traceId,
    parentId: span.parentSpanContext?.spanId,
    name: span.name,
    id: context.spanId,
    kind: span.kind,
    timestamp: hrTimeToMicroseconds(span.startTime),
    duration: hrTimeToMicroseconds(span.duration),
    attributes: span.attributes,
    status: span.status,
    events: span.events,
  };
}
