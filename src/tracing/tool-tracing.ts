/**
 * tool-tracing.ts - OpenTelemetry spans around operations and MCP tool calls
 *
 * What this file does:
 * Provides wrapper functions that run a piece of work inside a span with
 * timing, input attributes, and success/failure info. Pipeline operations use
 * traceOperation(); MCP tool handlers are wrapped with withToolTracing().
 *
 * Error handling:
 * - Thrown errors: recorded with span.recordException(), status ERROR, rethrown
 * - Tool results with isError: true: status stays OK (the tool ran and
 *   reported a structured error to its caller)
 */

import { randomUUID } from "crypto";
import {
  SpanKind,
  SpanStatusCode,
  context,
  trace,
  type Attributes,
  type Span,
} from "@opentelemetry/api";
import { getTracer } from "./index";

/**
 * MCP tool result with isError flag - used to check tool success.
 * We only need the isError property for tracing; the rest passes through.
 */
interface ResultWithError {
  isError?: boolean;
}

/**
 * Runs `fn` inside a span named `name`.
 *
 * The span is made active with context.with() so spans started by nested
 * operations (a search inside a tool call) become its children.
 *
 * @param name - Span name, e.g. "reconcile" or "index_all"
 * @param attributes - Operation arguments recorded on the span
 * @param fn - The work; receives the span so it can add result attributes
 */
export async function traceOperation<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = getTracer().startSpan(name, {
    kind: SpanKind.INTERNAL,
    attributes,
  });
  const activeContext = trace.setSpan(context.active(), span);

  return context.with(activeContext, async () => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const exception = error instanceof Error ? error : new Error(String(error));
      span.recordException(exception);
      span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Wraps an MCP tool handler with OpenTelemetry tracing.
 *
 * Creates a span for each tool invocation with:
 * - Span name: "execute_tool {toolName}"
 * - Attributes: tool name, a unique call id, and the JSON arguments
 */
export function withToolTracing<TInput, TResult extends ResultWithError>(
  toolName: string,
  handler: (input: TInput) => Promise<TResult>
): (input: TInput) => Promise<TResult> {
  return (input: TInput) =>
    traceOperation(
      `execute_tool ${toolName}`,
      {
        "tool.name": toolName,
        "tool.call.id": randomUUID(),
        "tool.call.arguments": JSON.stringify(input),
      },
      async (span) => {
        const result = await handler(input);
        span.setAttribute("tool.is_error", result.isError === true);
        return result;
      }
    );
}
