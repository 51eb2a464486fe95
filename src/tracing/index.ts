/**
 * tracing/index.ts - OpenTelemetry initialization for image-scout
 *
 * What this file does:
 * Sets up OpenTelemetry tracing so pipeline runs and searches can be followed
 * span by span: how long a reconciliation took, which step of an index run
 * failed, how many points a payload sync touched.
 *
 * Opt-in by default:
 * Tracing is disabled unless OTEL_TRACING_ENABLED=true. When disabled, the OTel
 * API returns a "no-op" tracer that does nothing.
 *
 * Exporter options:
 * - console (default): Prints spans as JSON lines to stderr, useful for
 *   development; stdout stays free for the MCP stdio transport
 * - otlp: Sends spans via OTLP protocol to a collector (Jaeger, Datadog Agent, etc.)
 *
 * Entry points import this module before anything else, right after dotenv,
 * so the provider is registered before the first span is started.
 */

import { trace, type Tracer } from "@opentelemetry/api";
import { resourceFromAttributes } from "@opentelemetry/resources";
import {
  NodeTracerProvider,
  SimpleSpanProcessor,
  type SpanExporter,
} from "@opentelemetry/sdk-trace-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import { StderrSpanExporter } from "./stderr-exporter";

const SERVICE_NAME = "image-scout";

/**
 * The registered provider, or undefined when tracing is disabled.
 * Kept so shutdownTracing() can flush it.
 */
let provider: NodeTracerProvider | undefined;

/**
 * Create the span exporter named by OTEL_EXPORTER_TYPE.
 *
 * When using "otlp", OTEL_EXPORTER_OTLP_ENDPOINT must be set to the collector
 * URL (e.g. http://localhost:4318). "/v1/traces" is appended if missing.
 */
export function createSpanExporter(
  env: Record<string, string | undefined> = process.env
): SpanExporter {
  const exporterType = env.OTEL_EXPORTER_TYPE || "console";

  if (exporterType === "otlp") {
    const endpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    // Strip trailing slashes to avoid double-slash in URL
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    console.error(`[OTel] Using OTLP exporter → ${base}`);
    return new OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  console.error("[OTel] Using console exporter (stderr)");
  return new StderrSpanExporter();
}

/**
 * Registers a global tracer provider when OTEL_TRACING_ENABLED=true.
 * Calling it again after a successful registration does nothing.
 *
 * SimpleSpanProcessor exports each span as it ends. CLI runs are short and a
 * batching processor would drop spans still queued when the process exits.
 */
export function initTracing(env: Record<string, string | undefined> = process.env): boolean {
  if (provider) return true;
  if (env.OTEL_TRACING_ENABLED !== "true") return false;

  // Status lines go to stderr: stdout belongs to the MCP stdio transport.
  console.error("[OTel] Initializing OpenTelemetry tracing...");

  provider = new NodeTracerProvider({
    resource: resourceFromAttributes({ "service.name": SERVICE_NAME }),
    spanProcessors: [new SimpleSpanProcessor(createSpanExporter(env))],
  });
  provider.register();

  console.error(`[OTel] Tracing enabled for ${SERVICE_NAME}`);
  return true;
}

/**
 * Flushes pending spans and shuts the provider down. Safe to call when
 * tracing was never enabled.
 */
export async function shutdownTracing(): Promise<void> {
  if (!provider) return;
  const current = provider;
  provider = undefined;
  try {
    await current.shutdown();
  } catch (error) {
    console.error("[OTel] Error shutting down tracing:", error);
  }
}

/**
 * Get a tracer for creating spans.
 *
 * When tracing is disabled, the global TracerProvider returns a no-op tracer
 * (safe to call, does nothing).
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

initTracing();
