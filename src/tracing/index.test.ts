/**
 * index.test.ts - Unit tests for tracing initialization
 *
 * Initialization runs at module load time, so each test resets the module
 * registry (vi.resetModules) and re-imports the tracing module. The SDK and
 * exporter packages are mocked so no provider is registered globally.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const mocks = vi.hoisted(() => {
  const register = vi.fn();
  const shutdown = vi.fn(async () => undefined);
  // Regular functions so they work as constructors with `new`
  return {
    register,
    shutdown,
    NodeTracerProvider: vi.fn(function () {
      return { register, shutdown };
    }),
    SimpleSpanProcessor: vi.fn(function (_exporter: unknown) {}),
    OTLPTraceExporter: vi.fn(function (_config: { url: string }) {}),
  };
});

vi.mock("@opentelemetry/sdk-trace-node", () => ({
  NodeTracerProvider: mocks.NodeTracerProvider,
  SimpleSpanProcessor: mocks.SimpleSpanProcessor,
}));

vi.mock("@opentelemetry/exporter-trace-otlp-proto", () => ({
  OTLPTraceExporter: mocks.OTLPTraceExporter,
}));

async function importTracing() {
  vi.resetModules();
  const tracing = await import("./index");
  const { StderrSpanExporter } = await import("./stderr-exporter");
  return { ...tracing, StderrSpanExporter };
}

describe("tracing", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv("OTEL_TRACING_ENABLED", "");
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.mocked(console.error).mockRestore();
  });

  describe("initTracing", () => {
    it("does nothing unless OTEL_TRACING_ENABLED=true", async () => {
      const { initTracing } = await importTracing();

      expect(initTracing({ OTEL_TRACING_ENABLED: "1" })).toBe(false);
      expect(mocks.NodeTracerProvider).not.toHaveBeenCalled();
    });

    it("registers a provider once", async () => {
      const { initTracing, StderrSpanExporter } = await importTracing();

      expect(initTracing({ OTEL_TRACING_ENABLED: "true" })).toBe(true);
      expect(initTracing({ OTEL_TRACING_ENABLED: "true" })).toBe(true);

      expect(mocks.NodeTracerProvider).toHaveBeenCalledTimes(1);
      expect(mocks.register).toHaveBeenCalledTimes(1);
      expect(mocks.SimpleSpanProcessor).toHaveBeenCalledTimes(1);
      expect(mocks.SimpleSpanProcessor.mock.calls[0]?.[0]).toBeInstanceOf(StderrSpanExporter);
    });

    it("initializes at import time when enabled in the environment", async () => {
      vi.stubEnv("OTEL_TRACING_ENABLED", "true");

      await importTracing();

      expect(mocks.register).toHaveBeenCalledTimes(1);
    });
  });

  describe("createSpanExporter", () => {
    it("keeps console output off stdout by default", async () => {
      const { createSpanExporter, StderrSpanExporter } = await importTracing();

      expect(createSpanExporter({})).toBeInstanceOf(StderrSpanExporter);
    });

    it("appends /v1/traces to the OTLP endpoint", async () => {
      const { createSpanExporter } = await importTracing();

      createSpanExporter({
        OTEL_EXPORTER_TYPE: "otlp",
        OTEL_EXPORTER_OTLP_ENDPOINT: "http://localhost:4318/",
      });

      expect(mocks.OTLPTraceExporter).toHaveBeenCalledWith({
        url: "http://localhost:4318/v1/traces",
      });
    });

    it("keeps an endpoint that already ends in /v1/traces", async () => {
      const { createSpanExporter } = await importTracing();

      createSpanExporter({
        OTEL_EXPORTER_TYPE: "otlp",
        OTEL_EXPORTER_OTLP_ENDPOINT: "http://collector:4318/v1/traces",
      });

      expect(mocks.OTLPTraceExporter).toHaveBeenCalledWith({
        url: "http://collector:4318/v1/traces",
      });
    });

    it("requires an endpoint for otlp", async () => {
      const { createSpanExporter } = await importTracing();

      expect(() => createSpanExporter({ OTEL_EXPORTER_TYPE: "otlp" })).toThrow(
        /OTEL_EXPORTER_OTLP_ENDPOINT is required/
      );
    });

    it("rejects an unknown exporter type", async () => {
      const { createSpanExporter } = await importTracing();

      expect(() => createSpanExporter({ OTEL_EXPORTER_TYPE: "zipkin" })).toThrow(
        'Unsupported OTEL_EXPORTER_TYPE: "zipkin". Valid options: "console", "otlp".'
      );
    });
  });

  describe("shutdownTracing", () => {
    it("is a no-op when tracing was never enabled", async () => {
      const { shutdownTracing } = await importTracing();

      await shutdownTracing();

      expect(mocks.shutdown).not.toHaveBeenCalled();
    });

    it("shuts the provider down once", async () => {
      const { initTracing, shutdownTracing } = await importTracing();
      initTracing({ OTEL_TRACING_ENABLED: "true" });

      await shutdownTracing();
      await shutdownTracing();

      expect(mocks.shutdown).toHaveBeenCalledTimes(1);
    });
  });
});
