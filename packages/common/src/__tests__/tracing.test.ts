import { describe, it, expect, vi, afterEach } from "vitest";
import { SpanStatusCode, type Span } from "@opentelemetry/api";
import { createTracing } from "../tracing.js";

afterEach(() => {
  vi.doUnmock("@opentelemetry/sdk-node");
  vi.doUnmock("@opentelemetry/auto-instrumentations-node");
  vi.doUnmock("@opentelemetry/exporter-trace-otlp-http");
});

describe("initTracing", () => {
  it("is a no-op when OTEL_ENABLED is not set", async () => {
    const tracing = createTracing({ serviceName: "test-service", env: {} });
    await expect(tracing.initTracing()).resolves.toBe(false);
  });

  it("is a no-op when OTEL_ENABLED=false", async () => {
    const tracing = createTracing({ serviceName: "test-service", env: { OTEL_ENABLED: "false" } });
    await expect(tracing.initTracing()).resolves.toBe(false);
  });

  it("starts the SDK once when OTEL_ENABLED=true and shuts it down", async () => {
    const start = vi.fn();
    const shutdown = vi.fn().mockResolvedValue(undefined);
    vi.doMock("@opentelemetry/sdk-node", () => ({
      NodeSDK: class {
        start = start;
        shutdown = shutdown;
      },
    }));
    vi.doMock("@opentelemetry/auto-instrumentations-node", () => ({
      getNodeAutoInstrumentations: () => [],
    }));
    vi.doMock("@opentelemetry/exporter-trace-otlp-http", () => ({
      OTLPTraceExporter: class {},
    }));

    const tracing = createTracing({ serviceName: "test-service", env: { OTEL_ENABLED: "true" } });
    await expect(tracing.initTracing()).resolves.toBe(true);
    await expect(tracing.initTracing()).resolves.toBe(true);
    expect(start).toHaveBeenCalledTimes(1);

    await tracing.shutdownTracing();
    await tracing.shutdownTracing();
    expect(shutdown).toHaveBeenCalledTimes(1);
  });

  it("does not shut down anything when the SDK never started", async () => {
    const tracing = createTracing({ serviceName: "test-service", env: {} });
    await expect(tracing.shutdownTracing()).resolves.toBeUndefined();
  });
});

describe("getTracer", () => {
  it("returns a tracer whose spans can be started and ended without an SDK", () => {
    const tracing = createTracing({ serviceName: "test-service", env: {} });
    const span = tracing.getTracer().startSpan("corpus.build");
    span.setAttribute("documents_processed", 5);
    span.end();
  });
});

describe("withSpan", () => {
  it("returns the callback result and marks the span OK", async () => {
    const tracing = createTracing({ serviceName: "test-service", env: {} });
    let seen: Span | undefined;
    const result = await tracing.withSpan("work", async (span) => {
      vi.spyOn(span, "setStatus");
      vi.spyOn(span, "end");
      seen = span;
      return 42;
    });

    expect(result).toBe(42);
    expect(seen?.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.OK });
    expect(seen?.end).toHaveBeenCalledOnce();
  });

  it("marks the span as failed and rethrows", async () => {
    const tracing = createTracing({ serviceName: "test-service", env: {} });
    let setStatus: ReturnType<typeof vi.fn> | undefined;

    await expect(
      tracing.withSpan("work", async (span) => {
        setStatus = vi.fn();
        span.setStatus = setStatus;
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.ERROR, message: "Error: boom" });
  });
});
