import { SpanStatusCode, trace, type Span, type Tracer } from "@opentelemetry/api";

export interface TracingOptions {
  serviceName: string;
  /** Environment to read OTEL_* settings from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

export interface Tracing {
  initTracing(): Promise<boolean>;
  shutdownTracing(): Promise<void>;
  getTracer(): Tracer;
  withSpan<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T>;
  _resetTracing(): void;
}

interface StartedSdk {
  shutdown(): Promise<void>;
}

export function createTracing(options: TracingOptions): Tracing {
  const { serviceName, env = process.env } = options;
  let sdk: StartedSdk | null = null;

  /**
   * Starts the OpenTelemetry SDK when OTEL_ENABLED=true.
   * Resolves to whether an SDK is running afterwards.
   */
  async function initTracing(): Promise<boolean> {
    if (env.OTEL_ENABLED !== "true") return false;
    if (sdk) return true;

    const { NodeSDK } = await import("@opentelemetry/sdk-node");
    const { getNodeAutoInstrumentations } = await import(
      "@opentelemetry/auto-instrumentations-node"
    );
    const { OTLPTraceExporter } = await import(
      "@opentelemetry/exporter-trace-otlp-http"
    );

    const endpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318";

    const nodeSdk = new NodeSDK({
      serviceName,
      traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
      instrumentations: [getNodeAutoInstrumentations()],
    });

    nodeSdk.start();
    sdk = nodeSdk;
    return true;
  }

  /** Flushes pending spans. A batch job has to call this before exiting. */
  async function shutdownTracing(): Promise<void> {
    if (!sdk) return;
    const running = sdk;
    sdk = null;
    await running.shutdown();
  }

  /**
   * Returns a tracer for this service.
   * When no SDK is registered all spans are no-ops.
   */
  function getTracer(): Tracer {
    return trace.getTracer(serviceName);
  }

  async function withSpan<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T> {
    return getTracer().startActiveSpan(name, async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
        throw error;
      } finally {
        span.end();
      }
    });
  }

  /** Reset internal state (for tests only). */
  function _resetTracing(): void {
    sdk = null;
  }

  return { initTracing, shutdownTracing, getTracer, withSpan, _resetTracing };
}
