import { createTracing } from "@corpus-prep/common/tracing";

export const SERVICE_NAME = "corpus-prep";

export const { initTracing, shutdownTracing, getTracer, withSpan, _resetTracing } = createTracing({
  serviceName: SERVICE_NAME,
});
