import { metrics, trace } from "@opentelemetry/api";

// No-op unless the host application registers an OpenTelemetry SDK
export const otelTracer = trace.getTracer("treesplice");

const otelMeter = metrics.getMeter("treesplice");

export const resourcesProcessedCounter = otelMeter.createCounter("treesplice.resources.processed", {
  description: "Resources processed by the merge engine",
});

export const diagnosticsCounter = otelMeter.createCounter("treesplice.diagnostics", {
  description: "Diagnostics emitted during merge and resolution",
});
