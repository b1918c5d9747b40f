/*
  Optional tracing via OpenTelemetry, abstracted behind simple helpers.
  If env AGENT_OTEL_ENABLED !== "true" everything is a no-op and the SDK is never loaded.
*/

import type { Span, Tracer, AttributeValue } from "@opentelemetry/api";
import type { NodeSDK } from "@opentelemetry/sdk-node";

let initialized = false;
let tracer: Tracer | null = null;
let sdk: NodeSDK | null = null;
let savedEndpoint = "";

export interface ObservabilityConfig {
  serviceName?: string;
  otlpTracesUrl?: string; // e.g. http://localhost:4318/v1/traces
}

export function isObservabilityEnabled(): boolean {
  return process.env.AGENT_OTEL_ENABLED === "true";
}

export async function initObservability(config?: ObservabilityConfig) {
  if (initialized || !isObservabilityEnabled()) return;

  const serviceName =
    config?.serviceName || process.env.SERVICE_NAME || "local-code-agent";

  let url =
    config?.otlpTracesUrl ||
    process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT ||
    "http://localhost:4318/v1/traces";
  // A bare collector URL gets the OTLP traces path
  if (!url.includes("/v1/traces")) {
    url = url.replace(/\/$/, "") + "/v1/traces";
  }
  savedEndpoint = url;

  const [sdkNodeModule, exporterModule, apiModule] = await Promise.all([
    import("@opentelemetry/sdk-node"),
    import("@opentelemetry/exporter-trace-otlp-http"),
    import("@opentelemetry/api"),
  ]);

  sdk = new sdkNodeModule.NodeSDK({
    serviceName,
    traceExporter: new exporterModule.OTLPTraceExporter({ url }),
  });
  sdk.start();

  tracer = apiModule.trace.getTracer(serviceName);
  initialized = true;
}

export async function withSpan<T>(
  name: string,
  fn: (span?: Span) => Promise<T> | T
): Promise<T> {
  if (!tracer) {
    return await fn();
  }

  return await tracer.startActiveSpan(name, async (span: Span) => {
    try {
      const res = await fn(span);
      span.setAttribute("success", true);
      return res;
    } catch (e: unknown) {
      if (e instanceof Error) {
        span.recordException(e);
      }
      span.setAttribute("success", false);
      span.setAttribute(
        "error.message",
        e instanceof Error ? e.message : String(e)
      );
      span.setAttribute("error.type", e instanceof Error ? e.name : typeof e);
      throw e;
    } finally {
      span.end();
    }
  });
}

function toAttributeValue(value: unknown): AttributeValue | undefined {
  if (value === undefined || value === null) return undefined;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value) && value.every((v) => typeof v === "string")) {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Record an error as its own span, so failures that are handled (and
 * therefore never reach withSpan) still show up in the trace.
 */
export async function recordErrorSpan(
  error: unknown,
  context: string,
  additionalAttributes?: Record<string, unknown>
): Promise<void> {
  if (!tracer) {
    return;
  }

  tracer.startActiveSpan(`error.${context}`, (span: Span) => {
    span.setAttribute("error.context", context);

    if (error instanceof Error) {
      span.setAttribute("error.name", error.name);
      span.setAttribute("error.message", error.message);
      if (error.stack) {
        span.setAttribute("error.stack", error.stack);
      }
      if (error.cause) {
        span.setAttribute("error.cause", String(error.cause));
      }
      span.recordException(error);
    } else {
      span.setAttribute("error.value", String(error));
      span.setAttribute("error.value_type", typeof error);
    }

    for (const [key, value] of Object.entries(additionalAttributes ?? {})) {
      const attribute = toAttributeValue(value);
      if (attribute !== undefined) {
        span.setAttribute(key, attribute);
      }
    }

    span.setAttribute("success", false);
    span.end();
  });
}

/**
 * Flush and stop the SDK. Call before process.exit() so queued spans are exported.
 */
export async function shutdownObservability(): Promise<void> {
  if (!initialized || !sdk) {
    return;
  }

  const timeout = new Promise<never>((_, reject) =>
    setTimeout(() => reject(new Error("Shutdown timeout after 10 seconds")), 10_000).unref()
  );

  try {
    await Promise.race([sdk.shutdown(), timeout]);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(
      `⚠️  Could not flush traces to ${savedEndpoint}: ${message}`
    );
  } finally {
    initialized = false;
    tracer = null;
    sdk = null;
  }
}
