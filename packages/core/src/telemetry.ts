import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { SpanStatusCode, trace, metrics } from '@opentelemetry/api';
import type { Attributes, Meter, Span, Tracer } from '@opentelemetry/api';

let sdk: NodeSDK | undefined;

/**
 * Initialise the OpenTelemetry SDK with an OTLP gRPC trace exporter.
 *
 * If no `otlpEndpoint` is provided and the `OTEL_EXPORTER_OTLP_ENDPOINT`
 * environment variable is not set, this function is a no-op.
 * The OTel API returns no-op implementations when no SDK is configured,
 * so callers of `getTracer` / `getMeter` always receive a safe object.
 */
export function initTelemetry(opts: {
  serviceName: string;
  otlpEndpoint?: string;
}): void {
  if (sdk) {
    throw new Error('initTelemetry() has already been called. Call shutdownTelemetry() first.');
  }

  const endpoint =
    opts.otlpEndpoint ?? process.env['OTEL_EXPORTER_OTLP_ENDPOINT'];
  if (!endpoint) return;

  sdk = new NodeSDK({
    serviceName: opts.serviceName,
    traceExporter: new OTLPTraceExporter({ url: endpoint }),
  });
  sdk.start();
}

/**
 * Gracefully shut down the OpenTelemetry SDK, flushing any pending spans.
 * Resolves immediately if the SDK was never initialised.
 */
export async function shutdownTelemetry(): Promise<void> {
  const instance = sdk;
  sdk = undefined;
  await instance?.shutdown();
}

/** Obtain a Tracer scoped to the given name (usually the package name). */
export function getTracer(name: string): Tracer {
  return trace.getTracer(name);
}

/** Obtain a Meter scoped to the given name (usually the package name). */
export function getMeter(name: string): Meter {
  return metrics.getMeter(name);
}

/**
 * Run `fn` inside a span. The span is marked OK unless `fn` throws or
 * `isFailure` flags its result; it is always ended.
 */
export async function withSpan<T>(
  tracer: Tracer,
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
  isFailure: (result: T) => string | undefined = () => undefined,
): Promise<T> {
  const span = tracer.startSpan(name, { attributes });
  try {
    const result = await fn(span);
    const failure = isFailure(result);
    span.setStatus(failure ? { code: SpanStatusCode.ERROR, message: failure } : { code: SpanStatusCode.OK });
    return result;
  } catch (err) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) });
    throw err;
  } finally {
    span.end();
  }
}
