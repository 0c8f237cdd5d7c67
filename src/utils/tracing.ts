import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { trace, SpanStatusCode, AttributeValue } from '@opentelemetry/api';
import { config } from '../config';
import { errorMessage } from './errors';

let sdk: NodeSDK | null = null;

export function initializeTracing(): void {
  if (!config.otel.tracesEnabled) {
    return;
  }

  sdk = new NodeSDK({
    serviceName: config.otel.serviceName,
    traceExporter: new OTLPTraceExporter({
      url: `${config.otel.endpoint}/v1/traces`,
    }),
  });

  sdk.start();
}

export async function shutdownTracing(): Promise<void> {
  if (sdk) {
    await sdk.shutdown();
    sdk = null;
  }
}

// Runs fn inside an active span named `name`
export async function withSpan<T>(name: string, fn: () => Promise<T>): Promise<T> {
  const tracer = trace.getTracer(config.otel.serviceName);

  return tracer.startActiveSpan(name, async (span) => {
    try {
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      if (err instanceof Error) {
        span.recordException(err);
      }
      span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(err) });
      throw err;
    } finally {
      span.end();
    }
  });
}

// Method decorator wrapping async methods in a span
export function traced(name: string) {
  return function <A extends unknown[], R>(
    _target: object,
    _propertyKey: string,
    descriptor: TypedPropertyDescriptor<(...args: A) => Promise<R>>
  ): TypedPropertyDescriptor<(...args: A) => Promise<R>> {
    const originalMethod = descriptor.value;
    if (!originalMethod) {
      return descriptor;
    }

    descriptor.value = function (this: unknown, ...args: A): Promise<R> {
      return withSpan(name, () => originalMethod.apply(this, args));
    };

    return descriptor;
  };
}

// Helper to add attributes to the current span
export function addSpanAttributes(attributes: Record<string, AttributeValue | null | undefined>): void {
  const span = trace.getActiveSpan();
  if (span) {
    Object.entries(attributes).forEach(([key, value]) => {
      if (value !== undefined && value !== null) {
        span.setAttribute(key, value);
      }
    });
  }
}
