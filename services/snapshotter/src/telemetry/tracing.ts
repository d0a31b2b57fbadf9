import { SpanStatusCode, trace, type Attributes } from "@opentelemetry/api";
import { errorMessage } from "../errors/snapshotErrors.js";

const tracer = trace.getTracer("pre-deploy-snapshot");

/** Runs `fn` inside an active span; a rejection marks the span as errored and is rethrown. */
export async function withSpan<T>(name: string, attributes: Attributes, fn: () => Promise<T>): Promise<T> {
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await fn();
    } catch (err) {
      span.recordException(err instanceof Error ? err : errorMessage(err));
      span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(err) });
      throw err;
    } finally {
      span.end();
    }
  });
}
