import { diag, DiagConsoleLogger, DiagLogLevel } from "@opentelemetry/api";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { UndiciInstrumentation } from "@opentelemetry/instrumentation-undici";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";

export interface OtelOptions {
  otlpEndpoint?: string;
  serviceName: string;
  diagnosticLevel?: string;
}

let sdk: NodeSDK | null = null;

function diagLevel(raw: string | undefined): DiagLogLevel | undefined {
  switch ((raw ?? "").trim().toUpperCase()) {
    case "ERROR":
      return DiagLogLevel.ERROR;
    case "WARN":
      return DiagLogLevel.WARN;
    case "INFO":
      return DiagLogLevel.INFO;
    case "DEBUG":
      return DiagLogLevel.DEBUG;
    case "ALL":
      return DiagLogLevel.ALL;
    default:
      return undefined;
  }
}

/**
 * Exports the resolve/snapshot spans and one child span per hypervisor request. Returns false
 * (and starts nothing) when no collector endpoint is configured.
 */
export async function initOtel(options: OtelOptions): Promise<boolean> {
  const url = options.otlpEndpoint?.trim();
  if (!url) return false;

  const level = diagLevel(options.diagnosticLevel);
  if (level !== undefined) {
    diag.setLogger(new DiagConsoleLogger(), level);
  }

  sdk = new NodeSDK({
    resource: resourceFromAttributes({ "service.name": options.serviceName }),
    traceExporter: new OTLPTraceExporter({ url }),
    // Every API call goes through undici; nothing else in a run is worth a span.
    instrumentations: [new UndiciInstrumentation()]
  });
  sdk.start();
  return true;
}

export async function shutdownOtel(): Promise<void> {
  const running = sdk;
  sdk = null;
  await running?.shutdown();
}
