#!/usr/bin/env node
import { CommanderError } from "commander";
import { runPreDeploySnapshot } from "./app.js";
import { parseCliOptions, type CliOptions } from "./cli.js";
import { loadEnv } from "./config/env.js";
import { createTransportFactory } from "./proxmoxClient/proxmoxTransport.js";
import { createLogger } from "./telemetry/logger.js";
import { initOtel, shutdownOtel } from "./telemetry/otel.js";

async function main(): Promise<number> {
  const env = loadEnv();

  let cli: CliOptions;
  try {
    cli = parseCliOptions(process.argv.slice(2), env);
  } catch (err) {
    // --help / --version land here too, with exit code 0.
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const logger = createLogger({ level: cli.logLevel, format: env.logFormat });
  await initOtel({
    otlpEndpoint: env.otlpEndpoint,
    serviceName: env.serviceName,
    diagnosticLevel: process.env.OTEL_DIAGNOSTIC_LOG_LEVEL
  });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.warn(`Received ${signal}; restoring state before exit`);
    controller.abort(new Error(`Interrupted by ${signal}`));
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const transports = createTransportFactory({ timeoutMs: env.requestTimeoutMs });
  try {
    return await runPreDeploySnapshot(
      {
        configPath: cli.configPath,
        hostname: cli.hostname,
        cwd: process.cwd(),
        ifNewerImages: cli.ifNewerImages,
        signal: controller.signal
      },
      { env, logger, transportFor: transports.transportFor }
    );
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await transports.closeAll();
    await shutdownOtel().catch((err: unknown) => logger.warn({ err }, "Failed to flush traces"));
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("ERROR:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
);
