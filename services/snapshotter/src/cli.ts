import os from "node:os";
import { Command, InvalidArgumentError } from "commander";
import { parseLogLevel, type EnvConfig, type LogLevel } from "./config/env.js";
import { errorMessage } from "./errors/snapshotErrors.js";

export interface CliOptions {
  configPath: string;
  hostname: string;
  ifNewerImages: boolean;
  logLevel: LogLevel;
}

function logLevelArg(value: string): LogLevel {
  try {
    return parseLogLevel(value, "--log-level");
  } catch (err) {
    throw new InvalidArgumentError(errorMessage(err));
  }
}

export function buildProgram(env: Pick<EnvConfig, "configPath" | "logLevel">): Command {
  return new Command()
    .name("pre-deploy-snapshot")
    .description("Snapshot the Proxmox guest this stack runs on before it is redeployed")
    .option("-c, --config <path>", "Proxmox endpoints config file", env.configPath)
    .option("--hostname <name>", "hostname to look for instead of this machine's", os.hostname())
    .option("--if-newer-images", "only snapshot when a running compose container has a newer local image", false)
    .option("--log-level <level>", "log level", logLevelArg, env.logLevel)
    .exitOverride();
}

export function parseCliOptions(argv: readonly string[], env: Pick<EnvConfig, "configPath" | "logLevel">): CliOptions {
  const program = buildProgram(env);
  program.parse(argv, { from: "user" });
  const opts = program.opts<{ config: string; hostname: string; ifNewerImages: boolean; logLevel: LogLevel }>();
  return {
    configPath: opts.config,
    hostname: opts.hostname,
    ifNewerImages: opts.ifNewerImages,
    logLevel: opts.logLevel
  };
}
