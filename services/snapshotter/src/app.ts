import { loadEndpoints } from "./config/endpoints.js";
import type { EnvConfig } from "./config/env.js";
import { HostResolver } from "./discovery/hostResolver.js";
import { SnapshotError } from "./errors/snapshotErrors.js";
import { DockerImageInspector } from "./images/imageFreshness.js";
import { ProxmoxNodeApi } from "./proxmoxClient/nodeApi.js";
import { SnapshotService } from "./services/snapshotService.js";
import { stackNameFromCwd } from "./snapshots/snapshotName.js";
import { TaskWaiter, type TaskWaiterOptions } from "./tasks/taskWaiter.js";
import type { Logger } from "./telemetry/logger.js";
import { withSpan } from "./telemetry/tracing.js";
import type { ImageInspector, TransportFactory } from "./types/interfaces.js";
import type { SnapshotResult } from "./types/snapshot.js";

export interface RunOptions {
  configPath: string;
  hostname: string;
  cwd: string;
  ifNewerImages: boolean;
  signal?: AbortSignal;
}

export interface RunDeps {
  env: Pick<EnvConfig, "taskPollIntervalMs" | "taskTimeoutMs">;
  logger: Logger;
  transportFor: TransportFactory;
  imageInspector?: ImageInspector;
  now?: () => Date;
  clock?: Pick<TaskWaiterOptions, "now" | "sleep">;
}

export type RunOutcome = { status: "snapshotted"; result: SnapshotResult } | { status: "skipped" };

/** Loads config, resolves this host and snapshots it. Errors propagate unchanged. */
export async function snapshotThisHost(options: RunOptions, deps: RunDeps): Promise<RunOutcome> {
  const { logger } = deps;
  return withSpan("snapshot.run", { "snapshot.hostname": options.hostname }, async () => {
    logger.info(`Loading config from ${options.configPath}`);
    const endpoints = await loadEndpoints(options.configPath);

    if (options.ifNewerImages) {
      const inspector = deps.imageInspector ?? new DockerImageInspector({ cwd: options.cwd, logger });
      if (!(await inspector.hasNewerImages())) {
        logger.info("All images are up to date. No action needed.");
        return { status: "skipped" };
      }
      logger.info("Newer image detected. Creating snapshot...");
    }

    logger.info(`Current hostname: ${options.hostname}`);
    const resolver = new HostResolver({ apiFor: (endpoint) => new ProxmoxNodeApi(deps.transportFor(endpoint)), logger });
    const target = await resolver.resolve(endpoints, options.hostname, options.signal);

    const waiter = new TaskWaiter({
      pollIntervalMs: deps.env.taskPollIntervalMs,
      timeoutMs: deps.env.taskTimeoutMs,
      logger,
      ...deps.clock
    });
    const service = new SnapshotService({ waiter, logger, stackName: stackNameFromCwd(options.cwd), now: deps.now });
    const result = await service.snapshot(target, options.signal);
    logger.info({ name: result.name, vmid: result.vmid }, "Snapshot completed successfully!");
    return { status: "snapshotted", result };
  });
}

/** Same as `snapshotThisHost`, reduced to a process exit code. */
export async function runPreDeploySnapshot(options: RunOptions, deps: RunDeps): Promise<number> {
  try {
    await snapshotThisHost(options, deps);
    return 0;
  } catch (err) {
    if (err instanceof SnapshotError) {
      deps.logger.error(err.message);
    } else {
      deps.logger.error({ err }, "Snapshot aborted");
    }
    return 1;
  }
}
