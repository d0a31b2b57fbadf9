import type { ResolvedGuest } from "../discovery/hostResolver.js";
import { MountQuiesceManager, type QuiesceGuard } from "../mounts/mountQuiesce.js";
import { buildSnapshotRequest } from "../snapshots/snapshotName.js";
import type { TaskWaiter } from "../tasks/taskWaiter.js";
import type { Logger } from "../telemetry/logger.js";
import { withSpan } from "../telemetry/tracing.js";
import type { GuestKind } from "../types/guest.js";
import type { NodeApi } from "../types/interfaces.js";
import type { RestoreOutcome, SnapshotResult } from "../types/snapshot.js";

export interface SnapshotServiceOptions {
  waiter: TaskWaiter;
  logger: Logger;
  stackName: string;
  now?: () => Date;
}

export class SnapshotService {
  private readonly waiter: TaskWaiter;
  private readonly logger: Logger;
  private readonly stackName: string;
  private readonly now: () => Date;

  constructor(options: SnapshotServiceOptions) {
    this.waiter = options.waiter;
    this.logger = options.logger.child({ component: "snapshot" });
    this.stackName = options.stackName;
    this.now = options.now ?? (() => new Date());
  }

  async snapshot(target: ResolvedGuest, signal?: AbortSignal): Promise<SnapshotResult> {
    const { api, guest } = target;
    return withSpan("snapshot.create", { "snapshot.kind": guest.kind, "snapshot.vmid": guest.vmid }, async () => {
      if (guest.kind === "qemu") {
        return this.createAndWait(api, "qemu", guest.vmid, signal);
      }
      return this.snapshotContainer(api, guest.vmid, signal);
    });
  }

  /**
   * Mount points block container snapshots, so they are detached first. Reattaching happens
   * in `finally`: every path out of here, including a failed or interrupted snapshot, runs it.
   */
  private async snapshotContainer(api: NodeApi, vmid: number, signal?: AbortSignal): Promise<SnapshotResult> {
    signal?.throwIfAborted();
    const mounts = new MountQuiesceManager(api, this.logger);
    const guard = await mounts.quiesce(vmid);
    try {
      const result = await this.createAndWait(api, "lxc", vmid, signal);
      return { ...result, restored: await this.release(guard) };
    } finally {
      if (!guard.released) {
        await this.release(guard);
      }
    }
  }

  private async release(guard: QuiesceGuard): Promise<RestoreOutcome[]> {
    const outcomes = await guard.release();
    const failed = outcomes.filter((outcome) => !outcome.ok);
    if (failed.length > 0) {
      this.logger.warn(`${failed.length} mount point(s) could not be restored: ${failed.map((outcome) => outcome.key).join(", ")}`);
    }
    return outcomes;
  }

  private async createAndWait(api: NodeApi, kind: GuestKind, vmid: number, signal?: AbortSignal): Promise<SnapshotResult> {
    signal?.throwIfAborted();
    const request = buildSnapshotRequest(kind, { now: this.now(), stackName: this.stackName });
    this.logger.info(`Creating snapshot '${request.name}'...`);
    const upid = await api.createSnapshot(kind, vmid, request);
    await this.waiter.wait(api, upid, signal);
    return { kind, vmid, name: request.name, upid, restored: [] };
  }
}
