import { errorMessage } from "../errors/snapshotErrors.js";
import type { Logger } from "../telemetry/logger.js";
import type { ContainerConfig, NodeApi } from "../types/interfaces.js";
import type { MountPoint, QuiesceState, RestoreOutcome } from "../types/snapshot.js";

const MOUNT_POINT_KEY = /^mp\d+$/;

export function extractMountPoints(config: ContainerConfig): MountPoint[] {
  const mounts: MountPoint[] = [];
  for (const [key, value] of Object.entries(config)) {
    if (!MOUNT_POINT_KEY.test(key)) continue;
    mounts.push({ key, value: typeof value === "string" ? value : String(value) });
  }
  return mounts;
}

/**
 * Handle for mount points detached by `quiesce`. `release()` reattaches them once; later
 * calls return the outcomes of the first release without touching the container again.
 */
export class QuiesceGuard {
  private releasing: Promise<RestoreOutcome[]> | null = null;

  constructor(
    public readonly state: QuiesceState,
    private readonly restore: (state: QuiesceState) => Promise<RestoreOutcome[]>
  ) {}

  get released(): boolean {
    return this.releasing !== null;
  }

  release(): Promise<RestoreOutcome[]> {
    if (!this.releasing) {
      this.releasing = this.state.removed.length > 0 ? this.restore(this.state) : Promise.resolve([]);
    }
    return this.releasing;
  }
}

export class MountQuiesceManager {
  private readonly logger: Logger;

  constructor(
    private readonly api: NodeApi,
    logger: Logger
  ) {
    this.logger = logger.child({ component: "mounts" });
  }

  /**
   * Detaches every mount point of a container. If a removal fails, the ones already removed
   * are put back before the error propagates.
   */
  async quiesce(vmid: number): Promise<QuiesceGuard> {
    const config = await this.api.getContainerConfig(vmid);
    const mounts = extractMountPoints(config);
    if (mounts.length === 0) {
      return new QuiesceGuard({ vmid, removed: [] }, (state) => this.restore(state));
    }

    this.logger.info(`Found ${mounts.length} mount point(s), temporarily removing...`);
    const removed: MountPoint[] = [];
    try {
      for (const mount of mounts) {
        this.logger.info(`  Removing ${mount.key}`);
        await this.api.updateContainerConfig(vmid, { delete: mount.key });
        removed.push(mount);
      }
    } catch (err) {
      this.logger.error(`Failed to remove mount points: ${errorMessage(err)}`);
      if (removed.length > 0) {
        await this.restore({ vmid, removed });
      }
      throw err;
    }
    return new QuiesceGuard({ vmid, removed }, (state) => this.restore(state));
  }

  /** Reattaches each captured mount point. Per-entry failures are reported, never thrown. */
  async restore(state: QuiesceState): Promise<RestoreOutcome[]> {
    this.logger.info("Restoring mount points...");
    const outcomes: RestoreOutcome[] = [];
    for (const mount of state.removed) {
      this.logger.info(`  Restoring ${mount.key}`);
      try {
        await this.api.updateContainerConfig(state.vmid, { [mount.key]: mount.value });
        outcomes.push({ key: mount.key, ok: true });
      } catch (err) {
        const error = errorMessage(err);
        this.logger.warn({ vmid: state.vmid, key: mount.key, value: mount.value }, `Failed to restore ${mount.key}: ${error}`);
        outcomes.push({ key: mount.key, ok: false, error });
      }
    }
    return outcomes;
  }
}
