import type { GuestKind } from "./guest.js";

export interface SnapshotRequest {
  name: string;
  description: string;
  /** QEMU only. Always false: RAM state is never captured. */
  vmstate?: boolean;
}

export type TaskRunState = "running" | "stopped";

export interface TaskStatus {
  upid: string;
  status: TaskRunState | string;
  exitStatus?: string;
}

export interface MountPoint {
  key: string;
  /** Raw config value, kept verbatim so restoring writes back exactly what was read. */
  value: string;
}

export interface QuiesceState {
  vmid: number;
  removed: readonly MountPoint[];
}

export type RestoreOutcome = { key: string; ok: true } | { key: string; ok: false; error: string };

export interface SnapshotResult {
  kind: GuestKind;
  vmid: number;
  name: string;
  upid: string;
  restored: RestoreOutcome[];
}
