import path from "node:path";
import type { GuestKind } from "../types/guest.js";
import type { SnapshotRequest } from "../types/snapshot.js";

export const SNAPSHOT_PREFIX = "pre_deploy_";

const pad = (n: number) => String(n).padStart(2, "0");

/** `DD_MM_YYYY_HH_MM_SS` in local time. Two runs within the same second collide. */
export function formatSnapshotTimestamp(date: Date): string {
  return [date.getDate(), date.getMonth() + 1, date.getFullYear(), date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part, index) => (index === 2 ? String(part) : pad(part)))
    .join("_");
}

export function formatHumanTime(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function stackNameFromCwd(cwd: string): string {
  return path.basename(path.resolve(cwd));
}

export function buildSnapshotRequest(kind: GuestKind, input: { now: Date; stackName: string }): SnapshotRequest {
  const request: SnapshotRequest = {
    name: `${SNAPSHOT_PREFIX}${formatSnapshotTimestamp(input.now)}`,
    description: `Pre-deployment of stack ${input.stackName} at ${formatHumanTime(input.now)}`
  };
  // Disk-only snapshot; RAM state is never captured.
  if (kind === "qemu") {
    request.vmstate = false;
  }
  return request;
}
