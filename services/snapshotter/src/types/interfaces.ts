import type { GuestKind, HypervisorEndpoint } from "./guest.js";
import type { SnapshotRequest, TaskStatus } from "./snapshot.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type FormBody = Record<string, string | number>;

/** Raw access to one node's REST API. Resolves with the `data` field of the response envelope. */
export interface ProxmoxTransport {
  request(method: HttpMethod, path: string, body?: FormBody): Promise<unknown>;
}

export type TransportFactory = (endpoint: HypervisorEndpoint) => ProxmoxTransport;

export type ContainerConfig = Record<string, unknown>;

export interface NodeApi {
  listGuests(kind: GuestKind): Promise<number[]>;
  getContainerConfig(vmid: number): Promise<ContainerConfig>;
  /** Resolves with null when the guest agent answered without a hostname. */
  getAgentHostname(vmid: number): Promise<string | null>;
  createSnapshot(kind: GuestKind, vmid: number, request: SnapshotRequest): Promise<string>;
  updateContainerConfig(vmid: number, params: FormBody): Promise<void>;
  getTaskStatus(upid: string): Promise<TaskStatus>;
}

export interface ImageInspector {
  hasNewerImages(): Promise<boolean>;
}
