import type { z } from "zod";
import { TaskError, TransportError } from "../errors/snapshotErrors.js";
import type { GuestKind } from "../types/guest.js";
import type { ContainerConfig, FormBody, HttpMethod, NodeApi, ProxmoxTransport } from "../types/interfaces.js";
import type { SnapshotRequest, TaskStatus } from "../types/snapshot.js";
import {
  agentHostnameSchema,
  containerConfigSchema,
  guestListSchema,
  snapshotTaskSchema,
  taskStatusSchema
} from "./schemas.js";

export class ProxmoxNodeApi implements NodeApi {
  constructor(private readonly transport: ProxmoxTransport) {}

  async listGuests(kind: GuestKind): Promise<number[]> {
    const guests = await this.call("GET", kind, guestListSchema);
    // Entries without a vmid (templates mid-creation) cannot be snapshotted; skip them.
    return guests.flatMap((guest) => (guest.vmid === undefined ? [] : [guest.vmid]));
  }

  async getContainerConfig(vmid: number): Promise<ContainerConfig> {
    return this.call("GET", `lxc/${vmid}/config`, containerConfigSchema);
  }

  async getAgentHostname(vmid: number): Promise<string | null> {
    const data = await this.call("GET", `qemu/${vmid}/agent/get-host-name`, agentHostnameSchema);
    const hostname = data?.result?.["host-name"];
    return hostname ? hostname : null;
  }

  async createSnapshot(kind: GuestKind, vmid: number, request: SnapshotRequest): Promise<string> {
    const body: FormBody = { snapname: request.name, description: request.description };
    if (kind === "qemu") {
      body.vmstate = request.vmstate ? 1 : 0;
    }
    const upid = await this.call("POST", `${kind}/${vmid}/snapshot`, snapshotTaskSchema, body);
    if (!upid) {
      throw new TaskError(null, "no-task", "Snapshot request did not return a task UPID");
    }
    return upid;
  }

  async updateContainerConfig(vmid: number, params: FormBody): Promise<void> {
    await this.transport.request("PUT", `lxc/${vmid}/config`, params);
  }

  async getTaskStatus(upid: string): Promise<TaskStatus> {
    const data = await this.call("GET", `tasks/${encodeURIComponent(upid)}/status`, taskStatusSchema);
    return { upid, status: data.status, exitStatus: data.exitstatus };
  }

  private async call<S extends z.ZodTypeAny>(method: HttpMethod, path: string, schema: S, body?: FormBody): Promise<z.output<S>> {
    const data = await this.transport.request(method, path, body);
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new TransportError(method, path, `unexpected response shape${where}: ${issue?.message ?? "invalid"}`);
    }
    return parsed.data;
  }
}
