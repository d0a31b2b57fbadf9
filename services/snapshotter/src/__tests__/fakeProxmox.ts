import { TransportError } from "../errors/snapshotErrors.js";
import type { FormBody, HttpMethod, ProxmoxTransport } from "../types/interfaces.js";

export interface RecordedCall {
  method: HttpMethod;
  path: string;
  body?: FormBody;
}

interface FailureRule {
  method: HttpMethod;
  path: RegExp;
  remaining: number;
  message: string;
  when?: (body: FormBody | undefined) => boolean;
}

export interface FailureOptions {
  message?: string;
  times?: number;
  /** Only fail requests whose form body satisfies this. */
  when?: (body: FormBody | undefined) => boolean;
}

interface FakeTask {
  runningPolls: number;
  polls: number;
  exitStatus: string;
}

/**
 * In-process stand-in for one Proxmox node. Keeps container configs and snapshot tasks in
 * memory and answers the relative API paths the snapshotter uses.
 */
export class FakeProxmoxNode implements ProxmoxTransport {
  public readonly calls: RecordedCall[] = [];
  public readonly containers = new Map<number, Record<string, unknown>>();
  public readonly vms = new Map<number, { hostname: string | null; agentRunning: boolean }>();
  public readonly snapshots: Array<{ kind: string; vmid: number; body: FormBody }> = [];
  public taskRunningPolls = 0;
  public taskExitStatus = "OK";
  private readonly tasks = new Map<string, FakeTask>();
  private readonly failures: FailureRule[] = [];
  private nextTask = 1;

  addContainer(vmid: number, config: Record<string, unknown>): this {
    this.containers.set(vmid, { ...config });
    return this;
  }

  addVm(vmid: number, hostname: string | null, agentRunning = true): this {
    this.vms.set(vmid, { hostname, agentRunning });
    return this;
  }

  failOn(method: HttpMethod, path: RegExp, options: FailureOptions = {}): this {
    this.failures.push({
      method,
      path,
      remaining: options.times ?? Number.POSITIVE_INFINITY,
      message: options.message ?? "connection reset",
      when: options.when
    });
    return this;
  }

  callsTo(method: HttpMethod, path: RegExp): RecordedCall[] {
    return this.calls.filter((call) => call.method === method && path.test(call.path));
  }

  taskPolls(upid: string): number {
    return this.tasks.get(upid)?.polls ?? 0;
  }

  async request(method: HttpMethod, path: string, body?: FormBody): Promise<unknown> {
    this.calls.push(body === undefined ? { method, path } : { method, path, body: { ...body } });

    const failure = this.failures.find(
      (rule) => rule.method === method && rule.path.test(path) && rule.remaining > 0 && (rule.when?.(body) ?? true)
    );
    if (failure) {
      failure.remaining -= 1;
      throw new TransportError(method, path, failure.message);
    }

    let match: RegExpMatchArray | null;
    if (method === "GET" && path === "lxc") {
      return [...this.containers.keys()].map((vmid) => ({ vmid, status: "running" }));
    }
    if (method === "GET" && path === "qemu") {
      return [...this.vms.keys()].map((vmid) => ({ vmid, status: "running" }));
    }
    if ((match = path.match(/^lxc\/(\d+)\/config$/))) {
      const config = this.containers.get(Number(match[1]));
      if (!config) throw new TransportError(method, path, "HTTP 500: Configuration file does not exist", { statusCode: 500 });
      if (method === "GET") return { ...config };
      if (method === "PUT" && body) {
        this.applyConfigUpdate(config, body);
        return null;
      }
    }
    if (method === "GET" && (match = path.match(/^qemu\/(\d+)\/agent\/get-host-name$/))) {
      const vm = this.vms.get(Number(match[1]));
      if (!vm || !vm.agentRunning) {
        throw new TransportError(method, path, "HTTP 500: QEMU guest agent is not running", { statusCode: 500 });
      }
      return { result: vm.hostname === null ? {} : { "host-name": vm.hostname } };
    }
    if (method === "POST" && body && (match = path.match(/^(lxc|qemu)\/(\d+)\/snapshot$/))) {
      return this.createSnapshot(match[1], Number(match[2]), body);
    }
    if (method === "GET" && (match = path.match(/^tasks\/([^/]+)\/status$/))) {
      const upid = decodeURIComponent(match[1]);
      const task = this.tasks.get(upid);
      if (!task) throw new TransportError(method, path, "HTTP 500: no such task", { statusCode: 500 });
      task.polls += 1;
      if (task.polls <= task.runningPolls) return { status: "running", upid };
      return { status: "stopped", exitstatus: task.exitStatus, upid };
    }
    throw new TransportError(method, path, "HTTP 501: Method not implemented", { statusCode: 501 });
  }

  private applyConfigUpdate(config: Record<string, unknown>, body: FormBody): void {
    for (const [key, value] of Object.entries(body)) {
      if (key === "delete") {
        for (const deleted of String(value).split(",")) delete config[deleted];
      } else {
        config[key] = value;
      }
    }
  }

  private createSnapshot(kind: string, vmid: number, body: FormBody): string {
    if (kind === "lxc") {
      const config = this.containers.get(vmid) ?? {};
      if (Object.keys(config).some((key) => /^mp\d+$/.test(key))) {
        throw new TransportError("POST", `${kind}/${vmid}/snapshot`, "HTTP 500: snapshot feature is not available", {
          statusCode: 500
        });
      }
    }
    const upid = `UPID:pve:0000${this.nextTask++}:00000000:65000000:vzsnapshot:${vmid}:root@pam:`;
    this.tasks.set(upid, { runningPolls: this.taskRunningPolls, polls: 0, exitStatus: this.taskExitStatus });
    this.snapshots.push({ kind, vmid, body });
    return upid;
  }
}
