export class SnapshotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SnapshotError";
  }
}

export class ConfigError extends SnapshotError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class TransportError extends SnapshotError {
  public readonly method: string;
  public readonly path: string;
  public readonly statusCode?: number;

  constructor(method: string, path: string, message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(`${method} ${path}: ${message}`, { cause: options?.cause });
    this.name = "TransportError";
    this.method = method;
    this.path = path;
    this.statusCode = options?.statusCode;
  }
}

export class DiscoveryError extends SnapshotError {
  public readonly hostname: string;

  constructor(hostname: string) {
    super(`Hostname '${hostname}' not found in any configured Proxmox instance`);
    this.name = "DiscoveryError";
    this.hostname = hostname;
  }
}

export type TaskFailureReason = "failed" | "timeout" | "no-task";

export class TaskError extends SnapshotError {
  public readonly upid: string | null;
  public readonly reason: TaskFailureReason;
  public readonly exitStatus?: string;

  constructor(upid: string | null, reason: TaskFailureReason, message: string, exitStatus?: string) {
    super(message);
    this.name = "TaskError";
    this.upid = upid;
    this.reason = reason;
    this.exitStatus = exitStatus;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
