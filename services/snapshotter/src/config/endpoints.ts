import fs from "node:fs/promises";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors/snapshotErrors.js";
import type { HypervisorEndpoint } from "../types/guest.js";

const endpointSchema = z.object({
  url: z.string({ required_error: "missing required key: url" }).url("url must be an absolute URL"),
  api_token: z.string({ required_error: "missing required key: api_token" }).min(1, "api_token must not be empty"),
  node: z.string({ required_error: "missing required key: node" }).min(1, "node must not be empty"),
  verify_tls: z.boolean().optional()
});

const configSchema = z.object({
  proxmox_hosts: z
    .array(endpointSchema, {
      required_error: "Config missing 'proxmox_hosts' key",
      invalid_type_error: "'proxmox_hosts' must be a non-empty list"
    })
    .min(1, "'proxmox_hosts' must be a non-empty list")
});

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

function formatIssue(issue: z.ZodIssue): string {
  const [root, index, ...rest] = issue.path;
  if (root === "proxmox_hosts" && typeof index === "number") {
    const field = rest.length > 0 ? ` (${rest.join(".")})` : "";
    return `Host ${index}${field}: ${issue.message}`;
  }
  return issue.message;
}

export function parseEndpoints(raw: unknown, source: string): HypervisorEndpoint[] {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map(formatIssue).join("; ");
    throw new ConfigError(`Invalid config in ${source}: ${details}`);
  }
  return parsed.data.proxmox_hosts.map((host) => ({
    url: normalizeBaseUrl(host.url),
    apiToken: host.api_token,
    node: host.node,
    verifyTls: host.verify_tls ?? false
  }));
}

export async function loadEndpoints(configPath: string): Promise<HypervisorEndpoint[]> {
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    throw new ConfigError(`Unable to read config file ${configPath}: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in config file ${configPath}: ${errorMessage(err)}`);
  }
  return parseEndpoints(raw, configPath);
}
