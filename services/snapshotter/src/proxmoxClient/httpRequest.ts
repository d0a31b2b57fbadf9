import type { FormBody, HttpMethod } from "../types/interfaces.js";
import type { HypervisorEndpoint } from "../types/guest.js";

export function nodeUrl(endpoint: HypervisorEndpoint, path: string): string {
  const relative = path.replace(/^\/+/, "");
  return `${endpoint.url}/api2/json/nodes/${encodeURIComponent(endpoint.node)}/${relative}`;
}

export function encodeForm(body: FormBody): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(body)) {
    params.append(key, String(value));
  }
  return params.toString();
}

export function buildRequest(
  endpoint: HypervisorEndpoint,
  method: HttpMethod,
  path: string,
  body?: FormBody
): { url: string; headers: Record<string, string>; body?: string } {
  const headers: Record<string, string> = {
    authorization: `PVEAPIToken=${endpoint.apiToken}`,
    accept: "application/json"
  };
  if (body === undefined) {
    return { url: nodeUrl(endpoint, path), headers };
  }
  headers["content-type"] = "application/x-www-form-urlencoded";
  return { url: nodeUrl(endpoint, path), headers, body: encodeForm(body) };
}
