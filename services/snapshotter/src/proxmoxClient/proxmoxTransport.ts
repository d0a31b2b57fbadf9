import { Agent, request, type Dispatcher } from "undici";
import { TransportError, errorMessage } from "../errors/snapshotErrors.js";
import type { HypervisorEndpoint } from "../types/guest.js";
import type { FormBody, HttpMethod, ProxmoxTransport } from "../types/interfaces.js";
import { buildRequest } from "./httpRequest.js";
import { readEnvelope } from "./httpResponse.js";

export interface ProxmoxTransportOptions {
  timeoutMs?: number;
  /** Overrides the per-endpoint connection pool (tests pass a MockAgent). */
  dispatcher?: Dispatcher;
}

export class UndiciProxmoxTransport implements ProxmoxTransport {
  private readonly dispatcher: Dispatcher;

  constructor(
    private readonly endpoint: HypervisorEndpoint,
    options: ProxmoxTransportOptions = {}
  ) {
    const timeoutMs = options.timeoutMs ?? 30_000;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        // Nodes usually serve the self-signed certificate generated at install time.
        connect: { rejectUnauthorized: endpoint.verifyTls },
        connectTimeout: timeoutMs,
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs
      });
  }

  async request(method: HttpMethod, path: string, body?: FormBody): Promise<unknown> {
    const built = buildRequest(this.endpoint, method, path, body);
    let statusCode: number;
    let text: string;
    try {
      const response = await request(built.url, {
        method,
        headers: built.headers,
        body: built.body,
        dispatcher: this.dispatcher
      });
      statusCode = response.statusCode;
      text = await response.body.text();
    } catch (err) {
      throw new TransportError(method, path, `request to ${this.endpoint.url} failed: ${errorMessage(err)}`, { cause: err });
    }
    return readEnvelope(method, path, statusCode, text);
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}

/** One transport (and connection pool) per configured endpoint, shared by every caller. */
export function createTransportFactory(options: ProxmoxTransportOptions = {}) {
  const transports = new Map<HypervisorEndpoint, UndiciProxmoxTransport>();
  return {
    transportFor(endpoint: HypervisorEndpoint): ProxmoxTransport {
      let transport = transports.get(endpoint);
      if (!transport) {
        transport = new UndiciProxmoxTransport(endpoint, options);
        transports.set(endpoint, transport);
      }
      return transport;
    },
    async closeAll(): Promise<void> {
      const open = [...transports.values()];
      transports.clear();
      await Promise.allSettled(open.map((transport) => transport.close()));
    }
  };
}
