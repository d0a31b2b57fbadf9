import { DiscoveryError, TransportError } from "../errors/snapshotErrors.js";
import type { Logger } from "../telemetry/logger.js";
import { withSpan } from "../telemetry/tracing.js";
import { GUEST_KINDS, guestLabel, type Guest, type GuestKind, type HostnameLookup, type HypervisorEndpoint } from "../types/guest.js";
import type { NodeApi } from "../types/interfaces.js";

export interface ResolvedGuest {
  endpoint: HypervisorEndpoint;
  api: NodeApi;
  guest: Guest;
}

export interface HostResolverOptions {
  apiFor: (endpoint: HypervisorEndpoint) => NodeApi;
  logger: Logger;
}

/**
 * Finds the guest whose hostname equals the machine we are running on.
 *
 * Endpoints are searched in configured order, containers before VMs, guests in the order the
 * node lists them. The first exact match wins. Transport failures only skip the guest (or the
 * whole listing) they hit, so one unreachable cluster does not hide a match on another.
 * An aborted `signal` stops the scan before the next endpoint or guest is queried.
 */
export class HostResolver {
  private readonly logger: Logger;

  constructor(private readonly options: HostResolverOptions) {
    this.logger = options.logger.child({ component: "discovery" });
  }

  async resolve(endpoints: readonly HypervisorEndpoint[], targetHostname: string, signal?: AbortSignal): Promise<ResolvedGuest> {
    return withSpan("snapshot.resolve", { "snapshot.hostname": targetHostname }, async () => {
      for (const endpoint of endpoints) {
        signal?.throwIfAborted();
        this.logger.info(`Searching Proxmox at ${endpoint.url}...`);
        const api = this.options.apiFor(endpoint);
        for (const kind of GUEST_KINDS) {
          const guest = await this.scan(api, endpoint, kind, targetHostname, signal);
          if (guest) {
            this.logger.info(`Found ${guestLabel(kind)} ${guest.vmid} with hostname '${guest.hostname}'`);
            return { endpoint, api, guest };
          }
        }
      }
      throw new DiscoveryError(targetHostname);
    });
  }

  private async scan(
    api: NodeApi,
    endpoint: HypervisorEndpoint,
    kind: GuestKind,
    targetHostname: string,
    signal?: AbortSignal
  ): Promise<Guest | null> {
    signal?.throwIfAborted();
    let vmids: number[];
    try {
      vmids = await api.listGuests(kind);
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      this.logger.warn({ url: endpoint.url, kind }, `Unable to list ${kind} guests: ${err.message}`);
      return null;
    }

    for (const vmid of vmids) {
      signal?.throwIfAborted();
      const lookup = await this.lookupHostname(api, kind, vmid);
      if (lookup.status === "unknown") {
        this.logger.debug({ kind, vmid }, `Hostname unknown: ${lookup.reason}`);
        continue;
      }
      if (lookup.hostname === targetHostname) {
        return { kind, vmid, hostname: lookup.hostname };
      }
    }
    return null;
  }

  async lookupHostname(api: NodeApi, kind: GuestKind, vmid: number): Promise<HostnameLookup> {
    try {
      if (kind === "lxc") {
        const config = await api.getContainerConfig(vmid);
        const hostname = config.hostname;
        return typeof hostname === "string" && hostname
          ? { status: "known", hostname }
          : { status: "unknown", reason: "no hostname in container config" };
      }
      const hostname = await api.getAgentHostname(vmid);
      return hostname ? { status: "known", hostname } : { status: "unknown", reason: "guest agent returned no hostname" };
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      const reason = kind === "qemu" ? `guest agent unavailable (${err.message})` : err.message;
      return { status: "unknown", reason };
    }
  }
}
