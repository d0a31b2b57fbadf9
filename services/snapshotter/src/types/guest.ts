export type GuestKind = "lxc" | "qemu";

export const GUEST_KINDS: readonly GuestKind[] = ["lxc", "qemu"];

export interface HypervisorEndpoint {
  url: string;
  apiToken: string;
  node: string;
  verifyTls: boolean;
}

export interface Guest {
  kind: GuestKind;
  vmid: number;
  hostname: string;
}

/**
 * Result of asking a guest for its hostname. `unknown` is not a mismatch: the guest could
 * not tell us (no hostname in its config, guest agent not running, request failed).
 */
export type HostnameLookup = { status: "known"; hostname: string } | { status: "unknown"; reason: string };

export function guestLabel(kind: GuestKind): string {
  return kind === "lxc" ? "LXC" : "QEMU VM";
}
