import { pino } from "pino";
import { describe, expect, it } from "vitest";
import { FakeProxmoxNode } from "../../__tests__/fakeProxmox.js";
import { TransportError } from "../../errors/snapshotErrors.js";
import { ProxmoxNodeApi } from "../../proxmoxClient/nodeApi.js";
import { silentLogger } from "../../telemetry/logger.js";
import { extractMountPoints, MountQuiesceManager } from "../mountQuiesce.js";

const CONFIG_PATH = /^lxc\/101\/config$/;

function recordingLogger() {
  const records: Array<{ level: number; component?: string; key?: string; value?: string; msg: string }> = [];
  const logger = pino({ level: "info" }, { write: (line: string) => void records.push(JSON.parse(line)) });
  return { logger, records };
}

function setup(config: Record<string, unknown>) {
  const node = new FakeProxmoxNode().addContainer(101, { hostname: "web01", rootfs: "local-lvm:vm-101-disk-0,size=8G", ...config });
  const manager = new MountQuiesceManager(new ProxmoxNodeApi(node), silentLogger());
  return { node, manager };
}

describe("extractMountPoints", () => {
  it("keeps only mpN keys and their raw values", () => {
    const mounts = extractMountPoints({
      hostname: "web01",
      mp0: "/mnt/pve/nas/media,mp=/media,backup=0",
      mpx: "not-a-mount",
      rootfs: "local-lvm:vm-101-disk-0,size=8G",
      mp12: "local-lvm:vm-101-disk-1,mp=/srv,size=32G",
      memory: 2048
    });

    expect(mounts).toEqual([
      { key: "mp0", value: "/mnt/pve/nas/media,mp=/media,backup=0" },
      { key: "mp12", value: "local-lvm:vm-101-disk-1,mp=/srv,size=32G" }
    ]);
  });
});

describe("MountQuiesceManager", () => {
  it("returns an empty state and touches nothing when there are no mount points", async () => {
    const { node, manager } = setup({});

    const guard = await manager.quiesce(101);
    const outcomes = await guard.release();

    expect(guard.state).toEqual({ vmid: 101, removed: [] });
    expect(outcomes).toEqual([]);
    expect(node.callsTo("PUT", CONFIG_PATH)).toEqual([]);
  });

  it("removes mount points in order and restores the exact values", async () => {
    const { node, manager } = setup({ mp0: "A", mp1: "B" });

    const guard = await manager.quiesce(101);
    expect(guard.state.removed).toEqual([
      { key: "mp0", value: "A" },
      { key: "mp1", value: "B" }
    ]);
    expect(node.containers.get(101)).not.toHaveProperty("mp0");
    expect(node.containers.get(101)).not.toHaveProperty("mp1");

    const outcomes = await guard.release();

    expect(outcomes).toEqual([
      { key: "mp0", ok: true },
      { key: "mp1", ok: true }
    ]);
    expect(node.callsTo("PUT", CONFIG_PATH).map((call) => call.body)).toEqual([
      { delete: "mp0" },
      { delete: "mp1" },
      { mp0: "A" },
      { mp1: "B" }
    ]);
    expect(node.containers.get(101)).toMatchObject({ mp0: "A", mp1: "B" });
  });

  it("restores only once however often the guard is released", async () => {
    const { node, manager } = setup({ mp0: "A" });

    const guard = await manager.quiesce(101);
    await guard.release();
    await guard.release();

    expect(guard.released).toBe(true);
    expect(node.callsTo("PUT", CONFIG_PATH)).toHaveLength(2);
  });

  it("logs a restore it could not complete as a warning naming the mount point and its value", async () => {
    const node = new FakeProxmoxNode().addContainer(101, { hostname: "web01", mp0: "A", mp1: "B" });
    const { logger, records } = recordingLogger();
    const guard = await new MountQuiesceManager(new ProxmoxNodeApi(node), logger).quiesce(101);
    node.failOn("PUT", CONFIG_PATH, { when: (body) => body?.mp1 !== undefined });

    await guard.release();

    expect(records.filter((record) => record.level >= 40)).toEqual([
      expect.objectContaining({
        level: 40,
        component: "mounts",
        key: "mp1",
        value: "B",
        msg: "Failed to restore mp1: PUT lxc/101/config: connection reset"
      })
    ]);
  });

  it("keeps restoring the remaining entries when one restore fails", async () => {
    const { node, manager } = setup({ mp0: "A", mp1: "B", mp2: "C" });
    const guard = await manager.quiesce(101);
    node.failOn("PUT", CONFIG_PATH, { when: (body) => body?.mp1 !== undefined });

    const outcomes = await guard.release();

    expect(outcomes).toEqual([
      { key: "mp0", ok: true },
      { key: "mp1", ok: false, error: "PUT lxc/101/config: connection reset" },
      { key: "mp2", ok: true }
    ]);
    const restoreBodies = node.callsTo("PUT", CONFIG_PATH).slice(3).map((call) => call.body);
    expect(restoreBodies).toEqual([{ mp0: "A" }, { mp1: "B" }, { mp2: "C" }]);
    expect(node.containers.get(101)).toMatchObject({ mp0: "A", mp2: "C" });
    expect(node.containers.get(101)).not.toHaveProperty("mp1");
  });

  it("puts back already removed mount points when a removal fails", async () => {
    const { node, manager } = setup({ mp0: "A", mp1: "B" });
    node.failOn("PUT", CONFIG_PATH, { when: (body) => body?.delete === "mp1" });

    await expect(manager.quiesce(101)).rejects.toBeInstanceOf(TransportError);

    expect(node.callsTo("PUT", CONFIG_PATH).map((call) => call.body)).toEqual([{ delete: "mp0" }, { delete: "mp1" }, { mp0: "A" }]);
    expect(node.containers.get(101)).toMatchObject({ mp0: "A", mp1: "B" });
  });

  it("fails before removing anything when the config cannot be read", async () => {
    const { node, manager } = setup({ mp0: "A" });
    node.failOn("GET", CONFIG_PATH);

    await expect(manager.quiesce(101)).rejects.toBeInstanceOf(TransportError);
    expect(node.callsTo("PUT", CONFIG_PATH)).toEqual([]);
  });
});
