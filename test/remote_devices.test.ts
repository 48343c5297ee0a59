import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  MemoryRemoteDevicesRegistry,
  SqliteRemoteDevicesRegistry,
  type RemoteDevicesRegistry,
} from "../src/store/remote_devices";
import { SqliteTransactionExecutor } from "../src/store/sqlite_transaction_executor";

function testRemoteDevicesRegistry(
  registryName: string,
  createRegistry: () => { registry: RemoteDevicesRegistry; close: () => void }
) {
  describe(`Remote devices registry (${registryName})`, () => {
    let registry: RemoteDevicesRegistry;
    let close: () => void;

    beforeEach(() => {
      ({ registry, close } = createRegistry());
    });

    afterEach(() => {
      close();
    });

    it("lists devices by most recent access, never-accessed last", async () => {
      const replaced = await registry.replaceRemoteDevices([
        { guid: "device-1", name: "Laptop", type: "desktop", isCurrentDevice: true, lastAccessTime: 10 },
        { guid: "device-2", name: "Tablet", isCurrentDevice: false, lastAccessTime: 30 },
        { guid: "device-3", name: "Phone", type: "mobile", isCurrentDevice: false },
      ]);

      expect(replaced).toBe(3);
      expect(await registry.getRemoteDevices()).toEqual([
        { guid: "device-2", name: "Tablet", isCurrentDevice: false, lastAccessTime: 30 },
        { guid: "device-1", name: "Laptop", type: "desktop", isCurrentDevice: true, lastAccessTime: 10 },
        { guid: "device-3", name: "Phone", type: "mobile", isCurrentDevice: false },
      ]);
    });

    it("replaces the whole device list", async () => {
      await registry.replaceRemoteDevices([
        { guid: "device-1", name: "Laptop", isCurrentDevice: false },
        { guid: "device-2", name: "Tablet", isCurrentDevice: false },
      ]);
      await registry.replaceRemoteDevices([
        { guid: "device-3", name: "Phone", isCurrentDevice: false },
      ]);

      expect(await registry.hasRemoteDevice("device-1")).toBe(false);
      expect(await registry.hasRemoteDevice("device-3")).toBe(true);
      expect((await registry.getRemoteDevices()).map((d) => d.guid)).toEqual(["device-3"]);
    });

    it("keeps the last entry for a device listed twice", async () => {
      await registry.replaceRemoteDevices([
        { guid: "device-1", name: "Old name", isCurrentDevice: false },
        { guid: "device-1", name: "New name", isCurrentDevice: false },
      ]);

      const devices = await registry.getRemoteDevices();
      expect(devices).toHaveLength(1);
      expect(devices[0].name).toBe("New name");
    });
  });
}

testRemoteDevicesRegistry("Memory", () => ({
  registry: new MemoryRemoteDevicesRegistry(),
  close: () => {},
}));

testRemoteDevicesRegistry("SQLite", () => {
  const executor = new SqliteTransactionExecutor(":memory:");
  return {
    registry: new SqliteRemoteDevicesRegistry(executor),
    close: () => executor.close(),
  };
});
