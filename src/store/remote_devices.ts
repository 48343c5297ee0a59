import type { RemoteDevice } from "../contracts/remote_tabs";
import { createLogger, type StoreLogger } from "../logger";
import { decodeRemoteDevice } from "./row_codecs";
import type { DecodeResult } from "./row_decode_error";
import type { TransactionExecutor } from "./transaction_executor";

/**
 * Devices currently attached to the signed-in account. Owns the `remote_devices`
 * table; the tab store reads it only to decide which clients are still live.
 */
export interface RemoteDevicesRegistry {
  replaceRemoteDevices(devices: RemoteDevice[]): Promise<number>;
  getRemoteDevices(): Promise<RemoteDevice[]>;
  hasRemoteDevice(guid: string): Promise<boolean>;
}

const byLastAccessDesc = (a: RemoteDevice, b: RemoteDevice) =>
  (b.lastAccessTime ?? -1) - (a.lastAccessTime ?? -1);

export class MemoryRemoteDevicesRegistry implements RemoteDevicesRegistry {
  private devices = new Map<string, RemoteDevice>();

  async replaceRemoteDevices(devices: RemoteDevice[]): Promise<number> {
    const next = new Map<string, RemoteDevice>();
    for (const device of devices) {
      next.set(device.guid, { ...device });
    }
    this.devices = next;
    return devices.length;
  }

  async getRemoteDevices(): Promise<RemoteDevice[]> {
    return Array.from(this.devices.values(), (device) => ({ ...device })).sort(byLastAccessDesc);
  }

  async hasRemoteDevice(guid: string): Promise<boolean> {
    return this.devices.has(guid);
  }
}

export class SqliteRemoteDevicesRegistry implements RemoteDevicesRegistry {
  private log: StoreLogger;

  constructor(
    private readonly executor: TransactionExecutor,
    log: StoreLogger = createLogger()
  ) {
    this.log = log;
  }

  async replaceRemoteDevices(devices: RemoteDevice[]): Promise<number> {
    const now = Date.now();
    return this.executor.runInTransaction((conn) => {
      conn.executeChange("DELETE FROM remote_devices");
      let replaced = 0;
      for (const device of devices) {
        // A device listed twice keeps its last entry.
        conn.executeChange(
          `INSERT OR REPLACE INTO remote_devices
             (guid, name, type, is_current_device, date_created, date_modified, last_access_time)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
          [
            device.guid,
            device.name,
            device.type ?? null,
            device.isCurrentDevice ? 1 : 0,
            now,
            now,
            device.lastAccessTime ?? null,
          ]
        );
        replaced += 1;
      }
      this.log.debug({ evt: "remote_devices.replace", replaced }, "remote_devices.replace");
      return replaced;
    });
  }

  async getRemoteDevices(): Promise<RemoteDevice[]> {
    const cursor = await this.executor.runQuery(
      "SELECT * FROM remote_devices ORDER BY last_access_time DESC",
      [],
      decodeRemoteDevice
    );
    for (const failure of cursor.failures) {
      this.log.warn(
        { evt: "store.decode_skipped", ...failure.details },
        "store.decode_skipped"
      );
    }
    return cursor.asArray();
  }

  async hasRemoteDevice(guid: string): Promise<boolean> {
    const cursor = await this.executor.runQuery(
      "SELECT 1 AS present FROM remote_devices WHERE guid = ?",
      [guid],
      (row): DecodeResult<unknown> => ({ ok: true, value: row })
    );
    return cursor.length > 0;
  }
}
