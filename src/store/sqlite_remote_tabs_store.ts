import type {
  ClientAndTabs,
  ClientLookup,
  RemoteClient,
  RemoteTab,
} from "../contracts/remote_tabs";
import { createLogger, type StoreLogger } from "../logger";
import { groupClientsAndTabs, type RemoteClientsAndTabsStore } from "./remote_tabs_store";
import { decodeClient, decodeClientGUID, decodeTab, encodeHistory } from "./row_codecs";
import type { DecodeErrorPolicy } from "./row_decode_error";
import type { Cursor, TransactionExecutor } from "./transaction_executor";

export type SqliteRemoteClientsAndTabsStoreOptions = {
  log?: StoreLogger;
  // What a read does with a row that fails to decode.
  decodeErrorPolicy?: DecodeErrorPolicy;
};

const INSERT_TAB = `
  INSERT INTO tabs (client_guid, url, title, history, last_used)
  VALUES (?, ?, ?, ?, ?)
`;

const UPDATE_CLIENT = `
  UPDATE clients
  SET name = ?, modified = ?, type = ?, formfactor = ?, os = ?, version = ?, fxaDeviceId = ?
  WHERE guid = ?
`;

const INSERT_CLIENT = `
  INSERT INTO clients (guid, name, modified, type, formfactor, os, version, fxaDeviceId)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?)
`;

const SELECT_REGISTERED_CLIENTS = `
  SELECT * FROM clients
  WHERE EXISTS (SELECT 1 FROM remote_devices rd WHERE rd.guid = fxaDeviceId)
  ORDER BY modified DESC
`;

const SELECT_REMOTE_TABS = `
  SELECT * FROM tabs
  WHERE client_guid IS NOT NULL
  ORDER BY client_guid DESC, last_used DESC
`;

export class SqliteRemoteClientsAndTabsStore implements RemoteClientsAndTabsStore {
  private log: StoreLogger;
  private decodeErrorPolicy: DecodeErrorPolicy;

  constructor(
    private readonly executor: TransactionExecutor,
    options: SqliteRemoteClientsAndTabsStoreOptions = {}
  ) {
    this.log = options.log ?? createLogger();
    this.decodeErrorPolicy = options.decodeErrorPolicy ?? "skip";
  }

  async wipeRemoteTabs(): Promise<void> {
    await this.executor.runStatement("DELETE FROM tabs WHERE client_guid IS NOT NULL");
  }

  async wipeTabs(): Promise<void> {
    await this.executor.runStatement("DELETE FROM tabs");
  }

  async replaceTabs(clientGUID: string | null, tabs: RemoteTab[]): Promise<number> {
    return this.executor.runInTransaction((conn) => {
      // IS rather than = so that a null owner matches the local tabs.
      conn.executeChange("DELETE FROM tabs WHERE client_guid IS ?", [clientGUID]);

      let inserted = 0;
      for (const tab of tabs) {
        const previousRowId = conn.lastInsertedRowId();
        conn.executeChange(INSERT_TAB, [
          tab.clientGUID ?? null,
          tab.url,
          tab.title,
          encodeHistory(tab.history),
          tab.lastUsed,
        ]);

        if (conn.lastInsertedRowId() === previousRowId) {
          this.log.warn(
            { evt: "tabs.insert_no_effect", clientGUID, url: tab.url },
            "tabs.insert_no_effect"
          );
        } else {
          inserted += 1;
        }
      }

      this.log.debug(
        { evt: "tabs.replace", clientGUID, requested: tabs.length, inserted },
        "tabs.replace"
      );
      return inserted;
    });
  }

  async insertOrUpdateTabs(tabs: RemoteTab[]): Promise<number> {
    return this.replaceTabs(null, tabs);
  }

  async upsertClients(clients: RemoteClient[]): Promise<number> {
    return this.executor.runInTransaction((conn) => {
      let updated = 0;
      let inserted = 0;

      for (const client of clients) {
        const update = conn.executeChange(UPDATE_CLIENT, [
          client.name,
          client.modified,
          client.type ?? null,
          client.formfactor ?? null,
          client.os ?? null,
          client.version ?? null,
          client.fxaDeviceId ?? null,
          client.guid ?? null,
        ]);

        if (update.changes > 0) {
          updated += 1;
          continue;
        }

        const previousRowId = conn.lastInsertedRowId();
        conn.executeChange(INSERT_CLIENT, [
          client.guid ?? null,
          client.name,
          client.modified,
          client.type ?? null,
          client.formfactor ?? null,
          client.os ?? null,
          client.version ?? null,
          client.fxaDeviceId ?? null,
        ]);
        if (conn.lastInsertedRowId() === previousRowId) {
          this.log.warn(
            { evt: "clients.insert_no_effect", guid: client.guid ?? null },
            "clients.insert_no_effect"
          );
        }
        inserted += 1;
      }

      this.log.debug({ evt: "clients.upsert", updated, inserted }, "clients.upsert");
      return clients.length;
    });
  }

  async upsertClient(client: RemoteClient): Promise<number> {
    return this.upsertClients([client]);
  }

  async deleteClient(guid: string): Promise<void> {
    await this.executor.runInTransaction((conn) => {
      conn.executeChange("DELETE FROM clients WHERE guid = ?", [guid]);
      conn.executeChange("DELETE FROM tabs WHERE client_guid = ?", [guid]);
    });
  }

  async getClient(lookup: ClientLookup): Promise<RemoteClient | null> {
    const cursor =
      "guid" in lookup
        ? await this.executor.runQuery("SELECT * FROM clients WHERE guid = ?", [lookup.guid], decodeClient)
        : await this.executor.runQuery(
            "SELECT * FROM clients WHERE fxaDeviceId = ?",
            [lookup.fxaDeviceId],
            decodeClient
          );
    return this.collect(cursor, "getClient")[0] ?? null;
  }

  async getClientGUIDs(): Promise<Set<string>> {
    const cursor = await this.executor.runQuery(
      "SELECT guid FROM clients WHERE guid IS NOT NULL",
      [],
      decodeClientGUID
    );
    return new Set(this.collect(cursor, "getClientGUIDs"));
  }

  async getTabsForClient(guid: string | null): Promise<RemoteTab[]> {
    const cursor =
      guid === null
        ? await this.executor.runQuery("SELECT * FROM tabs WHERE client_guid IS NULL", [], decodeTab)
        : await this.executor.runQuery("SELECT * FROM tabs WHERE client_guid = ?", [guid], decodeTab);
    const tabs = this.collect(cursor, "getTabsForClient");
    this.log.debug(
      { evt: "tabs.read", clientGUID: guid, count: tabs.length },
      "tabs.read"
    );
    return tabs;
  }

  async getClientsAndTabs(): Promise<ClientAndTabs[]> {
    // Two reads on one connection, no transaction: a write landing between them is tolerated.
    const { clients, tabs } = await this.executor.withRawConnection((conn) => ({
      clients: conn.executeQuery(SELECT_REGISTERED_CLIENTS, [], decodeClient),
      tabs: conn.executeQuery(SELECT_REMOTE_TABS, [], decodeTab),
    }));

    return groupClientsAndTabs(
      this.collect(clients, "getClientsAndTabs.clients"),
      this.collect(tabs, "getClientsAndTabs.tabs"),
      this.log
    );
  }

  async resetClient(): Promise<void> {
    // Nothing beyond the synced records to reset.
    return this.clear();
  }

  async clear(): Promise<void> {
    await this.executor.runInTransaction((conn) => {
      conn.executeChange("DELETE FROM tabs WHERE client_guid IS NOT NULL");
      conn.executeChange("DELETE FROM clients");
    });
  }

  private collect<T>(cursor: Cursor<T>, query: string): T[] {
    for (const failure of cursor.failures) {
      if (this.decodeErrorPolicy === "abort") {
        this.log.error(
          { evt: "store.decode_failed", query, ...failure.details },
          "store.decode_failed"
        );
        throw failure;
      }
      this.log.warn(
        { evt: "store.decode_skipped", query, ...failure.details },
        "store.decode_skipped"
      );
    }
    return cursor.asArray();
  }
}
