import type {
  ClientAndTabs,
  ClientLookup,
  RemoteClient,
  RemoteTab,
} from "../contracts/remote_tabs";
import { createLogger, type StoreLogger } from "../logger";
import type { RemoteDevicesRegistry } from "./remote_devices";
import { decodeHistory, encodeHistory } from "./row_codecs";

export interface RemoteClientsAndTabs {
  // Tabs owned by remote clients; local tabs survive.
  wipeRemoteTabs(): Promise<void>;
  wipeTabs(): Promise<void>;

  /**
   * Replaces every tab owned by `clientGUID` (`null` = local tabs) with `tabs`.
   * Each tab's own `clientGUID` is written as given.
   * Resolves to the number of rows actually inserted.
   */
  replaceTabs(clientGUID: string | null, tabs: RemoteTab[]): Promise<number>;
  insertOrUpdateTabs(tabs: RemoteTab[]): Promise<number>;

  // Resolves to the number of clients processed, updates and inserts alike.
  upsertClients(clients: RemoteClient[]): Promise<number>;
  upsertClient(client: RemoteClient): Promise<number>;
  deleteClient(guid: string): Promise<void>;

  getClient(lookup: ClientLookup): Promise<RemoteClient | null>;
  getClientGUIDs(): Promise<Set<string>>;
  getTabsForClient(guid: string | null): Promise<RemoteTab[]>;

  /**
   * Clients that are still registered remote devices, most recently modified first,
   * each with its tabs most recently used first.
   */
  getClientsAndTabs(): Promise<ClientAndTabs[]>;
}

export interface ResettableSyncStorage {
  resetClient(): Promise<void>;
  clear(): Promise<void>;
}

export type RemoteClientsAndTabsStore = RemoteClientsAndTabs & ResettableSyncStorage;

export function groupClientsAndTabs(
  clients: RemoteClient[],
  tabs: RemoteTab[],
  log?: StoreLogger
): ClientAndTabs[] {
  const byClient = new Map<string, RemoteTab[]>();
  for (const tab of tabs) {
    if (!tab.clientGUID) {
      log?.error({ evt: "tabs.orphan_local_tab", url: tab.url }, "tabs.orphan_local_tab");
      continue;
    }
    const group = byClient.get(tab.clientGUID);
    if (group) {
      group.push(tab);
    } else {
      byClient.set(tab.clientGUID, [tab]);
    }
  }

  return clients.map((client) => ({
    client,
    tabs: (client.guid ? byClient.get(client.guid) : undefined) ?? [],
  }));
}

type StoredTab = Omit<RemoteTab, "icon">;

const toStoredTab = (tab: RemoteTab): StoredTab => ({
  clientGUID: tab.clientGUID,
  url: tab.url,
  title: tab.title,
  history: decodeHistory(encodeHistory(tab.history)),
  lastUsed: tab.lastUsed,
});

// BINARY collation order, reversed.
const textDescending = (a: string, b: string) => (a < b ? 1 : a > b ? -1 : 0);

export class MemoryRemoteClientsAndTabsStore implements RemoteClientsAndTabsStore {
  private clients: RemoteClient[] = [];
  private tabs: StoredTab[] = [];
  private log: StoreLogger;

  constructor(
    private readonly devices: RemoteDevicesRegistry,
    log: StoreLogger = createLogger()
  ) {
    this.log = log;
  }

  async wipeRemoteTabs(): Promise<void> {
    this.tabs = this.tabs.filter((tab) => !tab.clientGUID);
  }

  async wipeTabs(): Promise<void> {
    this.tabs = [];
  }

  async replaceTabs(clientGUID: string | null, tabs: RemoteTab[]): Promise<number> {
    const kept = this.tabs.filter((tab) => (tab.clientGUID ?? null) !== clientGUID);
    this.tabs = [...kept, ...tabs.map(toStoredTab)];
    this.log.debug(
      { evt: "tabs.replace", clientGUID, inserted: tabs.length },
      "tabs.replace"
    );
    return tabs.length;
  }

  async insertOrUpdateTabs(tabs: RemoteTab[]): Promise<number> {
    return this.replaceTabs(null, tabs);
  }

  async upsertClients(clients: RemoteClient[]): Promise<number> {
    let updated = 0;
    let inserted = 0;
    const next = [...this.clients];
    for (const client of clients) {
      const index = client.guid ? next.findIndex((c) => c.guid === client.guid) : -1;
      if (index >= 0) {
        next[index] = { ...client };
        updated += 1;
      } else {
        next.push({ ...client });
        inserted += 1;
      }
    }
    this.clients = next;
    this.log.debug({ evt: "clients.upsert", updated, inserted }, "clients.upsert");
    return clients.length;
  }

  async upsertClient(client: RemoteClient): Promise<number> {
    return this.upsertClients([client]);
  }

  async deleteClient(guid: string): Promise<void> {
    this.clients = this.clients.filter((client) => client.guid !== guid);
    this.tabs = this.tabs.filter((tab) => tab.clientGUID !== guid);
  }

  async getClient(lookup: ClientLookup): Promise<RemoteClient | null> {
    const match = this.clients.find((client) =>
      "guid" in lookup ? client.guid === lookup.guid : client.fxaDeviceId === lookup.fxaDeviceId
    );
    return match ? { ...match } : null;
  }

  async getClientGUIDs(): Promise<Set<string>> {
    const guids = new Set<string>();
    for (const client of this.clients) {
      if (client.guid) guids.add(client.guid);
    }
    return guids;
  }

  async getTabsForClient(guid: string | null): Promise<RemoteTab[]> {
    return this.tabs
      .filter((tab) => (tab.clientGUID ?? null) === guid)
      .map((tab) => ({ ...tab, history: [...tab.history] }));
  }

  async getClientsAndTabs(): Promise<ClientAndTabs[]> {
    const registered: RemoteClient[] = [];
    for (const client of this.clients) {
      if (client.fxaDeviceId && (await this.devices.hasRemoteDevice(client.fxaDeviceId))) {
        registered.push({ ...client });
      }
    }
    registered.sort((a, b) => b.modified - a.modified);

    const remoteTabs = this.tabs
      .filter((tab) => Boolean(tab.clientGUID))
      .map((tab) => ({ ...tab, history: [...tab.history] }))
      .sort(
        (a, b) =>
          textDescending(a.clientGUID ?? "", b.clientGUID ?? "") || b.lastUsed - a.lastUsed
      );

    return groupClientsAndTabs(registered, remoteTabs, this.log);
  }

  async resetClient(): Promise<void> {
    return this.clear();
  }

  async clear(): Promise<void> {
    this.tabs = this.tabs.filter((tab) => !tab.clientGUID);
    this.clients = [];
  }
}
