import { z } from "zod";

import {
  AbsoluteUrl,
  Timestamp,
  type RemoteClient,
  type RemoteDevice,
  type RemoteTab,
} from "../contracts/remote_tabs";

// Snake_case request/response shapes for the HTTP surface.

export const ClientWireSchema = z.object({
  guid: z.string().min(1),
  name: z.string(),
  modified: Timestamp,
  type: z.string().optional(),
  formfactor: z.string().optional(),
  os: z.string().optional(),
  version: z.string().optional(),
  fxa_device_id: z.string().optional(),
}).strict();

export const TabWireSchema = z.object({
  url: AbsoluteUrl,
  title: z.string(),
  history: z.array(z.string()).default([]),
  last_used: Timestamp,
  icon: z.string().optional(),
}).strict();

export const RemoteDeviceWireSchema = z.object({
  guid: z.string().min(1),
  name: z.string(),
  type: z.string().optional(),
  is_current_device: z.boolean().default(false),
  last_access_time: Timestamp.optional(),
}).strict();

export const clientFromWire = (wire: z.infer<typeof ClientWireSchema>): RemoteClient => ({
  guid: wire.guid,
  name: wire.name,
  modified: wire.modified,
  type: wire.type,
  formfactor: wire.formfactor,
  os: wire.os,
  version: wire.version,
  fxaDeviceId: wire.fxa_device_id,
});

export const tabFromWire = (
  clientGUID: string | undefined,
  wire: z.infer<typeof TabWireSchema>
): RemoteTab => ({
  clientGUID,
  url: wire.url,
  title: wire.title,
  history: wire.history,
  lastUsed: wire.last_used,
  icon: wire.icon,
});

export const remoteDeviceFromWire = (
  wire: z.infer<typeof RemoteDeviceWireSchema>
): RemoteDevice => ({
  guid: wire.guid,
  name: wire.name,
  type: wire.type,
  isCurrentDevice: wire.is_current_device,
  lastAccessTime: wire.last_access_time,
});

export const clientToWire = (client: RemoteClient) => ({
  guid: client.guid ?? null,
  name: client.name,
  modified: client.modified,
  type: client.type ?? null,
  formfactor: client.formfactor ?? null,
  os: client.os ?? null,
  version: client.version ?? null,
  fxa_device_id: client.fxaDeviceId ?? null,
});

export const tabToWire = (tab: RemoteTab) => ({
  client_guid: tab.clientGUID ?? null,
  url: tab.url,
  title: tab.title,
  history: tab.history,
  last_used: tab.lastUsed,
});

export const remoteDeviceToWire = (device: RemoteDevice) => ({
  guid: device.guid,
  name: device.name,
  type: device.type ?? null,
  is_current_device: device.isCurrentDevice,
  last_access_time: device.lastAccessTime ?? null,
});
