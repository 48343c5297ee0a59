import { z } from "zod";

// Millisecond timestamps; SQLite INTEGER columns read back as JS numbers.
export const Timestamp = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const AbsoluteUrl = z.string().url();

export const RemoteClient = z.object({
  // Absent only while a record is being assembled; upserts without one never match an UPDATE.
  guid: z.string().min(1).optional(),
  name: z.string(),
  modified: Timestamp,
  type: z.string().optional(),
  formfactor: z.string().optional(),
  os: z.string().optional(),
  version: z.string().optional(),
  fxaDeviceId: z.string().optional(),
});

export type RemoteClient = z.infer<typeof RemoteClient>;

export const RemoteTab = z.object({
  // Absent for tabs that belong to this device.
  clientGUID: z.string().min(1).optional(),
  url: AbsoluteUrl,
  title: z.string(),
  // Most recent first.
  history: z.array(z.string()),
  lastUsed: Timestamp,
  // Favicon URL for display; never written to storage.
  icon: z.string().optional(),
});

export type RemoteTab = z.infer<typeof RemoteTab>;

export type ClientAndTabs = {
  client: RemoteClient;
  tabs: RemoteTab[];
};

export const RemoteDevice = z.object({
  guid: z.string().min(1),
  name: z.string(),
  type: z.string().optional(),
  isCurrentDevice: z.boolean(),
  lastAccessTime: Timestamp.optional(),
});

export type RemoteDevice = z.infer<typeof RemoteDevice>;

export type ClientLookup = { guid: string } | { fxaDeviceId: string };
