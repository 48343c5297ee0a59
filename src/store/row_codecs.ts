import { z } from "zod";

import type { RemoteClient, RemoteDevice, RemoteTab } from "../contracts/remote_tabs";
import { RowDecodeError, type DecodeResult, type RowDecodeErrorDetails } from "./row_decode_error";

const SqlTimestamp = z.number().int().nonnegative();

const ClientRow = z.object({
  guid: z.string().nullish(),
  name: z.string(),
  modified: SqlTimestamp,
  type: z.string().nullish(),
  formfactor: z.string().nullish(),
  os: z.string().nullish(),
  version: z.string().nullish(),
  fxaDeviceId: z.string().nullish(),
});

const TabRow = z.object({
  client_guid: z.string().nullish(),
  url: z.string(),
  title: z.string(),
  history: z.unknown(),
  last_used: SqlTimestamp,
});

const RemoteDeviceRow = z.object({
  guid: z.string(),
  name: z.string(),
  type: z.string().nullish(),
  is_current_device: z.number().int(),
  last_access_time: SqlTimestamp.nullish(),
});

export function parseAbsoluteUrl(value: string): URL | null {
  if (value.length === 0) return null;
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

const toDecodeError = (
  entity: RowDecodeErrorDetails["entity"],
  error: z.ZodError
): RowDecodeError => {
  const issue = error.issues[0];
  const field = issue?.path.map(String).join(".") || undefined;
  const missing =
    issue?.code === "invalid_type" && (issue.received === "undefined" || issue.received === "null");
  return new RowDecodeError({
    code: missing ? "missing_required_field" : "invalid_field",
    entity,
    field,
    message: missing
      ? `${entity} row is missing required field ${field ?? "(unknown)"}`
      : `${entity} row has malformed field ${field ?? "(unknown)"}: ${issue?.message ?? "invalid"}`,
  });
};

export function decodeClient(row: unknown): DecodeResult<RemoteClient> {
  const parsed = ClientRow.safeParse(row);
  if (!parsed.success) {
    return { ok: false, error: toDecodeError("client", parsed.error) };
  }
  const data = parsed.data;
  return {
    ok: true,
    value: {
      guid: data.guid ?? undefined,
      name: data.name,
      modified: data.modified,
      type: data.type ?? undefined,
      formfactor: data.formfactor ?? undefined,
      os: data.os ?? undefined,
      version: data.version ?? undefined,
      fxaDeviceId: data.fxaDeviceId ?? undefined,
    },
  };
}

export function decodeTab(row: unknown): DecodeResult<RemoteTab> {
  const parsed = TabRow.safeParse(row);
  if (!parsed.success) {
    return { ok: false, error: toDecodeError("tab", parsed.error) };
  }
  const data = parsed.data;
  if (!parseAbsoluteUrl(data.url)) {
    return {
      ok: false,
      error: new RowDecodeError({
        code: "invalid_url",
        entity: "tab",
        field: "url",
        value: data.url,
        message: "tab row has an unparseable url",
      }),
    };
  }
  return {
    ok: true,
    value: {
      clientGUID: data.client_guid ?? undefined,
      url: data.url,
      title: data.title,
      history: decodeHistory(data.history),
      lastUsed: data.last_used,
    },
  };
}

const GuidRow = z.object({ guid: z.string() });

export function decodeClientGUID(row: unknown): DecodeResult<string> {
  const parsed = GuidRow.safeParse(row);
  if (!parsed.success) {
    return { ok: false, error: toDecodeError("client", parsed.error) };
  }
  return { ok: true, value: parsed.data.guid };
}

export function decodeRemoteDevice(row: unknown): DecodeResult<RemoteDevice> {
  const parsed = RemoteDeviceRow.safeParse(row);
  if (!parsed.success) {
    return { ok: false, error: toDecodeError("remote_device", parsed.error) };
  }
  const data = parsed.data;
  return {
    ok: true,
    value: {
      guid: data.guid,
      name: data.name,
      type: data.type ?? undefined,
      isCurrentDevice: data.is_current_device !== 0,
      lastAccessTime: data.last_access_time ?? undefined,
    },
  };
}

/**
 * Serializes a tab's back-history as a JSON array of URL strings.
 * Empty, relative and repeated entries are dropped; the first occurrence keeps its position.
 */
export function encodeHistory(history: readonly string[]): string | null {
  const seen = new Set<string>();
  const urls: string[] = [];
  for (const entry of history) {
    if (seen.has(entry) || !parseAbsoluteUrl(entry)) continue;
    seen.add(entry);
    urls.push(entry);
  }
  try {
    return JSON.stringify(urls);
  } catch {
    return null;
  }
}

/**
 * Inverse of {@link encodeHistory}. Never throws: anything that is not a JSON array
 * of strings decodes to `[]`, and strings that are not absolute URLs are left out.
 */
export function decodeHistory(value: unknown): string[] {
  if (typeof value !== "string") return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  const urls: string[] = [];
  for (const entry of parsed) {
    // One non-string entry invalidates the whole column.
    if (typeof entry !== "string") return [];
    if (parseAbsoluteUrl(entry) !== null) urls.push(entry);
  }
  return urls;
}
