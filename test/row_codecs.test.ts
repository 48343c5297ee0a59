import { describe, it, expect } from "vitest";

import {
  decodeClient,
  decodeClientGUID,
  decodeHistory,
  decodeRemoteDevice,
  decodeTab,
  encodeHistory,
  parseAbsoluteUrl,
} from "../src/store/row_codecs";
import { RowDecodeError } from "../src/store/row_decode_error";

describe("decodeClient", () => {
  it("maps a full row and drops NULL optionals", () => {
    const result = decodeClient({
      guid: "client-1",
      name: "Work laptop",
      modified: 1_700_000_000_000,
      type: "desktop",
      formfactor: null,
      os: "Linux",
      version: null,
      fxaDeviceId: "device-1",
    });

    expect(result).toEqual({
      ok: true,
      value: {
        guid: "client-1",
        name: "Work laptop",
        modified: 1_700_000_000_000,
        type: "desktop",
        os: "Linux",
        fxaDeviceId: "device-1",
      },
    });
  });

  it("reports a missing name as a missing required field", () => {
    const result = decodeClient({ guid: "client-1", modified: 1 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(RowDecodeError);
    expect(result.error.code).toBe("missing_required_field");
    expect(result.error.details.field).toBe("name");
    expect(result.error.details.entity).toBe("client");
  });

  it("reports a non-numeric modified as a malformed field", () => {
    const result = decodeClient({ guid: "client-1", name: "Phone", modified: "yesterday" });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("invalid_field");
    expect(result.error.details.field).toBe("modified");
  });

  it("rejects a negative modified timestamp", () => {
    const result = decodeClient({ name: "Phone", modified: -1 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("invalid_field");
  });
});

describe("decodeTab", () => {
  it("maps a tab row with history", () => {
    const result = decodeTab({
      id: 7,
      client_guid: "client-1",
      url: "https://docs.example/guide",
      title: "Guide",
      history: '["https://docs.example/guide","https://docs.example/"]',
      last_used: 42,
    });

    expect(result).toEqual({
      ok: true,
      value: {
        clientGUID: "client-1",
        url: "https://docs.example/guide",
        title: "Guide",
        history: ["https://docs.example/guide", "https://docs.example/"],
        lastUsed: 42,
      },
    });
  });

  it("treats a NULL client_guid as a local tab", () => {
    const result = decodeTab({
      client_guid: null,
      url: "https://local.example/",
      title: "Local",
      history: null,
      last_used: 1,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.clientGUID).toBeUndefined();
    expect(result.value.history).toEqual([]);
  });

  it("degrades malformed history to an empty list", () => {
    const result = decodeTab({
      client_guid: "client-1",
      url: "https://a.example/",
      title: "A",
      history: "{oops",
      last_used: 1,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.history).toEqual([]);
  });

  it("fails on an unparseable url", () => {
    const result = decodeTab({
      client_guid: "client-1",
      url: "not a url",
      title: "Broken",
      history: null,
      last_used: 1,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("invalid_url");
    expect(result.error.details.value).toBe("not a url");
  });

  it("fails on a missing title", () => {
    const result = decodeTab({ client_guid: null, url: "https://a.example/", last_used: 5 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("missing_required_field");
    expect(result.error.details.field).toBe("title");
  });

  it("truncates the offending value to 100 characters", () => {
    const result = decodeTab({
      client_guid: null,
      url: "x".repeat(150),
      title: "Long",
      history: null,
      last_used: 1,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.details.value).toHaveLength(100);
  });
});

describe("decodeClientGUID", () => {
  it("extracts the guid column", () => {
    expect(decodeClientGUID({ guid: "client-9" })).toEqual({ ok: true, value: "client-9" });
  });

  it("fails when the guid is not text", () => {
    const result = decodeClientGUID({ guid: 12 });
    expect(result.ok).toBe(false);
  });
});

describe("decodeRemoteDevice", () => {
  it("maps the integer flag to a boolean", () => {
    const result = decodeRemoteDevice({
      guid: "device-1",
      name: "Phone",
      type: null,
      is_current_device: 1,
      date_created: 10,
      date_modified: 10,
      last_access_time: null,
    });

    expect(result).toEqual({
      ok: true,
      value: { guid: "device-1", name: "Phone", isCurrentDevice: true },
    });
  });
});

describe("history codec", () => {
  it("encodes absolute urls as a JSON array, dropping empty, relative and repeated entries", () => {
    const encoded = encodeHistory([
      "https://a.example/",
      "",
      "relative/path",
      "https://b.example/x",
      "https://a.example/",
    ]);

    expect(encoded).toBe('["https://a.example/","https://b.example/x"]');
  });

  it("encodes an empty history as an empty array", () => {
    expect(encodeHistory([])).toBe("[]");
  });

  it("round-trips valid urls in order", () => {
    const urls = [
      "https://one.example/",
      "https://two.example/page?q=1",
      "https://one.example/",
      "bogus",
      "file:///home/user/notes.txt",
    ];

    expect(decodeHistory(encodeHistory(urls))).toEqual([
      "https://one.example/",
      "https://two.example/page?q=1",
      "file:///home/user/notes.txt",
    ]);
  });

  it("decodes absent or non-array input to an empty list", () => {
    expect(decodeHistory(undefined)).toEqual([]);
    expect(decodeHistory(null)).toEqual([]);
    expect(decodeHistory("not json")).toEqual([]);
    expect(decodeHistory('{"a":1}')).toEqual([]);
    expect(decodeHistory('"https://a.example/"')).toEqual([]);
  });

  it("decodes an array holding any non-string entry to an empty list", () => {
    expect(decodeHistory('["https://a.example/", 42]')).toEqual([]);
    expect(
      decodeHistory('["https://a.example/", 42, "nope", null, "ftp://files.example/f"]')
    ).toEqual([]);
  });

  it("drops strings that are not absolute urls", () => {
    expect(
      decodeHistory('["https://a.example/", "nope", "", "ftp://files.example/f"]')
    ).toEqual(["https://a.example/", "ftp://files.example/f"]);
  });
});

describe("parseAbsoluteUrl", () => {
  it("rejects empty and relative values", () => {
    expect(parseAbsoluteUrl("")).toBeNull();
    expect(parseAbsoluteUrl("/relative")).toBeNull();
  });

  it("parses absolute urls", () => {
    expect(parseAbsoluteUrl("https://x.example")?.href).toBe("https://x.example/");
  });
});

describe("RowDecodeError", () => {
  it("serializes with a stable error tag", () => {
    const error = new RowDecodeError({
      code: "invalid_url",
      entity: "tab",
      field: "url",
      message: "tab row has an unparseable url",
    });

    expect(error.toJSON()).toEqual({
      error: "row_decode_failed",
      code: "invalid_url",
      message: "tab row has an unparseable url",
      details: {
        code: "invalid_url",
        entity: "tab",
        field: "url",
        message: "tab row has an unparseable url",
      },
    });
  });
});
