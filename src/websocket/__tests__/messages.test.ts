import { encodeServerMessage, parseClientMessage } from "../messages";

describe("parseClientMessage", () => {
  it("parses acknowledgments", () => {
    expect(parseClientMessage('{"queued": 3}')).toEqual({ ok: true, message: { kind: "queued", seq: 3 } });
    expect(parseClientMessage('{"displaying": 4}')).toEqual({ ok: true, message: { kind: "displaying", seq: 4 } });
  });

  it("accepts the legacy displaying status", () => {
    expect(parseClientMessage('{"status": "displaying", "counter": 9}')).toEqual({
      ok: true,
      message: { kind: "displaying", seq: 9 },
    });
  });

  it("parses client info, preferring mac_address over mac", () => {
    const raw = JSON.stringify({
      client_info: { firmware_version: "1.4.0", protocol_version: 1, mac_address: "aa:bb", mac: "cc:dd", extra: true },
    });
    expect(parseClientMessage(raw)).toEqual({
      ok: true,
      message: {
        kind: "client_info",
        info: { firmwareVersion: "1.4.0", firmwareType: undefined, protocolVersion: 1, macAddress: "aa:bb" },
      },
    });
  });

  it("reports malformed frames", () => {
    expect(parseClientMessage("{")).toEqual({ ok: false, error: "invalid JSON" });
    expect(parseClientMessage('{"queued": "three"}')).toEqual({ ok: false, error: "unrecognized message" });
    expect(parseClientMessage('{"hello": 1}')).toEqual({ ok: false, error: "unrecognized message" });
  });
});

it("encodes server messages as JSON", () => {
  expect(encodeServerMessage({ dwell_secs: 10 })).toBe('{"dwell_secs":10}');
  expect(encodeServerMessage({ immediate: true })).toBe('{"immediate":true}');
});
