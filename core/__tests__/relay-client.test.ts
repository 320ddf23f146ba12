import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { hexToBytes } from "@noble/hashes/utils";
import { finalizeEvent, isValidRelayUrl, RelayClient, DEFAULT_RELAY_TIMEOUTS } from "../src/nostr/index.js";
import { RelayError } from "../src/errors/index.js";
import { startFakeRelay, UNREACHABLE_RELAY, type FakeRelay, type FakeRelayMode } from "./helpers/fake-relay.js";

const SECRET = hexToBytes("00000000000000000000000000000000000000000000000000000000000000a1");
const event = finalizeEvent({ kind: 1, content: "relay test", created_at: 1700000000 }, SECRET);

describe("RelayClient", () => {
  const relays: FakeRelay[] = [];
  const client = new RelayClient({ connectTimeoutMs: 2_000, ackTimeoutMs: 300, probeReadTimeoutMs: 300 });

  async function relay(mode: FakeRelayMode): Promise<FakeRelay> {
    const started = await startFakeRelay(mode);
    relays.push(started);
    return started;
  }

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await Promise.all(relays.splice(0).map((r) => r.stop()));
  });

  it("should merge partial timeouts over the defaults", () => {
    expect(client.settings).toEqual({
      connectTimeoutMs: 2_000,
      ackTimeoutMs: 300,
      probeConnectTimeoutMs: DEFAULT_RELAY_TIMEOUTS.probeConnectTimeoutMs,
      probeReadTimeoutMs: 300,
    });
  });

  describe("publishOrThrow()", () => {
    it("should send an EVENT frame and resolve on OK true", async () => {
      const r = await relay({ kind: "accept" });
      await client.publishOrThrow(r.url, event);

      expect(r.received).toHaveLength(1);
      expect(r.received[0][0]).toBe("EVENT");
      expect(r.received[0][1]).toEqual(JSON.parse(JSON.stringify(event)));
    });

    it("should surface the relay's rejection reason", async () => {
      const r = await relay({ kind: "reject", reason: "rate-limited: slow down" });
      const err = await client.publishOrThrow(r.url, event).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RelayError);
      if (!(err instanceof RelayError)) return;
      expect(err.code).toBe("rejected");
      expect(err.reason).toBe("rate-limited: slow down");
      expect(err.reasonPrefix).toBe("rate-limited");
      expect(err.message).toBe(`${r.url} rejected event: rate-limited: slow down`);
    });

    it("should ignore garbage and OKs for other events", async () => {
      const r = await relay({ kind: "noisy" });
      await expect(client.publishOrThrow(r.url, event)).resolves.toBeUndefined();
    });

    it("should time out when no OK arrives", async () => {
      const r = await relay({ kind: "silent" });
      await expect(client.publishOrThrow(r.url, event)).rejects.toThrow(`No OK from ${r.url} within 300ms`);
    });

    it("should fail when the relay hangs up before acknowledging", async () => {
      const r = await relay({ kind: "close" });
      await expect(client.publishOrThrow(r.url, event)).rejects.toThrow(
        `${r.url} closed the connection before acknowledging`,
      );
    });

    it("should fail to connect to an unreachable relay", async () => {
      const err = await client.publishOrThrow(UNREACHABLE_RELAY, event).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(RelayError);
      if (!(err instanceof RelayError)) return;
      expect(err.code).toBe("connect-failed");
      expect(err.relayUrl).toBe(UNREACHABLE_RELAY);
    });

    it("should refuse URLs that are not ws or wss", async () => {
      await expect(client.publishOrThrow("https://relay.example.com", event)).rejects.toThrow(
        "Invalid relay URL: https://relay.example.com",
      );
    });
  });

  describe("publish()", () => {
    it("should report success and failure as booleans", async () => {
      const ok = await relay({ kind: "accept" });
      expect(await client.publish(ok.url, event)).toBe(true);
      expect(await client.publish(UNREACHABLE_RELAY, event)).toBe(false);
    });
  });

  describe("publishToAll()", () => {
    it("should count accepting relays and keep per-relay errors", async () => {
      const a = await relay({ kind: "accept" });
      const c = await relay({ kind: "accept" });

      const summary = await client.publishToAll([a.url, UNREACHABLE_RELAY, c.url], event);

      expect(summary.successCount).toBe(2);
      expect(summary.accepted).toEqual([a.url, c.url]);
      expect(Object.keys(summary.perRelayErrors)).toEqual([UNREACHABLE_RELAY]);
      expect(summary.failures).toHaveLength(1);
      expect(summary.failures[0].relayUrl).toBe(UNREACHABLE_RELAY);
    });

    it("should publish once per distinct URL", async () => {
      const a = await relay({ kind: "accept" });
      const summary = await client.publishToAll([a.url, a.url], event);

      expect(summary.successCount).toBe(1);
      expect(a.received).toHaveLength(1);
    });

    it("should return zero successes when every relay fails", async () => {
      const r = await relay({ kind: "reject", reason: "blocked: no" });
      const summary = await client.publishToAll([r.url, UNREACHABLE_RELAY], event);

      expect(summary.successCount).toBe(0);
      expect(summary.perRelayErrors[r.url]).toBe(`${r.url} rejected event: blocked: no`);
    });
  });

  describe("testConnection()", () => {
    it("should treat any reply to a REQ as reachable", async () => {
      const r = await relay({ kind: "silent" });
      expect(await client.testConnection(r.url)).toBe(true);
      expect(r.received[0][0]).toBe("REQ");
      expect(r.received[0][2]).toEqual({ kinds: [1], limit: 1 });
    });

    it("should report unreachable relays and invalid URLs", async () => {
      expect(await client.testConnection(UNREACHABLE_RELAY)).toBe(false);
      expect(await client.testConnection("not a url")).toBe(false);
    });
  });
});

describe("isValidRelayUrl()", () => {
  it("should accept ws and wss URLs only", () => {
    expect(isValidRelayUrl("wss://relay.damus.io")).toBe(true);
    expect(isValidRelayUrl("ws://localhost:7777")).toBe(true);
    expect(isValidRelayUrl("http://relay.damus.io")).toBe(false);
    expect(isValidRelayUrl("relay.damus.io")).toBe(false);
  });
});
