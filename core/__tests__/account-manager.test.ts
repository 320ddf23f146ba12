import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { AccountManager } from "../src/accounts/account-manager.js";
import { SqliteStorage } from "../src/storage/index.js";
import { MockPlatformService } from "../src/platforms/index.js";
import { AccountManagerError } from "../src/errors/index.js";
import type { PlatformId } from "../src/models/index.js";

describe("SqliteStorage", () => {
  let storage: SqliteStorage;

  beforeEach(() => {
    storage = new SqliteStorage(":memory:");
  });

  afterEach(async () => {
    await storage.close();
  });

  it("should store, replace and delete values", async () => {
    expect(await storage.get("a")).toBeNull();
    await storage.set("a", "1");
    await storage.set("a", "2");
    expect(await storage.get("a")).toBe("2");
    await storage.delete("a");
    expect(await storage.get("a")).toBeNull();
  });

  it("should list by prefix in key order with metadata", async () => {
    await storage.set("account:b", "B", { platform: "nostr" });
    await storage.set("account:a", "A");
    await storage.set("credentials:a", "secret");

    const entries = await storage.list("account:");
    expect(entries.map((e) => e.key)).toEqual(["account:a", "account:b"]);
    expect(entries[0].metadata).toBeUndefined();
    expect(entries[1].metadata).toEqual({ platform: "nostr" });
    expect(entries[1].updatedAt).toBeInstanceOf(Date);
  });

  it("should treat LIKE wildcards in the prefix literally", async () => {
    await storage.set("a_b", "1");
    await storage.set("axb", "2");
    await storage.set("100%", "3");
    await storage.set("1000", "4");

    expect((await storage.list("a_")).map((e) => e.key)).toEqual(["a_b"]);
    expect((await storage.list("100%")).map((e) => e.key)).toEqual(["100%"]);
  });
});

describe("AccountManager", () => {
  let storage: SqliteStorage;
  let nostr: MockPlatformService;
  let manager: AccountManager;

  function services(): Map<PlatformId, MockPlatformService> {
    return new Map<PlatformId, MockPlatformService>([["nostr", nostr]]);
  }

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    storage = new SqliteStorage(":memory:");
    nostr = new MockPlatformService({ platform: "nostr", requiredCredentialFields: ["private_key"] });
    manager = new AccountManager(storage, services());
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await storage.close();
  });

  const newNostr = {
    platform: "nostr" as const,
    displayName: "Main",
    username: "npub1main",
    credentials: { private_key: "test-secret", relays: ["wss://relay.example.com"] },
  };

  it("should hand out copies of the account list", async () => {
    const account = await manager.addAccount(newNostr);

    const listed = manager.all;
    listed.pop();

    expect(listed).toHaveLength(0);
    expect(manager.all).toEqual([account]);
    expect(manager.getAccountById(account.id)).toBe(account);
  });

  it("should add an account with a fresh id and persist it", async () => {
    const account = await manager.addAccount(newNostr);

    expect(account.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(account.isActive).toBe(true);
    expect(manager.all).toEqual([account]);

    const reloaded = new AccountManager(storage, services());
    const [restored] = await reloaded.loadAccounts();
    expect(reloaded.isLoaded).toBe(true);
    expect(restored.id).toBe(account.id);
    expect(restored.getStringCredential("private_key")).toBe("test-secret");
    expect(restored.getListCredential("relays")).toEqual(["wss://relay.example.com"]);
  });

  it("should keep credentials out of the account record", async () => {
    const account = await manager.addAccount(newNostr);
    const stored = await storage.get(`account:${account.id}`);
    expect(stored).not.toBeNull();
    expect(stored).not.toContain("test-secret");
    expect(await storage.get(`credentials:${account.id}`)).toBe(
      JSON.stringify({ private_key: "test-secret", relays: ["wss://relay.example.com"] }),
    );
  });

  it("should refuse accounts missing required credentials", async () => {
    await expect(manager.addAccount({ ...newNostr, credentials: {} })).rejects.toThrow(
      "Missing required credentials for Nostr: private_key",
    );
    expect(manager.all).toHaveLength(0);
  });

  it("should refuse platforms without a service", async () => {
    await expect(manager.addAccount({ ...newNostr, platform: "bluesky" })).rejects.toThrow(
      "Unsupported platform: Bluesky",
    );
  });

  it("should refuse accounts that fail validation unless told to skip it", async () => {
    nostr = new MockPlatformService({ platform: "nostr", shouldSucceed: false });
    manager = new AccountManager(storage, services());

    const err = await manager.addAccount(newNostr).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AccountManagerError);
    expect(err).toHaveProperty("message", "Account authentication failed");

    const saved = await manager.addAccount({ ...newNostr, validate: false });
    expect(manager.all).toEqual([saved]);
  });

  it("should enable, disable and look up accounts", async () => {
    const first = await manager.addAccount(newNostr);
    const second = await manager.addAccount({ ...newNostr, username: "npub1second" });

    expect(manager.getDefaultAccountForPlatform("nostr")?.id).toBe(first.id);

    const disabled = await manager.setAccountActive(first.id, false);
    expect(disabled.isActive).toBe(false);
    expect(disabled.getStringCredential("private_key")).toBe("test-secret");
    expect(manager.getActiveAccountsForPlatform("nostr").map((a) => a.id)).toEqual([second.id]);
    expect(manager.getDefaultAccountForPlatform("nostr")?.id).toBe(second.id);
    expect(manager.getAccountsForPlatform("nostr")).toHaveLength(2);
    expect(manager.getAccountById(first.id)?.isActive).toBe(false);

    const reloaded = new AccountManager(storage, services());
    await reloaded.loadAccounts();
    expect(reloaded.getAccountById(first.id)?.isActive).toBe(false);
  });

  it("should remove the account and its credentials", async () => {
    const account = await manager.addAccount(newNostr);
    await manager.removeAccount(account.id);

    expect(manager.all).toHaveLength(0);
    expect(await storage.get(`account:${account.id}`)).toBeNull();
    expect(await storage.get(`credentials:${account.id}`)).toBeNull();
  });

  it("should report unknown ids", async () => {
    await expect(manager.removeAccount("missing")).rejects.toThrow("Account not found: missing");
    await expect(manager.setAccountActive("missing", true)).rejects.toThrow("Account not found: missing");
  });

  it("should skip unreadable records when loading", async () => {
    const good = await manager.addAccount(newNostr);
    await storage.set("account:broken", "{not json");
    await storage.set("account:unknown", JSON.stringify({ id: "unknown", platform: "myspace" }));

    const loaded = await new AccountManager(storage, services()).loadAccounts();

    expect(loaded.map((a) => a.id)).toEqual([good.id]);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it("should report validation failures as false", async () => {
    const account = await manager.addAccount(newNostr);
    expect(await manager.validateAccount(account)).toBe(true);

    const orphan = new AccountManager(storage, new Map());
    expect(await orphan.validateAccount(account)).toBe(false);
  });
});
