import { describe, it, expect } from "vitest";
import {
  Account,
  PostResult,
  PostingProgress,
  platformFromId,
  targetKey,
  targetStatus,
  toPostData,
} from "../src/models/index.js";

describe("platforms", () => {
  it("should resolve known ids with their limits", () => {
    expect(platformFromId("bluesky")).toEqual({ id: "bluesky", displayName: "Bluesky", characterLimit: 300 });
    expect(platformFromId("nostr").characterLimit).toBe(800);
  });

  it("should throw on unknown ids", () => {
    expect(() => platformFromId("myspace")).toThrow("Unknown platform ID: myspace");
    expect(() => platformFromId("toString")).toThrow("Unknown platform ID: toString");
  });
});

describe("PostResult", () => {
  const base = new PostResult("hello", { timestamp: new Date("2024-05-01T10:00:00.000Z") });

  it("should key targets by platform and account", () => {
    expect(targetKey("nostr", "abc")).toBe("nostr:abc");
    expect(targetKey("nostr")).toBe("nostr");
  });

  it("should never change when results are added", () => {
    const next = base.addPlatformResult("nostr", true, { accountId: "a1" });
    expect(base.totalTargets).toBe(0);
    expect(next.totalTargets).toBe(1);
    expect(next.timestamp).toBe(base.timestamp);
  });

  it("should fill in defaults for failures", () => {
    const result = base.addPlatformResult("x", false);
    expect(result.outcome("x")).toEqual({
      platform: "x",
      success: false,
      error: "Unknown error",
      errorType: "unknownError",
    });
  });

  it("should clear an earlier error when the same target succeeds", () => {
    const result = base
      .addPlatformResult("nostr", false, { accountId: "a1", error: "timeout", errorType: "networkError" })
      .addPlatformResult("nostr", true, { accountId: "a1" });

    expect(result.isSuccessful("nostr:a1")).toBe(true);
    expect(result.getError("nostr:a1")).toBeUndefined();
    expect(result.totalTargets).toBe(1);
  });

  it("should count and summarise mixed outcomes", () => {
    const result = base
      .addPlatformResult("nostr", true, { accountId: "a1" })
      .addPlatformResult("nostr", false, { accountId: "a2", error: "refused", errorType: "networkError" })
      .addPlatformResult("mastodon", true, { accountId: "m1" });

    expect(result.successCount).toBe(2);
    expect(result.failureCount).toBe(1);
    expect(result.hasErrors).toBe(true);
    expect(result.allSuccessful).toBe(false);
    expect(result.allFailed).toBe(false);
    expect(result.successfulPlatforms).toEqual(["nostr", "mastodon"]);
    expect(result.failedPlatforms).toEqual(["nostr"]);
    expect(result.getErrorType("nostr:a2")).toBe("networkError");
    expect(result.getSummaryMessage()).toBe("Posted to 2 of 3 targets successfully");
    expect(result.getDetailedErrors()).toEqual(["Nostr (nostr:a2): refused"]);
  });

  it("should summarise edge cases", () => {
    expect(base.getSummaryMessage()).toBe("No targets selected");
    expect(base.allSuccessful).toBe(false);
    expect(base.allFailed).toBe(false);
    expect(base.addPlatformResult("x", true).getSummaryMessage()).toBe("Successfully posted to all 1 target");

    const failed = PostResult.allFailed("hi", [{ platform: "x" }, { platform: "bluesky", accountId: "b" }], "down");
    expect(failed.getSummaryMessage()).toBe("Failed to post to all 2 targets");
    expect(failed.getDetailedErrors()).toEqual(["X: down", "Bluesky (bluesky:b): down"]);
  });

  it("should merge with the other result winning", () => {
    const left = base.addPlatformResult("nostr", false, { accountId: "a1", error: "first" });
    const right = new PostResult("ignored").addPlatformResult("nostr", true, { accountId: "a1" });
    const merged = left.merge(right);

    expect(merged.content).toBe("hello");
    expect(merged.isSuccessful("nostr:a1")).toBe(true);
  });

  it("should survive a JSON round trip", () => {
    const result = base
      .addPlatformResult("nostr", true, { accountId: "a1" })
      .addPlatformResult("x", false, { error: "429", errorType: "rateLimitError" });
    const restored = PostResult.fromJSON(JSON.parse(JSON.stringify(result)));

    expect(restored.timestamp.toISOString()).toBe("2024-05-01T10:00:00.000Z");
    expect(restored.entries()).toEqual(result.entries());
  });

  it("should reject malformed JSON", () => {
    expect(() => PostResult.fromJSON(null)).toThrow("PostResult JSON must be an object");
    expect(() =>
      PostResult.fromJSON({ content: "c", timestamp: "2024-05-01T10:00:00Z", outcomes: { a: { platform: "nope" } } }),
    ).toThrow('Outcome "a" has an unknown platform');
  });
});

describe("PostingProgress", () => {
  const start = new Date("2024-05-01T10:00:00.000Z");
  const targets = [
    { platform: "nostr" as const, accountId: "a1" },
    { platform: "nostr" as const, accountId: "a2" },
  ];

  it("should start idle", () => {
    const idle = PostingProgress.idle();
    expect(idle.state).toBe("idle");
    expect(idle.isInProgress).toBe(false);
    expect(idle.isComplete).toBe(false);
    expect(idle.durationMs).toBeUndefined();
  });

  it("should describe the preparing and posting phases", () => {
    const preparing = PostingProgress.preparing(targets, start);
    expect(preparing.overallMessage).toBe("Preparing to post...");
    expect(preparing.overallProgress).toBe(0);
    expect(preparing.inProgressTargets).toEqual(["nostr:a1", "nostr:a2"]);

    const posting = PostingProgress.posting(targets, start);
    expect(posting.overallMessage).toBe("Posting to 2 targets...");
    expect(posting.overallProgress).toBe(0.1);
    expect(posting.isCancellable).toBe(true);
    expect(PostingProgress.posting([targets[0]], start).overallMessage).toBe("Posting to 1 target...");
  });

  it("should advance as targets finish", () => {
    const posting = PostingProgress.posting(targets, start);
    const half = posting.updateTargetStatus(targetStatus(targets[0], "completed"));

    expect(half.overallProgress).toBeCloseTo(0.55);
    expect(half.successfulTargets).toEqual(["nostr:a1"]);
    expect(half.statuses.get("nostr:a1")?.message).toBe("Posted successfully");

    const done = half.updateTargetStatus(
      targetStatus(targets[1], "failed", { error: "timeout", errorType: "networkError" }),
    );
    expect(done.overallProgress).toBeCloseTo(1);
    expect(done.failedTargets).toEqual(["nostr:a2"]);
    expect(done.state).toBe("posting");
  });

  it("should build the completed snapshot from a result", () => {
    const result = new PostResult("hi")
      .addPlatformResult("nostr", true, { accountId: "a1" })
      .addPlatformResult("nostr", false, { accountId: "a2", error: "nope" });
    const completed = PostingProgress.completed(result, start);

    expect(completed.state).toBe("completed");
    expect(completed.overallProgress).toBe(1);
    expect(completed.overallMessage).toBe("Posted to 1 of 2 targets successfully");
    expect(completed.statuses.get("nostr:a2")?.error).toBe("nope");
    expect(completed.isComplete).toBe(true);
    expect(completed.isCancellable).toBe(false);
    expect(completed.result).toBe(result);
  });

  it("should mark every target on cancel and failure", () => {
    const cancelled = PostingProgress.cancelled(targets, start);
    expect(cancelled.overallMessage).toBe("Posting cancelled");
    expect(cancelled.overallProgress).toBeUndefined();
    expect(cancelled.statuses.get("nostr:a1")?.message).toBe("Cancelled");

    const failed = PostingProgress.failed(targets, "No platforms selected", start);
    expect(failed.overallMessage).toBe("Posting failed: No platforms selected");
    expect(failed.failedTargets).toEqual(["nostr:a1", "nostr:a2"]);
  });
});

describe("Account", () => {
  const account = new Account({
    id: "acc-1",
    platform: "nostr",
    displayName: "Test",
    username: "npub1test",
    createdAt: new Date("2024-01-01T00:00:00.000Z"),
    credentials: { private_key: "test-secret", relays: ["wss://relay.example.com"], empty: " " },
  });

  it("should read credentials by shape", () => {
    expect(account.hasCredential("private_key")).toBe(true);
    expect(account.hasCredential("empty")).toBe(false);
    expect(account.hasCredential("missing")).toBe(false);
    expect(account.getStringCredential("relays")).toBeUndefined();
    expect(account.getListCredential("relays")).toEqual(["wss://relay.example.com"]);
    expect(account.getListCredential("private_key")).toEqual(["test-secret"]);
  });

  it("should derive copies without touching the original", () => {
    const disabled = account.copyWith({ isActive: false });
    expect(account.isActive).toBe(true);
    expect(disabled.isActive).toBe(false);
    expect(disabled.getStringCredential("private_key")).toBe("test-secret");
    expect(Object.isFrozen(account)).toBe(true);
  });

  it("should leave credentials out of JSON", () => {
    expect(account.toJSON()).toEqual({
      id: "acc-1",
      platform: "nostr",
      displayName: "Test",
      username: "npub1test",
      createdAt: "2024-01-01T00:00:00.000Z",
      isActive: true,
    });
    expect(String(account)).toBe("Account(nostr:npub1test)");
  });

  it("should rebuild from JSON and validate it", () => {
    const restored = Account.fromJSON(account.toJSON(), { private_key: "test-secret" });
    expect(restored.createdAt.getTime()).toBe(account.createdAt.getTime());
    expect(restored.getStringCredential("private_key")).toBe("test-secret");

    expect(() => Account.fromJSON({ id: "x", platform: "friendster" })).toThrow(
      "Account x has an unknown platform: friendster",
    );
    expect(() => Account.fromJSON(account.toJSON(), { relays: [1, 2] })).toThrow(
      'Account acc-1 has a malformed credential "relays"',
    );
  });
});

describe("toPostData()", () => {
  it("should wrap plain text", () => {
    expect(toPostData("hi")).toEqual({ content: "hi", media: [] });
  });
});
