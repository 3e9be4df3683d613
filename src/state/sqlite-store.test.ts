import { describe, it, expect, afterEach } from "vitest";
import { SqliteStore } from "./sqlite-store.js";
import { MissingEntry, VersionMismatch } from "./store.js";
import type { PullRequest } from "../types.js";

function samplePullRequest(overrides: Partial<PullRequest> = {}): PullRequest {
  return {
    id: "pr-1",
    version: 1,
    title: "Add cache",
    description: "",
    sourceBranch: "feat/cache",
    targetBranch: "main",
    files: [{ path: "src/cache.ts", changeType: "ADDED", linesAdded: 12, linesDeleted: 0 }],
    state: "draft",
    requiredApprovals: 1,
    parties: { author: "alice", reviewers: ["bob"], maintainer: "mallory" },
    reviews: [],
    discussion: [],
    responses: [],
    createdAt: "2024-03-01T12:00:00.000Z",
    updatedAt: "2024-03-01T12:00:00.000Z",
    mergeCommitId: null,
    mergeCommitMessage: null,
    mergedAt: null,
    mergedBy: null,
    closedAt: null,
    closeReason: null,
    ...overrides,
  };
}

describe("SqliteStore", () => {
  let store: SqliteStore;

  afterEach(() => {
    store.close();
  });

  it("round-trips a pull request", async () => {
    store = new SqliteStore(":memory:");
    await store.insert(samplePullRequest());
    expect(await store.get("pr-1")).toEqual(samplePullRequest());
    expect(await store.get("pr-2")).toBeUndefined();
  });

  it("applies the optimistic version check in the update", async () => {
    store = new SqliteStore(":memory:");
    await store.insert(samplePullRequest());
    await store.save(samplePullRequest({ version: 2, state: "open" }), 1);

    await expect(store.save(samplePullRequest({ version: 2, state: "closed" }), 1)).rejects.toMatchObject({
      expectedVersion: 1,
      actualVersion: 2,
    });
    await expect(store.save(samplePullRequest({ id: "pr-9", version: 2 }), 1)).rejects.toBeInstanceOf(MissingEntry);
    expect((await store.get("pr-1"))?.state).toBe("open");
  });

  it("counts by state", async () => {
    store = new SqliteStore(":memory:");
    await store.insert(samplePullRequest({ id: "a" }));
    await store.insert(samplePullRequest({ id: "b", state: "approved" }));
    expect(await store.countByState()).toEqual({ draft: 1, approved: 1 });
  });

  it("rejects duplicate ids", async () => {
    store = new SqliteStore(":memory:");
    await store.insert(samplePullRequest());
    await expect(store.insert(samplePullRequest())).rejects.toThrow();
    await expect(store.save(samplePullRequest({ version: 5 }), 4)).rejects.toBeInstanceOf(VersionMismatch);
  });
});
