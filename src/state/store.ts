import { readFileSync, writeFileSync, mkdirSync, renameSync } from "node:fs";
import { randomUUID } from "node:crypto";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { PRLifecycleState, PullRequest } from "../types.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { FileLock, errorCode } from "../file-lock.js";
import { decodePullRequest, encodePullRequest } from "./snapshot.js";

export type StateCounts = Partial<Record<PRLifecycleState, number>>;

/**
 * Persistence collaborator. `save` is an optimistic write: it must reject with a
 * {@link VersionMismatch} when the stored version is not `expectedVersion`, and
 * must leave the stored value untouched when it throws for any reason.
 */
export interface PullRequestStore {
  get(id: string): Promise<PullRequest | undefined>;
  insert(pr: PullRequest): Promise<void>;
  save(pr: PullRequest, expectedVersion: number): Promise<void>;
  countByState(): Promise<StateCounts>;
  close(): void;
}

export class VersionMismatch extends Error {
  constructor(
    readonly id: string,
    readonly expectedVersion: number,
    readonly actualVersion: number,
  ) {
    super(`Version mismatch for ${id}: expected ${expectedVersion}, found ${actualVersion}`);
    this.name = "VersionMismatch";
  }
}

export class MissingEntry extends Error {
  constructor(readonly id: string) {
    super(`No stored pull request ${id}`);
    this.name = "MissingEntry";
  }
}

function countStates(prs: Iterable<{ state: PRLifecycleState }>): StateCounts {
  const counts: StateCounts = {};
  for (const { state } of prs) {
    counts[state] = (counts[state] ?? 0) + 1;
  }
  return counts;
}

/** Serialized snapshots in a Map. Nothing outlives the process. */
export class MemoryStore implements PullRequestStore {
  private entries = new Map<string, string>();

  async get(id: string): Promise<PullRequest | undefined> {
    const raw = this.entries.get(id);
    return raw === undefined ? undefined : decodePullRequest(raw);
  }

  async insert(pr: PullRequest): Promise<void> {
    if (this.entries.has(pr.id)) throw new Error(`Duplicate pull request id ${pr.id}`);
    this.entries.set(pr.id, encodePullRequest(pr));
  }

  async save(pr: PullRequest, expectedVersion: number): Promise<void> {
    const raw = this.entries.get(pr.id);
    if (raw === undefined) throw new MissingEntry(pr.id);
    const stored = decodePullRequest(raw);
    if (stored.version !== expectedVersion) throw new VersionMismatch(pr.id, expectedVersion, stored.version);
    this.entries.set(pr.id, encodePullRequest(pr));
  }

  async countByState(): Promise<StateCounts> {
    return countStates([...this.entries.values()].map((raw) => decodePullRequest(raw)));
  }

  close(): void {
    this.entries.clear();
  }
}

const StateFileSchema = z.object({
  version: z.literal(1),
  pullRequests: z.record(z.unknown()),
});

interface StateFile {
  version: 1;
  pullRequests: Record<string, PullRequest>;
}

/**
 * Whole-file JSON store, shareable between processes. Reads go to the file; each
 * write holds a lock beside it, re-reads it, checks the stored version of the one
 * entry it replaces and rewrites the file through a temp file and a rename.
 */
export class JsonFileStore implements PullRequestStore {
  private lock: FileLock;

  constructor(
    private filePath: string = "data/pull-requests.json",
    private logger: Logger = silentLogger,
    private lockTimeoutMs = 5000,
  ) {
    this.lock = new FileLock(filePath);
    const { pullRequests } = this.read();
    this.logger.info("Loaded pull request state", { path: this.filePath, count: Object.keys(pullRequests).length });
  }

  private read(): StateFile {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, "utf-8");
    } catch (err) {
      if (errorCode(err) !== "ENOENT") throw err;
      return { version: 1, pullRequests: {} };
    }

    const parsed = StateFileSchema.parse(JSON.parse(raw));
    const pullRequests: Record<string, PullRequest> = {};
    for (const [id, snapshot] of Object.entries(parsed.pullRequests)) {
      pullRequests[id] = decodePullRequest(snapshot);
    }
    return { version: 1, pullRequests };
  }

  private write(state: StateFile): void {
    const dir = dirname(this.filePath);

    // Atomic write: write to temp file then rename
    const tmpPath = join(dir, `.state-${randomUUID()}.tmp`);
    writeFileSync(tmpPath, JSON.stringify(state, null, 2));
    renameSync(tmpPath, this.filePath);
  }

  private update(apply: (state: StateFile) => void): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    this.lock.withLock(() => {
      const state = this.read();
      apply(state);
      this.write(state);
    }, this.lockTimeoutMs);
  }

  async get(id: string): Promise<PullRequest | undefined> {
    return this.read().pullRequests[id];
  }

  async insert(pr: PullRequest): Promise<void> {
    this.update((state) => {
      if (state.pullRequests[pr.id]) throw new Error(`Duplicate pull request id ${pr.id}`);
      state.pullRequests[pr.id] = pr;
    });
  }

  async save(pr: PullRequest, expectedVersion: number): Promise<void> {
    this.update((state) => {
      const stored = state.pullRequests[pr.id];
      if (!stored) throw new MissingEntry(pr.id);
      if (stored.version !== expectedVersion) throw new VersionMismatch(pr.id, expectedVersion, stored.version);
      state.pullRequests[pr.id] = pr;
    });
  }

  async countByState(): Promise<StateCounts> {
    return countStates(Object.values(this.read().pullRequests));
  }

  close(): void {
    // Every commit is already on disk
  }
}
