import { existsSync, mkdirSync, rmdirSync, statSync } from "node:fs";

export function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/**
 * Lock beside a file, held by creating `<file>.lock` with mkdir (atomic on all platforms).
 * Callers are synchronous, so waiting spins.
 */
export class FileLock {
  private lockPath: string;
  private acquired = false;

  constructor(
    filePath: string,
    private readonly staleMs = 60_000,
  ) {
    this.lockPath = `${filePath}.lock`;
  }

  private removeLockDir(): void {
    try {
      rmdirSync(this.lockPath);
    } catch (err) {
      if (errorCode(err) !== "ENOENT") throw err;
    }
  }

  acquire(timeoutMs: number = 5000): boolean {
    const deadline = Date.now() + timeoutMs;
    const spinMs = 50;

    do {
      if (existsSync(this.lockPath) && Date.now() - statSync(this.lockPath).mtimeMs > this.staleMs) {
        this.removeLockDir();
      }

      try {
        mkdirSync(this.lockPath);
        this.acquired = true;
        return true;
      } catch (err) {
        if (errorCode(err) !== "EEXIST") throw err;
        const waitUntil = Math.min(Date.now() + spinMs, deadline);
        while (Date.now() < waitUntil) {
          // spin
        }
      }
    } while (Date.now() < deadline);
    return false;
  }

  /** Runs `fn` while holding the lock; throws when the lock is not acquired in time. */
  withLock<T>(fn: () => T, timeoutMs?: number): T {
    if (!this.acquire(timeoutMs)) throw new Error(`Timed out waiting for lock ${this.lockPath}`);
    try {
      return fn();
    } finally {
      this.release();
    }
  }

  release(): void {
    if (this.acquired) {
      this.removeLockDir();
      this.acquired = false;
    }
  }
}
