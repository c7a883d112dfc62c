import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import { errorMessage, LeaseUnavailableError } from "./errors.js";
import type { Logger, RunLease } from "./types.js";

interface LeaseRecord {
  pid: number;
  acquiredAt: string;
  /** Unique per acquisition; release only removes a file carrying it. */
  nonce?: string;
}

/** What is on disk at the lock path, as read by a contender. */
interface LockSnapshot {
  raw: string;
  record: LeaseRecord | null;
  mtimeMs: number;
}

function isErrnoCode(err: unknown, code: string): boolean {
  return (
    typeof err === "object" && err !== null && "code" in err && err.code === code
  );
}

function parseLeaseRecord(raw: string): LeaseRecord | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (
    typeof data === "object" &&
    data !== null &&
    "pid" in data &&
    "acquiredAt" in data &&
    typeof data.pid === "number" &&
    typeof data.acquiredAt === "string"
  ) {
    const nonce =
      "nonce" in data && typeof data.nonce === "string" ? data.nonce : undefined;
    return { pid: data.pid, acquiredAt: data.acquiredAt, nonce };
  }
  return null;
}

/**
 * Lock file held for the duration of a run.
 *
 * The record is written to a private temp file and hard-linked into place,
 * so the lock path never exists without its full content and only one
 * link can win. A lock older than `staleAfterMs` (a crashed run) is
 * renamed aside before the new one is created; content that does not
 * parse is judged by the file's mtime instead.
 */
export class FileRunLease implements RunLease {
  private readonly filePath: string;
  private readonly staleAfterMs: number;
  private readonly logger?: Logger;

  constructor(
    filePath: string,
    opts: { staleAfterMs?: number; logger?: Logger } = {},
  ) {
    this.filePath = filePath;
    this.staleAfterMs = opts.staleAfterMs ?? 60 * 60 * 1000;
    this.logger = opts.logger;
  }

  async acquire(): Promise<() => Promise<void>> {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const record: LeaseRecord = {
      pid: process.pid,
      acquiredAt: new Date().toISOString(),
      nonce: randomUUID(),
    };

    if (!this.tryCreate(record)) {
      const holder = this.readSnapshot();
      if (holder && !this.isStale(holder)) {
        throw new LeaseUnavailableError(
          holder.record
            ? `Another run holds ${this.filePath} (pid ${holder.record.pid} since ${holder.record.acquiredAt})`
            : `Another run is creating ${this.filePath}`,
        );
      }
      if (holder) {
        this.logger?.warn("Taking over stale run lock", {
          file: this.filePath,
          holder: holder.record,
        });
        this.evict(holder);
      }
      if (!this.tryCreate(record)) {
        throw new LeaseUnavailableError(
          `Lost the race for ${this.filePath} to another run`,
        );
      }
    }

    let released = false;
    return async () => {
      if (released) return;
      released = true;
      this.release(record);
    };
  }

  private tryCreate(record: LeaseRecord): boolean {
    const tmpPath = `${this.filePath}.${record.nonce}.tmp`;
    try {
      fs.writeFileSync(tmpPath, JSON.stringify(record));
      fs.linkSync(tmpPath, this.filePath);
      return true;
    } catch (err) {
      if (isErrnoCode(err, "EEXIST")) return false;
      throw new LeaseUnavailableError(
        `Cannot create ${this.filePath}: ${errorMessage(err)}`,
        { cause: err },
      );
    } finally {
      fs.rmSync(tmpPath, { force: true });
    }
  }

  /**
   * Move the stale lock out of the way. If what got moved is not the lock
   * judged stale, another contender replaced it in between: link it back
   * and give up.
   */
  private evict(stale: LockSnapshot): void {
    const asidePath = `${this.filePath}.${randomUUID()}.stale`;
    try {
      fs.renameSync(this.filePath, asidePath);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return;
      throw err;
    }

    try {
      if (fs.readFileSync(asidePath, "utf-8") === stale.raw) return;
      try {
        fs.linkSync(asidePath, this.filePath);
      } catch (err) {
        if (!isErrnoCode(err, "EEXIST")) throw err;
      }
      throw new LeaseUnavailableError(
        `Lost the race for ${this.filePath} to another run`,
      );
    } finally {
      fs.rmSync(asidePath, { force: true });
    }
  }

  private release(record: LeaseRecord): void {
    const current = this.readSnapshot();
    if (!current) return;
    if (current.record?.nonce !== record.nonce) {
      this.logger?.warn("Run lock was taken over; leaving it in place", {
        file: this.filePath,
        holder: current.record,
      });
      return;
    }
    fs.rmSync(this.filePath, { force: true });
  }

  private readSnapshot(): LockSnapshot | null {
    try {
      const raw = fs.readFileSync(this.filePath, "utf-8");
      const { mtimeMs } = fs.statSync(this.filePath);
      return { raw, record: parseLeaseRecord(raw), mtimeMs };
    } catch (err) {
      // released between our create attempt and this read
      if (isErrnoCode(err, "ENOENT")) return null;
      throw err;
    }
  }

  private isStale(holder: LockSnapshot): boolean {
    const acquiredAt = holder.record ? Date.parse(holder.record.acquiredAt) : Number.NaN;
    const since = Number.isNaN(acquiredAt) ? holder.mtimeMs : acquiredAt;
    return Date.now() - since > this.staleAfterMs;
  }
}
