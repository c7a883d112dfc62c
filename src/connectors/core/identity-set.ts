import {
  errorMessage,
  StoreUnavailableError,
  StoreWriteFailedError,
} from "./errors.js";
import { NO_RETRY, type RetryPolicy } from "./retry.js";
import type { IdentityStore, ItemIdentity } from "./types.js";

/**
 * The set of identities already synchronized, loaded once per run from an
 * `IdentityStore` and appended to as batches persist.
 *
 * An identity becomes a member only after the store confirmed its append,
 * so `contains` never reports an id whose write may have failed.
 */
export class IdentitySet {
  private readonly store: IdentityStore;
  private readonly retry: RetryPolicy;
  private members: Set<ItemIdentity> | null = null;

  constructor(store: IdentityStore, opts: { retry?: RetryPolicy } = {}) {
    this.store = store;
    this.retry = opts.retry ?? NO_RETRY;
  }

  async load(): Promise<ReadonlySet<ItemIdentity>> {
    let stored: ItemIdentity[];
    try {
      stored = await this.retry.execute("read identities", () =>
        this.store.readIdentities(),
      );
    } catch (err) {
      throw new StoreUnavailableError(
        `Identity store unavailable: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    this.members = new Set(stored.filter((id) => id.trim() !== ""));
    return this.members;
  }

  get loaded(): boolean {
    return this.members !== null;
  }

  get size(): number {
    return this.members?.size ?? 0;
  }

  contains(id: ItemIdentity): boolean {
    return this.requireLoaded().has(id);
  }

  /**
   * Append `ids` to the store in order, skipping ones already recorded.
   * All-or-nothing from the caller's side: on failure none of the batch is
   * added to the in-memory set.
   */
  async record(ids: ItemIdentity[]): Promise<void> {
    const members = this.requireLoaded();
    const pending: ItemIdentity[] = [];
    const seen = new Set<ItemIdentity>();
    for (const id of ids) {
      if (members.has(id) || seen.has(id)) continue;
      seen.add(id);
      pending.push(id);
    }
    if (pending.length === 0) return;

    try {
      await this.retry.execute("append identities", () =>
        this.store.appendIdentities(pending),
      );
    } catch (err) {
      throw new StoreWriteFailedError(
        `Failed to record ${pending.length} identities: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    for (const id of pending) members.add(id);
  }

  private requireLoaded(): Set<ItemIdentity> {
    if (!this.members) {
      throw new Error("IdentitySet used before load()");
    }
    return this.members;
  }
}
