export type DedupCacheOptions = {
  ttlMs?: number;
  now?: () => number;
};

export const DEFAULT_DEDUP_TTL_MS = 300_000;

/**
 * In-memory idempotency set for inbound webhook events, keyed by the upstream event id.
 *
 * `seen` is synchronous, so its evict/lookup/insert cannot interleave with another
 * request on the event loop. Nothing is persisted; a restart forgets every id.
 */
export class WebhookDedupCache {
  private readonly entries = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: DedupCacheOptions = {}) {
    this.ttlMs = opts.ttlMs ?? DEFAULT_DEDUP_TTL_MS;
    this.now = opts.now ?? Date.now;
  }

  seen(eventId: string | number): boolean {
    const now = this.now();
    for (const [id, at] of this.entries) {
      if (now - at > this.ttlMs) this.entries.delete(id);
    }

    const key = String(eventId);
    if (this.entries.has(key)) return true;
    this.entries.set(key, now);
    return false;
  }

  get size(): number {
    return this.entries.size;
  }
}
