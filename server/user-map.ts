/**
 * Per-user in-memory map with an idle timeout and a size cap. Anyone can
 * mint a new user cookie, so nothing keyed by it may grow without bound.
 */

export interface UserMapLimits {
  maxUsers?: number;
  idleMs?: number;
  now?: () => number;
}

export const DEFAULT_MAX_USERS = 10_000;
export const DEFAULT_USER_IDLE_MS = 24 * 60 * 60 * 1000; // 24h

interface Entry<V> {
  value: V;
  lastSeen: number;
}

export class UserMap<V> {
  // Insertion order is least recently used first.
  private entries = new Map<string, Entry<V>>();
  private readonly maxUsers: number;
  private readonly idleMs: number;
  private readonly now: () => number;

  constructor(limits: UserMapLimits = {}) {
    this.maxUsers = limits.maxUsers ?? DEFAULT_MAX_USERS;
    this.idleMs = limits.idleMs ?? DEFAULT_USER_IDLE_MS;
    this.now = limits.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(userId: string): V | undefined {
    const entry = this.entries.get(userId);
    if (!entry) return undefined;

    const now = this.now();
    this.entries.delete(userId);
    if (now - entry.lastSeen > this.idleMs) return undefined;

    entry.lastSeen = now;
    this.entries.set(userId, entry);
    return entry.value;
  }

  set(userId: string, value: V): void {
    this.entries.delete(userId);
    this.entries.set(userId, { value, lastSeen: this.now() });
    this.prune();
  }

  private prune(): void {
    const now = this.now();
    for (const [userId, entry] of this.entries) {
      if (this.entries.size <= this.maxUsers && now - entry.lastSeen <= this.idleMs) break;
      this.entries.delete(userId);
    }
  }
}
