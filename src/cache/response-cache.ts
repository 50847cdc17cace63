import type { CapabilityName, CapabilityResult } from '../types/index.js';
import type { EventBus } from '../kernel/event-bus.js';
import { TTLCache } from '../utils/cache.js';

/**
 * A cached response: the redacted payload plus the artifact rendered for it,
 * so a hit reuses it instead of rendering again.
 */
export interface CachedResponse {
  payload: CapabilityResult;
  /** Capability that produced the payload, for telemetry on hits */
  capability: CapabilityName;
  artifact: string | null;
}

export interface ResponseCacheOptions {
  ttlMs: number;
  /** Background prune interval; 0 disables it */
  sweepIntervalMs?: number;
  now?: () => number;
  eventBus?: EventBus;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * ResponseCache
 *
 * Keyed by the normalized prompt text and nothing else. Two prompts that
 * normalize identically share one entry, whatever they route to.
 *
 * Payloads are stored as frozen copies and every hit gets its own clone, so
 * a caller mutating a response never changes what later hits see.
 */
export class ResponseCache {
  private readonly store: TTLCache<string, CachedResponse>;
  private readonly eventBus?: EventBus;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: ResponseCacheOptions) {
    this.store = new TTLCache(options.ttlMs, options.now);
    this.eventBus = options.eventBus;

    const interval = options.sweepIntervalMs ?? 0;
    if (interval > 0) {
      this.sweepTimer = setInterval(() => this.prune(), interval);
      this.sweepTimer.unref();
    }
  }

  get(key: string): CachedResponse | undefined {
    const cached = this.store.get(key);
    if (cached === undefined) return undefined;
    return { ...cached, payload: structuredClone(cached.payload) };
  }

  put(key: string, payload: CapabilityResult, capability: CapabilityName, ttlMs?: number): void {
    this.store.set(key, { payload: deepFreeze(structuredClone(payload)), capability, artifact: null }, ttlMs);
  }

  /** Record the artifact for a live entry. No-op if the entry already expired. */
  attachArtifact(key: string, artifact: string): boolean {
    return this.store.update(key, (cached) => ({ ...cached, artifact }));
  }

  prune(): number {
    const removed = this.store.prune();
    this.eventBus?.emit('cache:pruned', { removed, remaining: this.store.size });
    return removed;
  }

  get size(): number {
    return this.store.size;
  }

  /** Stop the background sweep, if any */
  close(): void {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
