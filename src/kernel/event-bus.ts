import type { CapabilityName, CapabilityResultKind, TelemetryOutcome } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('trackwise:event-bus');

export type PipelineState =
  | 'received'
  | 'normalized'
  | 'cache_checked'
  | 'cache_hit'
  | 'routed'
  | 'executed'
  | 'fallback_executed'
  | 'redacted'
  | 'cached'
  | 'logged'
  | 'rendered'
  | 'responded'
  | 'failed';

/**
 * EventMap interface defining event name to payload mappings.
 */
export interface EventMap {
  // ── Pipeline events ────────────────────────────────────────────────────
  'pipeline:state': { requestId: string; state: PipelineState; timestamp: Date };
  'prompt:routed': { requestId: string; capability: CapabilityName; argument: string | null; rationale: string };
  'prompt:responded': { requestId: string; kind: CapabilityResultKind; cached: boolean; durationMs: number };

  // ── Collaborator failures ──────────────────────────────────────────────
  'upstream:failed': { requestId: string; capability: CapabilityName; error: string };
  'render:failed': { requestId: string; error: string };
  'telemetry:failed': { outcome: TelemetryOutcome; error: string; timestamp: Date };

  // ── Cache ──────────────────────────────────────────────────────────────
  'cache:pruned': { removed: number; remaining: number };

  // ── Bus internals ──────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

type Handler = (payload: unknown) => void;

/**
 * Typed pub/sub event system
 */
export class EventBus {
  private listeners: Map<string, Set<Handler>> = new Map();
  private handlerErrors: number = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }

    handlers.add(handler as Handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler as Handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  /**
   * Emit an event to all subscribers. A throwing handler never stops the
   * remaining handlers or the emitter.
   */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of handlers) {
      try {
        handler(payload);
      } catch (error) {
        this.handlerErrors++;
        const errorMsg = error instanceof Error ? error.message : String(error);

        log.error({ event: String(event), err: error }, 'Error in event handler');

        // Guard against recursion from handler_error handlers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event: String(event),
            error: errorMsg,
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }

  once<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): () => void {
    const wrappedHandler = (payload: EventMap[K]): void => {
      handler(payload);
      this.off(event, wrappedHandler);
    };

    return this.on(event, wrappedHandler);
  }

  clear(): void {
    this.listeners.clear();
    this.handlerErrors = 0;
  }

  listenerCount(event: keyof EventMap): number {
    const handlers = this.listeners.get(event);
    return handlers ? handlers.size : 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
