import type { CapabilityResult } from '../types/index.js';
import type { TrackerApi } from '../integrations/tracker/types.js';
import { NotFoundError, UpstreamError } from '../kernel/errors.js';
import { createLogger } from '../utils/logger.js';
import type { CapabilityRegistry } from './registry.js';
import type { MatchResult } from './types.js';

const log = createLogger('trackwise:executor');

export interface ExecutorOptions {
  /** Clock used for "today" in overdue checks */
  now?: () => Date;
}

export interface ExecutionOutcome {
  result: CapabilityResult;
  durationMs: number;
  /** True when the fallback handler produced the result */
  fallback: boolean;
}

/**
 * ToolExecutor
 *
 * Runs the handler bound to a match. A missing entity becomes a `not_found`
 * result; everything else (UpstreamError from the tracker, or an internal
 * fault) propagates to the orchestrator. There is no retry.
 */
export class ToolExecutor {
  private readonly registry: CapabilityRegistry;
  private readonly tracker: TrackerApi;
  private readonly now: () => Date;

  constructor(registry: CapabilityRegistry, tracker: TrackerApi, options: ExecutorOptions = {}) {
    this.registry = registry;
    this.tracker = tracker;
    this.now = options.now ?? (() => new Date());
  }

  async execute(match: MatchResult): Promise<ExecutionOutcome> {
    const startTime = Date.now();
    const descriptor = this.registry.get(match.capability) ?? this.registry.getFallback();

    try {
      const result = await descriptor.handler(match.argument, {
        tracker: this.tracker,
        today: this.now().toISOString().slice(0, 10),
      });

      log.debug({ capability: descriptor.name, kind: result.kind }, 'Capability executed');
      return { result, durationMs: Date.now() - startTime, fallback: descriptor.fallback };
    } catch (error) {
      if (error instanceof NotFoundError) {
        return {
          result: { kind: 'not_found', entity: error.entity, id: error.id },
          durationMs: Date.now() - startTime,
          fallback: false,
        };
      }

      log.error(
        { capability: descriptor.name, upstream: error instanceof UpstreamError, err: error },
        'Capability handler failed'
      );
      throw error;
    }
  }
}
