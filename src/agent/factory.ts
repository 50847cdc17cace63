import type { Config } from '../types/index.js';
import { getArtifactsPath, getTelemetryPath } from '../config/config.js';
import { EventBus } from '../kernel/event-bus.js';
import { createDefaultRegistry } from '../capabilities/catalog.js';
import { ToolExecutor } from '../capabilities/executor.js';
import { IntentRouter } from '../routing/intent-router.js';
import { ResponseCache } from '../cache/response-cache.js';
import { JsonlTelemetrySink, type TelemetrySink } from '../audit/telemetry-sink.js';
import type { DocumentRenderer } from '../documents/markdown-renderer.js';
import { PdfRenderer } from '../documents/pdf-renderer.js';
import { HttpTrackerClient } from '../integrations/tracker/client.js';
import type { TrackerApi } from '../integrations/tracker/types.js';
import { AgentOrchestrator } from './orchestrator.js';

export interface AgentOverrides {
  tracker?: TrackerApi;
  telemetry?: TelemetrySink;
  renderer?: DocumentRenderer;
  eventBus?: EventBus;
  now?: () => Date;
}

export interface Agent {
  orchestrator: AgentOrchestrator;
  cache: ResponseCache;
  telemetry: TelemetrySink;
  eventBus: EventBus;
  tracker: TrackerApi;
  /** Stop background timers */
  close(): void;
}

/**
 * Wire the pipeline from configuration. Collaborators can be swapped for
 * in-process ones (demo mode, tests).
 */
export function createAgent(config: Config, overrides: AgentOverrides = {}): Agent {
  const eventBus = overrides.eventBus ?? new EventBus();
  const now = overrides.now ?? (() => new Date());

  const tracker =
    overrides.tracker ??
    new HttpTrackerClient({ apiRoot: config.tracker.api_root, timeoutMs: config.tracker.timeout_ms });

  const registry = createDefaultRegistry();
  const router = new IntentRouter(registry);
  const executor = new ToolExecutor(registry, tracker, { now });

  const cache = new ResponseCache({
    ttlMs: config.cache.ttl_ms,
    sweepIntervalMs: config.cache.sweep_interval_ms,
    now: () => now().getTime(),
    eventBus,
  });

  const telemetry = overrides.telemetry ?? new JsonlTelemetrySink(getTelemetryPath(config), eventBus);
  const renderer = overrides.renderer ?? new PdfRenderer(getArtifactsPath(config));

  const orchestrator = new AgentOrchestrator(
    { router, executor, cache, telemetry, renderer, eventBus },
    {
      trackerTimeoutMs: config.tracker.timeout_ms,
      renderTimeoutMs: config.renderer.timeout_ms,
      redactPrompts: config.telemetry.redact_prompts,
      now,
    },
  );

  return {
    orchestrator,
    cache,
    telemetry,
    eventBus,
    tracker,
    close: () => cache.close(),
  };
}
