/**
 * Trackwise: Main Exports
 *
 * @module trackwise
 * @version 1.0.0
 */

// Types
export {
  type CapabilityName,
  type ArgumentKind,
  type TriggerPhrase,
  type TaskRecord,
  type ProjectRecord,
  type CapabilityResult,
  type CapabilityResultKind,
  type TelemetryEvent,
  type TelemetryEntry,
  type TelemetryOutcome,
  type Config,
  type Result,
  UNSUPPORTED_MESSAGE,
  UNAVAILABLE_MESSAGE,
  ok,
  err,
} from './types/index.js';

// Config
export { getConfig, loadConfig, clearConfigCache, DEFAULT_CONFIG } from './config/config.js';

// Kernel
export { EventBus, type EventMap, type PipelineState } from './kernel/event-bus.js';
export {
  TrackwiseError,
  DuplicateCapabilityError,
  RegistrySealedError,
  MissingFallbackError,
  UpstreamError,
  NotFoundError,
  RenderError,
  TimeoutError,
} from './kernel/errors.js';

// Capabilities & routing
export { CapabilityRegistry } from './capabilities/registry.js';
export { createDefaultRegistry } from './capabilities/catalog.js';
export { ToolExecutor } from './capabilities/executor.js';
export { loadLexicon, type Lexicon } from './capabilities/lexicon.js';
export { createPrompt, normalizePrompt, type MatchResult, type Prompt } from './capabilities/types.js';
export { IntentRouter } from './routing/intent-router.js';

// Pipeline
export { ResponseCache } from './cache/response-cache.js';
export { redact, redactResult, scanPii } from './security/pii-redactor.js';
export { JsonlTelemetrySink, type TelemetrySink } from './audit/telemetry-sink.js';
export { formatMarkdown, type DocumentRenderer } from './documents/markdown-renderer.js';
export { PdfRenderer, buildPdf } from './documents/pdf-renderer.js';
export { AgentOrchestrator, type AgentResponse } from './agent/orchestrator.js';
export { createAgent, type Agent, type AgentOverrides } from './agent/factory.js';

// Tracker
export type { TrackerApi } from './integrations/tracker/types.js';
export { HttpTrackerClient } from './integrations/tracker/client.js';
export { InMemoryTracker } from './integrations/tracker/memory-tracker.js';

// HTTP
export { agentRoutes } from './api/routes.js';
export { createServer } from './api/server.js';
