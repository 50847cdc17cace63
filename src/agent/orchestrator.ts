import { randomUUID } from 'node:crypto';
import {
  UNAVAILABLE_MESSAGE,
  type CapabilityName,
  type CapabilityResult,
  type TelemetryOutcome,
} from '../types/index.js';
import type { IntentRouter } from '../routing/intent-router.js';
import type { ToolExecutor } from '../capabilities/executor.js';
import { createPrompt, type Prompt } from '../capabilities/types.js';
import type { ResponseCache } from '../cache/response-cache.js';
import type { TelemetrySink } from '../audit/telemetry-sink.js';
import type { DocumentRenderer } from '../documents/markdown-renderer.js';
import type { EventBus, PipelineState } from '../kernel/event-bus.js';
import { TimeoutError, UpstreamError } from '../kernel/errors.js';
import { redact, redactResult, scanPii } from '../security/pii-redactor.js';
import { createLogger, formatError } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

const log = createLogger('trackwise:orchestrator');

export type ArtifactStatus = 'rendered' | 'reused' | 'failed' | 'skipped';

/**
 * What handlePrompt returns. `response` is the redacted payload; everything
 * else describes how it was produced.
 */
export interface AgentResponse {
  request_id: string;
  response: CapabilityResult;
  artifact: string | null;
  artifact_status: ArtifactStatus;
  cached: boolean;
}

export interface OrchestratorDeps {
  router: IntentRouter;
  executor: ToolExecutor;
  cache: ResponseCache;
  telemetry: TelemetrySink;
  renderer: DocumentRenderer;
  eventBus?: EventBus;
}

export interface OrchestratorOptions {
  /** Bound on one capability execution, tracker I/O included */
  trackerTimeoutMs: number;
  renderTimeoutMs: number;
  /** Redact PII from prompts before they reach telemetry */
  redactPrompts?: boolean;
  now?: () => Date;
}

/**
 * AgentOrchestrator
 *
 * Drives one prompt through
 *   received → normalized → cache_checked → {cache_hit | routed}
 *   → {executed | fallback_executed} → redacted → cached → logged
 *   → rendered → responded
 * with `failed` as the terminal state for upstream and internal errors.
 * Every call records exactly one telemetry event.
 */
export class AgentOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly options: OrchestratorOptions;
  private readonly now: () => Date;

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions) {
    this.deps = deps;
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  async handlePrompt(rawText: string): Promise<AgentResponse> {
    const requestId = randomUUID();
    const startTime = Date.now();

    this.transition(requestId, 'received');
    const prompt = createPrompt(rawText, this.now());
    this.transition(requestId, 'normalized');

    const hit = this.deps.cache.get(prompt.normalized);
    this.transition(requestId, 'cache_checked');

    if (hit) {
      this.transition(requestId, 'cache_hit');
      await this.recordTelemetry(requestId, prompt, hit.capability, hit.payload, true);

      let artifact = hit.artifact;
      let artifactStatus: ArtifactStatus = 'reused';
      if (artifact === null) {
        artifact = await this.render(requestId, hit.payload);
        artifactStatus = artifact === null ? 'failed' : 'rendered';
        if (artifact !== null) {
          this.deps.cache.attachArtifact(prompt.normalized, artifact);
        }
      }

      return this.respond(requestId, startTime, {
        request_id: requestId,
        response: hit.payload,
        artifact,
        artifact_status: artifactStatus,
        cached: true,
      });
    }

    let capability: CapabilityName = 'fallback';
    let payload: CapabilityResult;

    try {
      const match = this.deps.router.route(prompt);
      capability = match.capability;
      this.transition(requestId, 'routed');
      this.deps.eventBus?.emit('prompt:routed', { requestId, ...match });
      log.info({ requestId, capability, argument: match.argument, rationale: match.rationale }, 'Prompt routed');

      const outcome = await withTimeout(
        this.deps.executor.execute(match),
        this.options.trackerTimeoutMs,
        `${capability} execution`,
      );
      this.transition(requestId, outcome.fallback ? 'fallback_executed' : 'executed');

      payload = redactResult(outcome.result);
      const pii = scanPii(JSON.stringify(outcome.result));
      if (!pii.clean) {
        log.info({ requestId, capability, categories: pii.categories }, 'PII redacted from result');
      }
      this.transition(requestId, 'redacted');
    } catch (error) {
      return this.fail(requestId, prompt, capability, error);
    }

    this.deps.cache.put(prompt.normalized, payload, capability);
    this.transition(requestId, 'cached');

    await this.recordTelemetry(requestId, prompt, capability, payload, false);
    this.transition(requestId, 'logged');

    const artifact = await this.render(requestId, payload);
    if (artifact !== null) {
      this.deps.cache.attachArtifact(prompt.normalized, artifact);
    }

    return this.respond(requestId, startTime, {
      request_id: requestId,
      response: payload,
      artifact,
      artifact_status: artifact === null ? 'failed' : 'rendered',
      cached: false,
    });
  }

  /**
   * Upstream failures and internal faults end here: a retryable
   * "unavailable" payload, nothing cached, still logged.
   */
  private async fail(
    requestId: string,
    prompt: Prompt,
    capability: CapabilityName,
    error: unknown,
  ): Promise<AgentResponse> {
    const upstream = error instanceof UpstreamError || error instanceof TimeoutError;
    log.error({ requestId, capability, upstream, err: formatError(error) }, 'Prompt failed');

    if (upstream) {
      this.deps.eventBus?.emit('upstream:failed', {
        requestId,
        capability,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const payload: CapabilityResult = {
      kind: 'unavailable',
      message: UNAVAILABLE_MESSAGE,
      retryable: true,
    };

    await this.recordTelemetry(requestId, prompt, capability, payload, false, 'error');
    this.transition(requestId, 'failed');

    return {
      request_id: requestId,
      response: payload,
      artifact: null,
      artifact_status: 'skipped',
      cached: false,
    };
  }

  private async render(requestId: string, payload: CapabilityResult): Promise<string | null> {
    try {
      const artifact = await withTimeout(
        this.deps.renderer.render(payload),
        this.options.renderTimeoutMs,
        'document render',
      );
      this.transition(requestId, 'rendered');
      return artifact;
    } catch (error) {
      log.warn({ requestId, err: formatError(error) }, 'Document render failed; responding without artifact');
      this.deps.eventBus?.emit('render:failed', {
        requestId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async recordTelemetry(
    requestId: string,
    prompt: Prompt,
    capability: CapabilityName,
    payload: CapabilityResult,
    cached: boolean,
    outcome: TelemetryOutcome = capability === 'fallback' ? 'fallback' : 'success',
  ): Promise<void> {
    try {
      await this.deps.telemetry.record({
        timestamp: this.now().toISOString(),
        request_id: requestId,
        prompt: this.options.redactPrompts ? redact(prompt.raw) : prompt.raw,
        capability,
        output: JSON.stringify(payload),
        outcome,
        cached,
      });
    } catch (error) {
      // record() is contracted never to reject; contain a sink that does
      log.error({ requestId, err: formatError(error) }, 'Telemetry sink rejected');
    }
  }

  private respond(requestId: string, startTime: number, response: AgentResponse): AgentResponse {
    this.transition(requestId, 'responded');
    this.deps.eventBus?.emit('prompt:responded', {
      requestId,
      kind: response.response.kind,
      cached: response.cached,
      durationMs: Date.now() - startTime,
    });
    return response;
  }

  private transition(requestId: string, state: PipelineState): void {
    this.deps.eventBus?.emit('pipeline:state', { requestId, state, timestamp: new Date() });
  }
}
