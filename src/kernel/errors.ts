/**
 * Error classes for the prompt pipeline.
 *
 * Only UpstreamError and NotFoundError ever reach a caller, and then as
 * structured payloads rather than thrown errors.
 */

export class TrackwiseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'TrackwiseError';
  }
}

// ── Registry ─────────────────────────────────────────────────────────────────

export class DuplicateCapabilityError extends TrackwiseError {
  constructor(public readonly capability: string) {
    super(`Capability already registered: ${capability}`, 'DUPLICATE_CAPABILITY');
    this.name = 'DuplicateCapabilityError';
  }
}

export class RegistrySealedError extends TrackwiseError {
  constructor(capability: string) {
    super(`Registry is sealed; cannot register ${capability}`, 'REGISTRY_SEALED');
    this.name = 'RegistrySealedError';
  }
}

export class MissingFallbackError extends TrackwiseError {
  constructor() {
    super('No fallback capability registered', 'MISSING_FALLBACK');
    this.name = 'MissingFallbackError';
  }
}

// ── Upstream collaborators ───────────────────────────────────────────────────

export class UpstreamError extends TrackwiseError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, 'UPSTREAM_ERROR', cause);
    this.name = 'UpstreamError';
  }
}

export class NotFoundError extends TrackwiseError {
  constructor(
    public readonly entity: 'project',
    public readonly id: number | string
  ) {
    super(`${entity} ${id} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class RenderError extends TrackwiseError {
  constructor(message: string, cause?: unknown) {
    super(message, 'RENDER_FAILED', cause);
    this.name = 'RenderError';
  }
}

export class TimeoutError extends TrackwiseError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}
