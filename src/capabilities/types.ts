import type {
  ArgumentKind,
  CapabilityName,
  CapabilityResult,
  TriggerPhrase,
} from '../types/index.js';
import type { TrackerApi } from '../integrations/tracker/types.js';

/**
 * Capability Types
 *
 * A capability is one backend operation the router can select, together with
 * the phrases that select it and the argument it needs.
 */

// ── Handler ─────────────────────────────────────────────────────────────────

export interface HandlerContext {
  tracker: TrackerApi;
  /** Today's date as YYYY-MM-DD (UTC) */
  today: string;
}

export type CapabilityHandler = (
  argument: string | null,
  context: HandlerContext
) => Promise<CapabilityResult>;

// ── Descriptor ──────────────────────────────────────────────────────────────

export interface CapabilityDescriptor {
  /** Unique name */
  readonly name: CapabilityName;
  /** Trigger phrases in priority order */
  readonly triggers: readonly TriggerPhrase[];
  /** Argument the handler needs */
  readonly argument: ArgumentKind;
  /** Selected when nothing else matches */
  readonly fallback: boolean;
  /** Human-readable description, shown in listings */
  readonly description: string;
  readonly handler: CapabilityHandler;
}

export type CapabilityDefinition = Omit<CapabilityDescriptor, 'fallback'> & { fallback?: boolean };

// ── Match ───────────────────────────────────────────────────────────────────

export interface MatchResult {
  capability: CapabilityName;
  argument: string | null;
  /** Audit text: which trigger fired and how the argument was found */
  rationale: string;
}

// ── Prompt ──────────────────────────────────────────────────────────────────

export interface Prompt {
  readonly raw: string;
  /** Lowercased, trimmed, whitespace runs collapsed */
  readonly normalized: string;
  readonly receivedAt: Date;
}

export function normalizePrompt(raw: string): string {
  return raw.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function createPrompt(raw: string, receivedAt: Date = new Date()): Prompt {
  return Object.freeze({ raw, normalized: normalizePrompt(raw), receivedAt });
}
