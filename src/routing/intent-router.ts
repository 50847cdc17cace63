import type { TriggerPhrase, TriggerSpecificity } from '../types/index.js';
import type { CapabilityRegistry } from '../capabilities/registry.js';
import type { CapabilityDescriptor, MatchResult, Prompt } from '../capabilities/types.js';
import { getLexicon, type Lexicon } from '../capabilities/lexicon.js';
import { createLogger } from '../utils/logger.js';
import { extractArgument } from './argument-extractor.js';

const log = createLogger('trackwise:router');

const SPECIFICITY_RANK: Record<TriggerSpecificity, number> = {
  specific: 2,
  generic: 1,
};

/**
 * A capability that fired, with its strongest trigger
 */
export interface CandidateMatch {
  descriptor: CapabilityDescriptor;
  trigger: TriggerPhrase;
  /** Registration index, the final tie-break */
  order: number;
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a trigger phrase to a keyword matcher. Word boundaries apply only
 * where the phrase begins or ends with a word character, so "late" never
 * matches "translate" while "'s tasks" still matches "alice's tasks".
 * `{n}` stands for a run of digits.
 */
export function compileTrigger(phrase: string): RegExp {
  const body = phrase
    .toLowerCase()
    .trim()
    .split(/\s+/)
    .map((word) => word.split('{n}').map(escapeRegex).join('\\d+'))
    .join('\\s+');

  const head = /^[\w{]/.test(phrase.trim()) ? '(?<!\\w)' : '';
  const tail = /[\w}]$/.test(phrase.trim()) ? '(?!\\w)' : '';

  return new RegExp(`${head}${body}${tail}`);
}

/**
 * IntentRouter
 *
 * Deterministic keyword matcher over the capability registry. Specific
 * triggers (the overdue lexicon, numbered project references) outrank generic
 * ones; among equals the first-registered capability wins. Anything that
 * matches nothing, or whose argument cannot be extracted, routes to the
 * fallback capability.
 */
export class IntentRouter {
  private readonly registry: CapabilityRegistry;
  private readonly lexicon: Lexicon;
  private readonly compiled: Map<string, RegExp> = new Map();

  constructor(registry: CapabilityRegistry, lexicon: Lexicon = getLexicon()) {
    this.registry = registry;
    this.lexicon = lexicon;

    for (const descriptor of registry.list()) {
      for (const trigger of descriptor.triggers) {
        if (!this.compiled.has(trigger.phrase)) {
          this.compiled.set(trigger.phrase, compileTrigger(trigger.phrase));
        }
      }
    }
  }

  /**
   * Every non-fallback capability with at least one firing trigger, strongest
   * first
   */
  findCandidates(normalized: string): CandidateMatch[] {
    const candidates: CandidateMatch[] = [];

    this.registry.list().forEach((descriptor, order) => {
      if (descriptor.fallback) return;

      let best: TriggerPhrase | null = null;
      for (const trigger of descriptor.triggers) {
        if (!this.matcherFor(trigger.phrase).test(normalized)) continue;
        if (best === null || SPECIFICITY_RANK[trigger.specificity] > SPECIFICITY_RANK[best.specificity]) {
          best = trigger;
        }
      }

      if (best !== null) {
        candidates.push({ descriptor, trigger: best, order });
      }
    });

    return candidates.sort((a, b) => {
      const rank = SPECIFICITY_RANK[b.trigger.specificity] - SPECIFICITY_RANK[a.trigger.specificity];
      return rank !== 0 ? rank : a.order - b.order;
    });
  }

  /**
   * Select exactly one capability for a prompt
   */
  route(prompt: Prompt): MatchResult {
    const [winner] = this.findCandidates(prompt.normalized);

    if (winner === undefined) {
      return this.fallback('no trigger phrase matched');
    }

    const name = winner.descriptor.name;
    const extracted = extractArgument(winner.descriptor.argument, prompt.raw, prompt.normalized, this.lexicon);
    if (!extracted.ok) {
      log.debug({ capability: name }, 'Argument extraction failed; falling back');
      return this.fallback(
        `matched "${winner.trigger.phrase}" (${winner.trigger.specificity}) for ${name} but no ${winner.descriptor.argument} argument was found`
      );
    }

    const argumentNote = extracted.argument
      ? `; argument "${extracted.argument.value}" via ${extracted.argument.via}`
      : '';

    return {
      capability: name,
      argument: extracted.argument?.value ?? null,
      rationale: `matched "${winner.trigger.phrase}" (${winner.trigger.specificity}) for ${name}${argumentNote}`,
    };
  }

  private fallback(reason: string): MatchResult {
    return {
      capability: this.registry.getFallback().name,
      argument: null,
      rationale: reason,
    };
  }

  private matcherFor(phrase: string): RegExp {
    let matcher = this.compiled.get(phrase);
    if (!matcher) {
      matcher = compileTrigger(phrase);
      this.compiled.set(phrase, matcher);
    }
    return matcher;
  }
}
