/**
 * Token-scan argument extraction.
 *
 * Assignees come from the raw prompt (capitalization is a signal); project
 * ids come from the normalized prompt.
 */

import type { ArgumentKind } from '../types/index.js';
import type { Lexicon } from '../capabilities/lexicon.js';

export interface ExtractedArgument {
  value: string;
  /** How the value was found, for the match rationale */
  via: string;
}

const NAME_PATTERN = /^\p{L}[\p{L}'-]*$/u;

/** Strip surrounding punctuation and a trailing possessive */
function cleanToken(token: string): string {
  return token
    .replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '')
    .replace(/['’]s$/u, '');
}

function isName(token: string, stopwords: ReadonlySet<string>): boolean {
  return NAME_PATTERN.test(token) && !stopwords.has(token.toLowerCase());
}

export function extractAssignee(raw: string, lexicon: Lexicon): ExtractedArgument | null {
  const tokens = raw.split(/\s+/).filter((token) => token.length > 0);
  const stopwords = new Set(lexicon.stopwords);
  const anchors = new Set(lexicon.anchors.map((anchor) => anchor.toLowerCase()));

  // Pass 1: the token right after an anchor ("assigned to Alice", "tasks for Bob")
  for (let i = 0; i < tokens.length - 1; i++) {
    const anchor = cleanToken(tokens[i]).toLowerCase();
    if (!anchors.has(anchor)) continue;

    const candidate = cleanToken(tokens[i + 1]);
    if (isName(candidate, stopwords)) {
      return { value: candidate, via: `anchor "${anchor}"` };
    }
  }

  // Pass 2: the first capitalized non-stopword token
  for (const token of tokens) {
    const candidate = cleanToken(token);
    if (/^\p{Lu}/u.test(candidate) && isName(candidate, stopwords)) {
      return { value: candidate, via: 'capitalized token' };
    }
  }

  return null;
}

/** Leading zeros are dropped; the digits are never parsed, so long ids survive intact. */
function canonicalDigits(digits: string): string {
  return digits.replace(/^0+(?=\d)/, '');
}

export function extractProjectId(normalized: string): ExtractedArgument | null {
  const anchored = normalized.match(/\bproject\s*(?:id|number|no\.?)?\s*#?\s*(\d+)\b/);
  if (anchored) {
    return { value: canonicalDigits(anchored[1]), via: 'project reference' };
  }

  const standalone = normalized.match(/(?<![\w.])(\d+)(?![\w.])/);
  if (standalone) {
    return { value: canonicalDigits(standalone[1]), via: 'standalone number' };
  }

  return null;
}

/**
 * Extract the argument a capability needs. `none` always succeeds with null.
 */
export function extractArgument(
  kind: ArgumentKind,
  raw: string,
  normalized: string,
  lexicon: Lexicon
): { ok: true; argument: ExtractedArgument | null } | { ok: false } {
  switch (kind) {
    case 'none':
      return { ok: true, argument: null };
    case 'assignee': {
      const argument = extractAssignee(raw, lexicon);
      return argument ? { ok: true, argument } : { ok: false };
    }
    case 'projectId': {
      const argument = extractProjectId(normalized);
      return argument ? { ok: true, argument } : { ok: false };
    }
  }
}
