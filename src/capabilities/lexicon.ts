/**
 * Trigger lexicon loader.
 *
 * The lexicon (trigger phrases per capability, argument anchors and the
 * stopword list) lives in data/lexicon.json so it can grow without code
 * changes. It is validated once and frozen.
 *
 * @module capabilities/lexicon
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { TriggerPhraseSchema } from '../types/index.js';

export const LexiconSchema = z.object({
  triggers: z.object({
    FetchOverdueTasks: z.array(TriggerPhraseSchema).min(1),
    FetchAllTasks: z.array(TriggerPhraseSchema).min(1),
    ListProjects: z.array(TriggerPhraseSchema).min(1),
    GetProjectById: z.array(TriggerPhraseSchema).min(1),
  }),
  anchors: z.array(z.string().min(1)),
  stopwords: z.array(z.string().min(1)),
});
export type Lexicon = z.infer<typeof LexiconSchema>;

export const DEFAULT_LEXICON_PATH = fileURLToPath(new URL('../../data/lexicon.json', import.meta.url));

export function loadLexicon(filePath: string = DEFAULT_LEXICON_PATH): Lexicon {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const result = LexiconSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid lexicon at ${filePath}: ${result.error.message}`);
  }
  return Object.freeze({
    ...result.data,
    stopwords: result.data.stopwords.map((word) => word.toLowerCase()),
  });
}

let cachedLexicon: Lexicon | null = null;

export function getLexicon(): Lexicon {
  if (cachedLexicon === null) {
    cachedLexicon = loadLexicon();
  }
  return cachedLexicon;
}
