/**
 * Word lists the story pipeline matches against, loaded once from
 * config/story-vocabulary.json.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { bundledFile } from '../config.js';
import { CoreError } from '../errors.js';

const StoryVocabularySchema = z.object({
  story_indicators: z.array(z.string()),
  non_story_labels: z.array(z.string()),
  vague_terms: z.array(z.string()),
  error_keywords: z.array(z.string()),
  role_words: z.record(z.string()),
  modal_verbs: z.array(z.string()),
  narrative_phrases: z.array(z.string()),
  unsafe_domains: z.object({
    legal: z.array(z.string()),
    financial: z.array(z.string()),
    security: z.array(z.string()),
    regulatory: z.array(z.string()),
  }),
  quality_vague_terms: z.array(z.string()),
  unverifiable_terms: z.array(z.string()),
  terminology_groups: z.record(z.array(z.string())),
  replacements: z.record(z.string()),
});

export type StoryVocabulary = z.infer<typeof StoryVocabularySchema>;

let _vocabulary: StoryVocabulary | null = null;

export function storyVocabulary(): StoryVocabulary {
  if (_vocabulary) return _vocabulary;
  const file = bundledFile('story-vocabulary.json');
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new CoreError('CONFIG_INVALID', `Cannot read story vocabulary ${file}: ${String(err)}`);
  }
  const parsed = StoryVocabularySchema.safeParse(raw);
  if (!parsed.success) {
    throw new CoreError('CONFIG_INVALID', `Invalid story vocabulary ${file}: ${parsed.error.message}`);
  }
  _vocabulary = parsed.data;
  return _vocabulary;
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
