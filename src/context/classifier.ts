/**
 * Guidance classifier: decides which specialized context an agent feeds and
 * which markers a piece of guidance contains.
 *
 * The default classifier is a keyword heuristic driven by
 * config/context-vocabulary.json. Anything implementing ContextClassifier can
 * replace it without touching the context manager.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { bundledFile } from '../config.js';
import { CoreError } from '../errors.js';
import { escapeRegExp } from '../story/vocabulary.js';
import type { ContextFamily, ContextMarker } from '../types/index.js';

export const CONTEXT_FAMILIES: readonly ContextFamily[] = ['event-driven', 'cicd', 'configuration', 'resilience'];

export interface ContextClassifier {
  familyFor(agentId: string): ContextFamily | null;
  classify(family: ContextFamily, guidance: string): ContextMarker[];
}

const RuleSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  category: z.string().min(1),
  marker: z.string().min(1),
  whole_word: z.boolean().default(false),
});

const FamilySchema = z.object({
  title: z.string(),
  agent_hints: z.array(z.string().min(1)),
  rules: z.array(RuleSchema),
  advice: z.array(z.string()).default([]),
  conditional_advice: z.array(z.object({
    category: z.string(),
    marker: z.string(),
    text: z.string(),
  })).default([]),
});

export const VocabularySchema = z.object({
  families: z.object({
    'event-driven': FamilySchema,
    cicd: FamilySchema,
    configuration: FamilySchema,
    resilience: FamilySchema,
  }),
});

export type ContextVocabulary = z.infer<typeof VocabularySchema>;

export function loadContextVocabulary(path?: string | null): ContextVocabulary {
  const file = path ?? bundledFile('context-vocabulary.json');
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new CoreError('CONFIG_INVALID', `Cannot read context vocabulary ${file}: ${String(err)}`);
  }
  const parsed = VocabularySchema.safeParse(raw);
  if (!parsed.success) {
    throw new CoreError('CONFIG_INVALID', `Invalid context vocabulary ${file}: ${parsed.error.message}`);
  }
  return parsed.data;
}

interface CompiledRule {
  category: string;
  marker: string;
  matchers: ((text: string) => boolean)[];
}

export class KeywordClassifier implements ContextClassifier {
  private readonly compiled = new Map<ContextFamily, CompiledRule[]>();

  constructor(private readonly vocabulary: ContextVocabulary) {
    for (const family of CONTEXT_FAMILIES) {
      this.compiled.set(family, vocabulary.families[family].rules.map((rule) => ({
        category: rule.category,
        marker: rule.marker,
        matchers: rule.keywords.map((k) => {
          const kw = k.toLowerCase();
          if (!rule.whole_word) return (text: string) => text.includes(kw);
          const re = new RegExp(`\\b${escapeRegExp(kw)}\\b`);
          return (text: string) => re.test(text);
        }),
      })));
    }
  }

  familyFor(agentId: string): ContextFamily | null {
    const id = agentId.toLowerCase();
    for (const family of CONTEXT_FAMILIES) {
      if (this.vocabulary.families[family].agent_hints.some((h) => id.includes(h.toLowerCase()))) return family;
    }
    return null;
  }

  classify(family: ContextFamily, guidance: string): ContextMarker[] {
    const text = guidance.toLowerCase();
    const found: ContextMarker[] = [];
    for (const rule of this.compiled.get(family) ?? []) {
      if (rule.matchers.some((m) => m(text))) found.push({ category: rule.category, value: rule.marker });
    }
    return found;
  }
}
