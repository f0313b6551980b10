/**
 * Requirements analyzer: pulls intent, actors, requirements, flows, rules,
 * data and open questions out of a parsed issue.
 *
 * Section lookups go by heading keyword; body-wide scans catch what authors
 * write outside of headed sections.
 */

import { logger } from '../logger.js';
import { sectionsMatching } from './parser.js';
import { storyVocabulary } from './vocabulary.js';
import { UNSAFE_DOMAINS } from './loop-detector.js';
import type {
  AnalysisResult, DataRequirement, EarsPattern, OpenQuestion, ParsedIssue, Requirement, UnsafeDomain,
} from '../types/index.js';

const log = logger.child({ component: 'requirements-analyzer' });

export const UNCLEAR_INTENT = 'Intent not clearly specified';
export const DEFAULT_ACTOR = 'User';

const INTENT_PATTERN = /(?:I want to|I need to|I can|should be able to|must be able to) ([^,.]+)/i;
const ACTOR_PATTERN = /as an? ([a-zA-Z][a-zA-Z0-9 ]+?)(?:,| I | so )/gi;
const DATA_FIELD_PATTERN = /(?:field|attribute|property|data|column)\s*:?\s*([a-zA-Z][a-zA-Z0-9_]*)/gi;
const STATE_SENTENCE = /\b(when|while|during)\b.*\b(state|status|mode)\b/;
const MIN_REQUIREMENT_LENGTH = 10;

const HEADINGS = {
  intent: ['description', 'overview', 'intent', 'purpose'],
  preconditions: ['precondition', 'prerequisite', 'assumption', 'given'],
  requirements: ['requirement', 'acceptance', 'criteria', 'feature'],
  errors: ['error', 'exception', 'failure', 'alternate'],
  rules: ['rule', 'constraint', 'policy', 'validation'],
  data: ['data', 'field', 'model', 'schema'],
} as const;

// ---------------------------------------------------------------------------
// Text helpers
// ---------------------------------------------------------------------------

function stripListMarker(line: string): string {
  return line.replace(/^[-*•]\s*/, '').replace(/^\d+\.\s*/, '').trim();
}

/** Sentences and list lines of free text; heading lines are skipped. */
function sentences(text: string): string[] {
  return text
    .split('\n')
    .filter((line) => !line.trim().startsWith('#'))
    .flatMap((line) => stripListMarker(line.trim()).split(/[.!?]/))
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function titleCase(phrase: string): string {
  return phrase
    .split(/\s+/)
    .filter((w) => w.length > 0)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
}

function containsAny(text: string, terms: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return terms.some((t) => lower.includes(t));
}

export function determinePattern(text: string): EarsPattern {
  const lower = text.toLowerCase();
  if (lower.includes('when ') || lower.includes('if ')) {
    return lower.includes('error') || lower.includes('fail') ? 'UNWANTED' : 'EVENT_DRIVEN';
  }
  if (lower.includes('while ') || lower.includes('during ')) return 'STATE_DRIVEN';
  return 'UBIQUITOUS';
}

export function isVerifiable(text: string): boolean {
  return !containsAny(text, storyVocabulary().vague_terms);
}

/** One requirement per list line; a fixed pattern overrides detection. */
export function extractRequirements(text: string, fixed: EarsPattern | null = null): Requirement[] {
  const out: Requirement[] = [];
  for (const raw of text.split('\n')) {
    const trimmed = raw.trim();
    if (trimmed.length < MIN_REQUIREMENT_LENGTH) continue;
    const line = stripListMarker(trimmed);
    if (!line) continue;
    out.push({ text: line, pattern: fixed ?? determinePattern(line), verifiable: isVerifiable(line) });
  }
  return out;
}

// ---------------------------------------------------------------------------
// Analyzer
// ---------------------------------------------------------------------------

export class RequirementsAnalyzer {
  analyzeRequirements(parsed: ParsedIssue): AnalysisResult {
    const body = parsed.body;
    const intent = this.extractIntent(parsed);
    const actors = this.identifyActors(parsed);
    const businessRules = this.extractBusinessRules(parsed);

    const result: AnalysisResult = {
      intent,
      actors,
      stakeholders: this.identifyStakeholders(actors),
      preconditions: this.detectPreconditions(parsed),
      functional_requirements: this.identifyFunctionalRequirements(parsed),
      error_flows: this.detectErrorFlows(parsed),
      business_rules: businessRules,
      data_requirements: this.identifyDataRequirements(parsed),
      open_questions: this.flagAmbiguities(body, intent, actors),
      unsafe_domains: this.detectUnsafeDomains(body, businessRules),
    };

    log.info({
      number: parsed.metadata.number,
      actors: result.actors.length,
      requirements: result.functional_requirements.length,
      open_questions: result.open_questions.length,
    }, 'Analysis complete');
    return result;
  }

  extractIntent(parsed: ParsedIssue): string {
    const section = sectionsMatching(parsed, HEADINGS.intent).find((s) => s.content.length > 0);
    const text = section ? section.content : parsed.body;
    const match = INTENT_PATTERN.exec(text);
    if (match?.[1]) return match[1].trim();
    return sentences(text)[0] ?? UNCLEAR_INTENT;
  }

  identifyActors(parsed: ParsedIssue): string[] {
    const text = parsed.body;
    const actors = new Set<string>();
    for (const m of text.matchAll(ACTOR_PATTERN)) {
      if (m[1]) actors.add(titleCase(m[1].trim()));
    }
    const lower = text.toLowerCase();
    for (const [word, role] of Object.entries(storyVocabulary().role_words)) {
      if (lower.includes(word)) actors.add(role);
    }
    if (actors.size === 0) actors.add(DEFAULT_ACTOR);
    return [...actors];
  }

  identifyStakeholders(actors: readonly string[]): string[] {
    const stakeholders = new Set(actors);
    if (actors.some((a) => a.toLowerCase().includes('customer'))) stakeholders.add('Business Owner');
    if (actors.some((a) => a.toLowerCase().includes('admin'))) stakeholders.add('System Administrator');
    return [...stakeholders];
  }

  detectPreconditions(parsed: ParsedIssue): Requirement[] {
    const found = sectionsMatching(parsed, HEADINGS.preconditions)
      .flatMap((s) => extractRequirements(s.content, 'STATE_DRIVEN'));

    for (const sentence of sentences(parsed.body)) {
      const lower = sentence.toLowerCase();
      if (found.some((r) => r.text === sentence)) continue;
      if ((lower.includes('in ') && lower.includes(' mode')) || STATE_SENTENCE.test(lower)) {
        found.push({ text: sentence, pattern: 'STATE_DRIVEN', verifiable: true });
      }
    }
    return found;
  }

  identifyFunctionalRequirements(parsed: ParsedIssue): Requirement[] {
    return sectionsMatching(parsed, HEADINGS.requirements).flatMap((s) => extractRequirements(s.content));
  }

  detectErrorFlows(parsed: ParsedIssue): Requirement[] {
    const flows = sectionsMatching(parsed, HEADINGS.errors)
      .flatMap((s) => extractRequirements(s.content, 'UNWANTED'));
    const keywords = storyVocabulary().error_keywords;
    for (const sentence of sentences(parsed.body)) {
      if (flows.some((r) => r.text === sentence)) continue;
      if (containsAny(sentence, keywords)) {
        flows.push({ text: sentence, pattern: 'UNWANTED', verifiable: true });
      }
    }
    return flows;
  }

  extractBusinessRules(parsed: ParsedIssue): string[] {
    return sectionsMatching(parsed, HEADINGS.rules)
      .flatMap((s) => extractRequirements(s.content))
      .map((r) => r.text);
  }

  identifyDataRequirements(parsed: ParsedIssue): DataRequirement[] {
    const byName = new Map<string, DataRequirement>();
    const add = (req: DataRequirement) => {
      if (req.name && !byName.has(req.name)) byName.set(req.name, req);
    };

    for (const section of sectionsMatching(parsed, HEADINGS.data)) {
      for (const raw of section.content.split('\n')) {
        const idx = raw.indexOf(':');
        if (idx < 0) continue;
        const name = stripListMarker(raw.slice(0, idx).trim());
        const description = raw.slice(idx + 1).trim();
        const lower = description.toLowerCase();
        add({ name, description, required: lower.includes('required') || lower.includes('mandatory') });
      }
    }

    for (const m of parsed.body.matchAll(DATA_FIELD_PATTERN)) {
      if (m[1]) add({ name: m[1], description: 'Field mentioned in requirements', required: false });
    }
    return [...byName.values()];
  }

  flagAmbiguities(body: string, intent: string, actors: readonly string[]): OpenQuestion[] {
    const vocab = storyVocabulary();
    const lower = body.toLowerCase();
    const questions: OpenQuestion[] = [];

    const vague = vocab.vague_terms.find((t) => lower.includes(t));
    if (vague) {
      questions.push({
        question: `What specific criteria define '${vague}'?`,
        why_it_matters: 'Vague terms make requirements unverifiable and lead to implementation ambiguity',
        impact: 'High - affects testability and acceptance criteria',
      });
    }

    if (intent === UNCLEAR_INTENT || intent.length < 10) {
      questions.push({
        question: 'What is the primary business intent of this feature?',
        why_it_matters: 'Clear intent is essential for understanding the purpose and value of the feature',
        impact: 'Critical - affects entire implementation direction',
      });
    }

    if (actors.length === 0 || (actors.length === 1 && actors[0] === DEFAULT_ACTOR)) {
      questions.push({
        question: 'Who are the specific actors/users for this feature?',
        why_it_matters: 'Identifying actors helps define permissions, workflows, and user experience',
        impact: 'High - affects security and UX design',
      });
    }

    if (!lower.includes('data') && !lower.includes('field')) {
      questions.push({
        question: 'What data fields and structures are required?',
        why_it_matters: 'Data requirements are essential for database design and API contracts',
        impact: 'High - affects data model and persistence layer',
      });
    }

    if (!containsAny(body, vocab.error_keywords)) {
      questions.push({
        question: 'How should errors and edge cases be handled?',
        why_it_matters: 'Error handling is critical for system reliability and user experience',
        impact: 'Medium - affects robustness and error recovery',
      });
    }

    return questions;
  }

  /** Domains the body touches without stating any rules to follow. */
  detectUnsafeDomains(body: string, businessRules: readonly string[]): UnsafeDomain[] {
    if (businessRules.length > 0) return [];
    const terms = storyVocabulary().unsafe_domains;
    return UNSAFE_DOMAINS.filter((d) => containsAny(body, terms[d]));
  }
}
