/**
 * Gherkin scenarios from requirement text.
 *
 * Clauses are pulled out by keyword, cleaned of modal verbs and narrative
 * filler, and compound "and" clauses are split into separate steps.
 */

import { escapeRegExp, storyVocabulary } from './vocabulary.js';
import type { GherkinScenario, Requirement } from '../types/index.js';

const GIVEN_PATTERN = /\b(?:given|assuming|provided that)\s+(.+?)(?:,|\.|$)/gi;
const WHEN_PATTERN = /\b(?:when|if|upon|on|after)\s+(.+?)(?:,|\.|$)/gi;
const THEN_PATTERN = /\b(?:then|the system|it)\s+(.+?)(?:,|\.|$)/gi;

const SHALL_PREFIX = /^(the system shall|the system must|system shall|system must)\s+/i;
const CONDITION_PREFIX = /^(when|if|given|while)\s+/i;
const STATE_WORDS = /\b(authenticated|logged in|authorized|active)\b/i;
const OBSERVABLE_VERBS = /\b(is|are|has|have|displays|shows|returns|creates|updates|deletes|sends|receives)\b/i;

export const MAX_SCENARIO_NAME = 80;

// ---------------------------------------------------------------------------
// Clause cleanup
// ---------------------------------------------------------------------------

export function normalizeClause(clause: string): string {
  const collapsed = clause.trim().replace(/\s+/g, ' ');
  const lowered = collapsed ? collapsed.charAt(0).toLowerCase() + collapsed.slice(1) : collapsed;
  return lowered.replace(/[,;:]$/, '');
}

export function removeModalVerbs(clause: string): string {
  let out = clause;
  for (const verb of storyVocabulary().modal_verbs) {
    out = out.replace(new RegExp(`\\b${escapeRegExp(verb)}\\b\\s*`, 'gi'), '');
  }
  return out.trim();
}

export function removeNarrativePhrases(text: string): string {
  let out = text;
  for (const phrase of storyVocabulary().narrative_phrases) {
    out = out.replace(new RegExp(`\\b${escapeRegExp(phrase)}\\b[,\\s]*`, 'gi'), '');
  }
  return out.trim();
}

export function makeVerifiable(clause: string): string {
  const lower = clause.toLowerCase();
  if (!clause || lower.includes('successfully') || lower.includes('correctly') || lower.includes('properly')) {
    return clause;
  }
  return OBSERVABLE_VERBS.test(clause) ? clause : `the system ${clause}`;
}

export function splitCompound(clauses: readonly string[]): string[] {
  return clauses.flatMap((clause) => {
    const lower = clause.toLowerCase();
    if (!lower.includes(' and ') || lower.includes(' and then')) return [clause];
    return clause.split(/\s+and\s+/i).map((p) => p.trim()).filter((p) => p.length > 0);
  });
}

function matches(text: string, pattern: RegExp): string[] {
  const out: string[] = [];
  for (const m of text.matchAll(pattern)) {
    const clause = m[1]?.trim();
    if (clause) out.push(normalizeClause(clause));
  }
  return out;
}

function firstPart(text: string): string {
  return normalizeClause(text.split(/[,.]/)[0] ?? '');
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

export function scenarioName(text: string): string {
  const stripped = removeNarrativePhrases(text).replace(SHALL_PREFIX, '').replace(CONDITION_PREFIX, '');
  const name = removeModalVerbs((stripped.split(/[,.]/)[0] ?? '').trim());
  const capitalized = name ? name.charAt(0).toUpperCase() + name.slice(1) : name;
  return capitalized.length > MAX_SCENARIO_NAME
    ? `${capitalized.slice(0, MAX_SCENARIO_NAME - 3)}...`
    : capitalized;
}

function givenClauses(text: string): string[] {
  const found = matches(text, GIVEN_PATTERN);
  if (found.length > 0) return found;
  const state = STATE_WORDS.exec(text);
  if (!state?.[1]) return [];
  // "logged in" reduces to "logged"
  return [`the user is ${state[1].toLowerCase().split(' ')[0]}`];
}

function whenClauses(text: string): string[] {
  const found = matches(text, WHEN_PATTERN);
  if (found.length > 0) return found;
  const lower = text.toLowerCase();
  if (!lower.includes('user') && !lower.includes('system')) return [];
  const action = firstPart(text.replace(SHALL_PREFIX, '').replace(CONDITION_PREFIX, ''));
  return action ? [action] : [];
}

function thenClauses(text: string): string[] {
  const found = matches(text, THEN_PATTERN);
  if (found.length > 0) return found;
  const outcome = firstPart(text.replace(SHALL_PREFIX, '').replace(/^(when|if|given|while)\s+.+?,\s*/i, ''));
  return outcome ? [outcome] : [];
}

function clean(clauses: string[]): string[] {
  return clauses
    .map(removeNarrativePhrases)
    .filter((c) => c.trim().length > 0)
    .map(removeModalVerbs);
}

export function generateScenario(requirement: Requirement): GherkinScenario {
  const text = requirement.text;
  return {
    name: scenarioName(text),
    given: splitCompound(clean(givenClauses(text))),
    when: splitCompound(clean(whenClauses(text))),
    then: splitCompound(clean(thenClauses(text)).map(makeVerifiable)),
  };
}

export function generateScenarios(requirements: readonly Requirement[]): GherkinScenario[] {
  return requirements.map(generateScenario);
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function steps(keyword: string, clauses: readonly string[]): string[] {
  return clauses.map((c, i) => `  ${i === 0 ? keyword : 'And'} ${c}`);
}

export function formatScenario(scenario: GherkinScenario): string {
  const lines = [
    `Scenario: ${scenario.name}`,
    ...steps('Given', scenario.given),
    ...steps('When', scenario.when),
    ...steps('Then', scenario.then),
  ];
  return lines.join('\n') + '\n';
}
