/**
 * Quality review of requirement documents, original or strengthened.
 * Every finding is a human-readable line; `passed` means no findings at all.
 */

import { escapeRegExp, storyVocabulary } from './vocabulary.js';

export interface QualityReport {
  vague_terms: string[];
  missing_acceptance_criteria: string[];
  incomplete_requirements: string[];
  unverifiable_requirements: string[];
  terminology_inconsistencies: string[];
  passed: boolean;
}

const EARS_PATTERN = /(THE system SHALL|WHILE .+ THE system SHALL|WHEN .+ THE system SHALL|IF .+ THEN THE system SHALL)/i;
const GHERKIN_PATTERN = /\b(Given|When|Then|And)\s+/i;
const ACTOR_PATTERN = /\b(user|customer|admin|administrator|system|service|developer|tester|operator|manager)\b/i;
const TRIGGER_PATTERN = /\b(when|if|after|before|upon|on|during|while|submits?|creates?|updates?|deletes?|requests?|receives?|sends?|processes?)\b/i;

const CONTEXT_CHARS = 30;
const PREVIEW_CHARS = 80;

function preview(line: string): string {
  return line.length > PREVIEW_CHARS ? `${line.slice(0, PREVIEW_CHARS)}...` : line;
}

function wordPattern(term: string, flags = 'i'): RegExp {
  return new RegExp(`\\b${escapeRegExp(term)}\\b`, flags);
}

function nonEmptyLines(text: string): string[] {
  return text.split('\n').map((l) => l.trim()).filter((l) => l.length > 0);
}

export function detectVagueTerms(text: string): string[] {
  const found: string[] = [];
  for (const term of storyVocabulary().quality_vague_terms) {
    const m = wordPattern(term).exec(text);
    if (!m) continue;
    const start = Math.max(0, m.index - CONTEXT_CHARS);
    const end = Math.min(text.length, m.index + term.length + CONTEXT_CHARS);
    found.push(`Vague term '${term}' in: "...${text.slice(start, end).trim()}..."`);
  }
  return found;
}

export function checkAcceptanceCriteriaPresence(text: string): string[] {
  const missing: string[] = [];
  const sections = text.split(/##\s+/).map((s) => s.toLowerCase());
  const hasRequirements = sections.some((s) =>
    s.includes('requirement') || s.includes('functional') || s.includes('business rule'));
  const hasCriteria = sections.some((s) =>
    s.includes('acceptance criteria') || s.includes('acceptance criterion'));
  if (hasRequirements && !hasCriteria) {
    missing.push('Requirements section found but no Acceptance Criteria section present');
  }

  const earsCount = nonEmptyLines(text).filter((l) => EARS_PATTERN.test(l)).length;
  const gherkinCount = nonEmptyLines(text).filter((l) => GHERKIN_PATTERN.test(l)).length;
  if (earsCount > 0 && gherkinCount === 0) {
    missing.push(`EARS requirements found (${earsCount}) but no Gherkin acceptance criteria present`);
  }
  return missing;
}

function scenarioBlock(text: string, line: string): string {
  const start = text.indexOf(line);
  if (start < 0) return line;
  const end = text.indexOf('\n\n', start);
  return text.slice(start, end < 0 ? text.length : end);
}

export function checkRequirementCompleteness(text: string): string[] {
  const incomplete: string[] = [];
  for (const line of nonEmptyLines(text)) {
    if (EARS_PATTERN.test(line)) {
      // SHALL already carries the outcome
      const missing = [
        ...(ACTOR_PATTERN.test(line) ? [] : ['actor']),
        ...(TRIGGER_PATTERN.test(line) ? [] : ['trigger']),
      ];
      if (missing.length > 0) {
        incomplete.push(`Incomplete requirement (missing ${missing.join(', ')}): "${preview(line)}"`);
      }
      continue;
    }

    const lower = line.toLowerCase();
    if (lower.startsWith('given') || lower.startsWith('scenario:')) {
      const block = scenarioBlock(text, line).toLowerCase();
      const missing = ['Given', 'When', 'Then'].filter((k) => !block.includes(k.toLowerCase()));
      if (missing.length > 0) {
        incomplete.push(`Incomplete Gherkin scenario (missing ${missing.join(', ')}): "${preview(line)}"`);
      }
    }
  }
  return incomplete;
}

export function flagUnverifiableRequirements(text: string): string[] {
  const terms = storyVocabulary().unverifiable_terms;
  const flagged: string[] = [];
  for (const line of nonEmptyLines(text)) {
    if (!EARS_PATTERN.test(line) && !GHERKIN_PATTERN.test(line)) continue;
    for (const term of terms) {
      const m = wordPattern(term).exec(line);
      if (m) {
        flagged.push(`Unverifiable requirement (contains '${m[0]}'): "${preview(line)}"`);
        break;
      }
    }
  }
  return flagged;
}

export function checkTerminologyConsistency(text: string): string[] {
  const found: string[] = [];
  for (const [canonical, variations] of Object.entries(storyVocabulary().terminology_groups)) {
    if (!wordPattern(canonical).test(text)) continue;
    const used = variations.filter((v) => wordPattern(v).test(text));
    if (used.length > 0) {
      found.push(`Inconsistent terminology for '${canonical}': found ${[canonical, ...used].join(', ')}`);
    }
  }
  return found;
}

export function suggestReplacement(vagueTerm: string): string {
  return storyVocabulary().replacements[vagueTerm.toLowerCase()] ?? 'specify measurable criteria';
}

export function validateRequirementsQuality(text: string): QualityReport {
  if (!text.trim()) {
    return {
      vague_terms: [], missing_acceptance_criteria: [], incomplete_requirements: [],
      unverifiable_requirements: [], terminology_inconsistencies: [], passed: true,
    };
  }
  const report = {
    vague_terms: detectVagueTerms(text),
    missing_acceptance_criteria: checkAcceptanceCriteriaPresence(text),
    incomplete_requirements: checkRequirementCompleteness(text),
    unverifiable_requirements: flagUnverifiableRequirements(text),
    terminology_inconsistencies: checkTerminologyConsistency(text),
  };
  return { ...report, passed: Object.values(report).every((list) => list.length === 0) };
}
