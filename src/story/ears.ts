/**
 * EARS rendering of analyzed requirements.
 *
 *   UBIQUITOUS    THE system SHALL <action>
 *   STATE_DRIVEN  WHILE <condition>, THE system SHALL <action>
 *   EVENT_DRIVEN  WHEN <trigger>, THE system SHALL <action>
 *   UNWANTED      IF <condition>, THEN THE system SHALL <action>
 */

import type { Requirement } from '../types/index.js';

const SHALL = 'THE system SHALL';

export const DEFAULT_STATE = 'in the appropriate state';
export const DEFAULT_TRIGGER = 'the event occurs';
export const DEFAULT_CONDITION = 'an error occurs';

type Split = [condition: string, action: string];

function firstMatch(text: string, patterns: readonly RegExp[]): Split | null {
  for (const re of patterns) {
    const m = re.exec(text);
    if (m?.[1] && m[2]) return [m[1].trim(), m[2].trim()];
  }
  return null;
}

function lowerFirst(s: string): string {
  return s ? s.charAt(0).toLowerCase() + s.slice(1) : s;
}

export function normalizeAction(action: string): string {
  return lowerFirst(
    action
      .replace(/^(the\s+)?system\s+((shall|must|should|will)\s+)?/i, '')
      .replace(/^then\s+/i, '')
      .trim(),
  );
}

function ubiquitous(text: string): string {
  if (/^THE\s+system\s+SHALL\s+.+/i.test(text)) {
    return text.replace(/^THE\s+system\s+SHALL/i, SHALL);
  }
  const action = text
    .replace(/^(the\s+system\s+)?(must|should|will|shall)\s+/i, '')
    .replace(/^always\s+/i, '');
  return `${SHALL} ${lowerFirst(action)}`;
}

function stateDriven(text: string): string {
  const state = /^(?:when\s+)?(?:in|during)\s+(.+?)\s+state[,:]?\s+(.+)$/is.exec(text);
  const split: Split | null = state?.[1] && state[2]
    ? [`${state[1].trim()} state`, state[2].trim()]
    : firstMatch(text, [/^while\s+(.+?)\s+then\s+(.+)$/is, /^while\s+(.+?)[,:]\s+(.+)$/is]);
  const [condition, action] = split ?? [DEFAULT_STATE, text];
  return `WHILE ${condition}, ${SHALL} ${normalizeAction(action)}`;
}

function eventDriven(text: string): string {
  const [trigger, action] = firstMatch(text, [
    /^when\s+(.+?)\s+then\s+(.+)$/is,
    /^when\s+(.+?)[,:]\s+(.+)$/is,
    /^(?:on|upon)\s+(.+?)[,:]\s+(.+)$/is,
    /^after\s+(.+?)[,:]\s+(.+)$/is,
  ]) ?? [DEFAULT_TRIGGER, text];
  return `WHEN ${trigger}, ${SHALL} ${normalizeAction(action)}`;
}

function unwanted(text: string): string {
  const [condition, action] = firstMatch(text, [
    /^if\s+(.+?)\s+then\s+(.+)$/is,
    /^if\s+(.+?)[,:]\s+(.+)$/is,
    /^in\s+case\s+of\s+(.+?)[,:]\s+(.+)$/is,
  ]) ?? [DEFAULT_CONDITION, text];
  return `IF ${condition}, THEN ${SHALL} ${normalizeAction(action)}`;
}

export function toEars(requirement: Requirement): string {
  const text = requirement.text.trim();
  switch (requirement.pattern) {
    case 'UBIQUITOUS':
      return ubiquitous(text);
    case 'STATE_DRIVEN':
      return stateDriven(text);
    case 'EVENT_DRIVEN':
      return eventDriven(text);
    case 'UNWANTED':
      return unwanted(text);
  }
}
