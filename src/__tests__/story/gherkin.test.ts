import { describe, test, expect } from 'vitest';
import {
  MAX_SCENARIO_NAME, formatScenario, generateScenario, makeVerifiable, normalizeClause, removeModalVerbs,
  removeNarrativePhrases, scenarioName, splitCompound,
} from '../../story/gherkin.js';
import type { Requirement } from '../../types/index.js';

function req(text: string): Requirement {
  return { text, pattern: 'EVENT_DRIVEN', verifiable: true };
}

describe('clause helpers', () => {
  test('normalizeClause collapses whitespace, lowercases and drops trailing punctuation', () => {
    expect(normalizeClause('  The   user waits, ')).toBe('the user waits');
  });

  test('removeModalVerbs strips hedging words', () => {
    expect(removeModalVerbs('The system should possibly retry')).toBe('The system retry');
  });

  test('removeNarrativePhrases strips filler', () => {
    expect(removeNarrativePhrases('Note that the cache expires')).toBe('the cache expires');
  });

  test('makeVerifiable adds a subject to clauses without an observable verb', () => {
    expect(makeVerifiable('save the draft')).toBe('the system save the draft');
    expect(makeVerifiable('order is saved')).toBe('order is saved');
    expect(makeVerifiable('data persisted correctly')).toBe('data persisted correctly');
  });

  test('splitCompound splits on "and" but not "and then"', () => {
    expect(splitCompound(['create the order and notify the user', 'validate and then save']))
      .toEqual(['create the order', 'notify the user', 'validate and then save']);
  });

  test('scenario names are capped', () => {
    const name = scenarioName('x'.repeat(100));
    expect(name).toHaveLength(MAX_SCENARIO_NAME);
    expect(name).toBe(`X${'x'.repeat(76)}...`);
  });
});

describe('generateScenario', () => {
  test('extracts when and then clauses and splits compound outcomes', () => {
    expect(generateScenario(req('When the user submits the form, the system should save the order and send a confirmation email.')))
      .toEqual({
        name: 'The user submits the form',
        given: [],
        when: ['the user submits the form'],
        then: ['the system save the order', 'send a confirmation email'],
      });
  });

  test('uses explicit given/when/then keywords', () => {
    expect(generateScenario(req('Given the user is logged in, when they open the dashboard, then widgets are displayed.')))
      .toEqual({
        name: 'The user is logged in',
        given: ['the user is logged in'],
        when: ['they open the dashboard'],
        then: ['widgets are displayed'],
      });
  });

  test('infers a precondition from state words', () => {
    expect(generateScenario(req('The authenticated user can download invoices')).given)
      .toEqual(['the user is authenticated']);
  });

  test('drops narrative filler from names and clauses', () => {
    expect(generateScenario(req('In order to comply, the system must log every access'))).toEqual({
      name: 'Comply',
      given: [],
      when: ['comply'],
      then: ['the system must log every access'],
    });
  });
});

describe('formatScenario', () => {
  test('renders steps with And for repeated keywords', () => {
    expect(formatScenario({
      name: 'Checkout',
      given: ['a cart', 'a payment method'],
      when: ['the user pays'],
      then: ['an order is created'],
    })).toBe(
      'Scenario: Checkout\n'
      + '  Given a cart\n'
      + '  And a payment method\n'
      + '  When the user pays\n'
      + '  Then an order is created\n',
    );
  });
});
