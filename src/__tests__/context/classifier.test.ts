import { describe, test, expect } from 'vitest';
import { KeywordClassifier, loadContextVocabulary } from '../../context/classifier.js';
import { CoreError } from '../../errors.js';

const classifier = new KeywordClassifier(loadContextVocabulary());

describe('KeywordClassifier', () => {
  test('maps agent ids to families by hint', () => {
    expect(classifier.familyFor('event-driven-agent')).toBe('event-driven');
    expect(classifier.familyFor('cicd-pipeline-agent')).toBe('cicd');
    expect(classifier.familyFor('configuration-management-agent')).toBe('configuration');
    expect(classifier.familyFor('resilience-engineering-agent')).toBe('resilience');
    expect(classifier.familyFor('pair-navigator-agent')).toBeNull();
  });

  test('classifies markers case-insensitively in rule order', () => {
    expect(classifier.classify('event-driven', 'Use Kafka topics, a saga and a DLQ')).toEqual([
      { category: 'message_brokers', value: 'kafka' },
      { category: 'event_patterns', value: 'saga' },
      { category: 'error_handling', value: 'dead-letter-queue' },
    ]);
  });

  test('whole-word rules ignore matches inside longer words', () => {
    expect(classifier.classify('resilience', 'Define an SLI for checkout')).toEqual([
      { category: 'service_levels', value: 'sli' },
    ]);
    expect(classifier.classify('resilience', 'Use a sliding window')).toEqual([]);
  });

  test('an unreadable vocabulary is a CONFIG_INVALID error', () => {
    expect(() => loadContextVocabulary('/nonexistent/vocabulary.json')).toThrow(CoreError);
  });
});
