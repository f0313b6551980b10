import { describe, test, expect, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { bundledFile, getConfig, loadConfig, resetConfig } from '../config.js';

function configFile(contents: string): string {
  const file = join(mkdtempSync(join(tmpdir(), 'consult-config-')), 'consult.config.json');
  writeFileSync(file, contents);
  return file;
}

describe('config', () => {
  afterEach(() => {
    resetConfig();
  });

  test('defaults cover every section', () => {
    resetConfig();
    const config = loadConfig(configFile('{}'));
    expect(config.failover).toEqual({
      recovery_timeout_ms: 30_000,
      max_backup_agents: 3,
      enable_automatic_failover: true,
      health_check_interval_ms: 60_000,
      failure_threshold: 3,
    });
    expect(config.story.allowed_repository).toBe('backend-service');
    expect(config.story.required_title_markers).toEqual(['[BACKEND]', '[STORY]']);
    expect(config.story.max_acceptance_criteria).toBe(25);
    expect(config.performance.critical.response_time_ms).toBe(1_000);
  });

  test('file values and overrides merge per section', () => {
    resetConfig();
    const file = configFile(JSON.stringify({ failover: { failure_threshold: 5, max_backup_agents: 1 } }));
    const config = loadConfig(file, { failover: { max_backup_agents: 2 } });
    expect(config.failover.failure_threshold).toBe(5);
    expect(config.failover.max_backup_agents).toBe(2);
    expect(config.failover.recovery_timeout_ms).toBe(30_000);
  });

  test('an invalid file falls back to defaults', () => {
    resetConfig();
    expect(loadConfig(configFile(JSON.stringify({ failover: { failure_threshold: 0 } }))).failover.failure_threshold).toBe(3);
    resetConfig();
    expect(loadConfig(configFile('not json')).story.max_open_questions).toBe(10);
  });

  test('the loaded config is cached until reset', () => {
    resetConfig();
    const first = loadConfig(configFile('{}'), { story: { max_open_questions: 4 } });
    expect(getConfig()).toBe(first);
    expect(loadConfig(undefined, { story: { max_open_questions: 9 } }).story.max_open_questions).toBe(4);
  });

  test('bundled files resolve into the config directory', () => {
    expect(bundledFile('agents.json').endsWith(join('config', 'agents.json'))).toBe(true);
  });
});
