import { describe, test, expect, afterEach } from 'vitest';
import { loadConfig, resetConfig } from '../../config.js';
import { StoryStrengtheningPipeline, STOP_PARSE_FAILED } from '../../story/pipeline.js';
import { ProcessingContext } from '../../story/loop-detector.js';
import { issue } from '../helpers/issues.js';
import { unwritableBasePath } from '../helpers/storage.js';

describe('StoryStrengtheningPipeline', () => {
  const pipeline = new StoryStrengtheningPipeline();

  test('strengthens a valid story', () => {
    const result = pipeline.processIssue(issue());
    if (!result.success) throw new Error(`unexpected stop: ${result.stop_phrase}`);

    expect(result.output.startsWith('# [BACKEND][STORY] Export orders\n\n## Intent\n\nexport my orders so that I can reconcile payments\n\n')).toBe(true);
    expect(result.output).toContain('## Functional Requirements\n\n- WHEN the customer requests an export, THE system SHALL returns a CSV file\n\n');
    expect(result.output).toContain('## Business Rules\n\n- Only completed orders are exported\n\n');
    expect(result.output.endsWith(`## Original Story\n\n${issue().body}\n`)).toBe(true);
  });

  test('stops on an out-of-scope repository', () => {
    expect(pipeline.processIssue(issue({ repository: 'wrong-repo' }))).toEqual({
      success: false,
      stop_phrase: 'STOP: Repository not in scope',
      reason: "Repository 'wrong-repo' is not in scope. Expected: 'backend-service'",
      code: 'VALIDATION_FAILED',
    });
  });

  test('stops on a short bug report', () => {
    const result = pipeline.processIssue(issue({ body: 'Short', labels: ['bug'] }));
    expect(result).toEqual({
      success: false,
      stop_phrase: 'STOP: Issue is not a functional story',
      reason: 'Issue does not represent a functional story (may be epic, task, or bug)',
      code: 'VALIDATION_FAILED',
    });
  });

  test('parse failures become a stop result', () => {
    const lenient = new StoryStrengtheningPipeline({ validator: { validateIssue: () => ({ valid: true }) } });
    expect(lenient.processIssue(issue({ body: '' }))).toEqual({
      success: false,
      stop_phrase: STOP_PARSE_FAILED,
      reason: 'Failed to parse issue backend-service#42: body is empty',
      code: 'PARSE_FAILURE',
    });
  });

  test('too many acceptance criteria stop the run', () => {
    const lines = Array.from({ length: 26 }, (_, i) => `- The system stores record ${i + 1}`);
    const body = `As a clerk, I want to store records.\n\n## Acceptance Criteria\n\n${lines.join('\n')}`;
    const context = new ProcessingContext();

    expect(pipeline.processIssue(issue({ body }), context)).toEqual({
      success: false,
      stop_phrase: 'STOP: Acceptance criteria threshold exceeded',
      reason: 'Generated 26 acceptance criteria, which exceeds the maximum of 25 scenarios',
      code: 'LOOP_DETECTED',
    });
    expect(context.acceptance_criteria_count).toBe(26);
  });

  test('unstated financial rules stop the run', () => {
    const body = 'As a user I want the invoice to apply the tax calculation for each order.';
    expect(pipeline.processIssue(issue({ body }))).toEqual({
      success: false,
      stop_phrase: 'STOP: Unsafe inference required',
      reason: 'Completing this story requires inferring financial rules that the issue does not state',
      code: 'LOOP_DETECTED',
    });
  });

  test('a context reused past the rewrite limit stops on the third run', () => {
    const context = new ProcessingContext();
    expect(pipeline.processIssue(issue(), context).success).toBe(true);
    expect(pipeline.processIssue(issue(), context).success).toBe(true);
    expect(pipeline.processIssue(issue(), context)).toEqual({
      success: false,
      stop_phrase: 'STOP: Rewrite iteration limit exceeded',
      reason: "Section 'preconditions' was rewritten 3 times, exceeding the maximum of 2 iterations",
      code: 'LOOP_DETECTED',
    });
  });

  describe('when the audit log cannot be written', () => {
    afterEach(() => {
      resetConfig();
    });

    test('stops and completions are still returned', () => {
      resetConfig();
      loadConfig(undefined, { storage: { base_path: unwritableBasePath() } });
      const blocked = new StoryStrengtheningPipeline();

      expect(blocked.processIssue(issue({ repository: 'wrong-repo' }))).toEqual({
        success: false,
        stop_phrase: 'STOP: Repository not in scope',
        reason: "Repository 'wrong-repo' is not in scope. Expected: 'backend-service'",
        code: 'VALIDATION_FAILED',
      });
      expect(blocked.processIssue(issue()).success).toBe(true);
    });
  });
});
