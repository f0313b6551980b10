/**
 * Story-strengthening pipeline.
 *
 *   validate → parse → [loop] → analyze → [loop] → transform → [loop] → output
 *
 * Validation, parse and loop failures come back as stop results; nothing in
 * the happy path or the stop paths throws to the caller.
 */

import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { recordAudit } from '../storage/index.js';
import { RequirementsAnalyzer } from './analyzer.js';
import { LoopDetector, ProcessingContext } from './loop-detector.js';
import { OutputGenerator } from './output.js';
import { IssueParser } from './parser.js';
import { RequirementsTransformer } from './transformer.js';
import { DefaultIssueValidator } from './validator.js';
import type { IssueValidator } from './validator.js';
import type { GitHubIssue, ParsedIssue, ProcessingResult } from '../types/index.js';

const log = logger.child({ component: 'story-pipeline' });

export const STOP_PARSE_FAILED = 'STOP: Issue parsing failed';
const PIPELINE_ACTOR = 'story-pipeline';

export interface PipelineStages {
  validator: IssueValidator;
  parser: IssueParser;
  analyzer: RequirementsAnalyzer;
  transformer: RequirementsTransformer;
  output: OutputGenerator;
  loopDetector: LoopDetector;
}

function issueRef(issue: GitHubIssue): string {
  return `${issue.repository}#${issue.number}`;
}

export class StoryStrengtheningPipeline {
  private readonly stages: PipelineStages;

  constructor(stages: Partial<PipelineStages> = {}) {
    this.stages = {
      validator: stages.validator ?? new DefaultIssueValidator(),
      parser: stages.parser ?? new IssueParser(),
      analyzer: stages.analyzer ?? new RequirementsAnalyzer(),
      transformer: stages.transformer ?? new RequirementsTransformer(),
      output: stages.output ?? new OutputGenerator(),
      loopDetector: stages.loopDetector ?? new LoopDetector(),
    };
  }

  processIssue(issue: GitHubIssue, context: ProcessingContext = new ProcessingContext()): ProcessingResult {
    const { validator, parser, analyzer, transformer, output, loopDetector } = this.stages;
    log.info({ issue: issueRef(issue) }, 'Processing issue');

    const validation = validator.validateIssue(issue);
    if (!validation.valid) {
      return this.stop(issue, validation.stop_phrase, validation.reason, 'VALIDATION_FAILED');
    }

    let parsed: ParsedIssue;
    try {
      parsed = parser.parseIssue(issue);
    } catch (err) {
      return this.stop(issue, STOP_PARSE_FAILED, errorMessage(err), 'PARSE_FAILURE');
    }

    const checkLoops = (): ProcessingResult | null => {
      const loop = loopDetector.checkForLoops(context);
      if (!loop.loop_detected || !loop.stop_phrase) return null;
      return this.stop(issue, loop.stop_phrase, loop.details ?? loop.stop_phrase, 'LOOP_DETECTED');
    };

    const afterParse = checkLoops();
    if (afterParse) return afterParse;

    const analysis = analyzer.analyzeRequirements(parsed);
    for (const domain of analysis.unsafe_domains) context.setRequiresInference(domain);
    const afterAnalysis = checkLoops();
    if (afterAnalysis) return afterAnalysis;

    const transformed = transformer.transformRequirements(analysis, parsed.metadata.title, context);
    const afterTransform = checkLoops();
    if (afterTransform) return afterTransform;

    const document = output.generateOutput(transformed, parsed.body);
    recordAudit('story.completed', PIPELINE_ACTOR, 'issue', issueRef(issue), {
      acceptance_criteria: context.acceptance_criteria_count,
      open_questions: context.open_questions_count,
    });
    log.info({ issue: issueRef(issue), scenarios: transformed.acceptance_criteria.length }, 'Issue strengthened');
    return { success: true, output: document };
  }

  private stop(
    issue: GitHubIssue,
    stopPhrase: string,
    reason: string,
    code: 'VALIDATION_FAILED' | 'PARSE_FAILURE' | 'LOOP_DETECTED',
  ): ProcessingResult {
    log.warn({ issue: issueRef(issue), stop_phrase: stopPhrase, code, reason }, 'Issue processing stopped');
    recordAudit('story.stopped', PIPELINE_ACTOR, 'issue', issueRef(issue), { stop_phrase: stopPhrase, code, reason });
    return { success: false, stop_phrase: stopPhrase, reason, code };
  }
}
