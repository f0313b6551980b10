/**
 * Requirements transformer: analysis in, publishable requirement lists out.
 * Counts are recorded into the ProcessingContext before capping so the loop
 * detector sees what the issue actually produced.
 */

import { getConfig } from '../config.js';
import { toEars } from './ears.js';
import { generateScenarios } from './gherkin.js';
import type { ProcessingContext } from './loop-detector.js';
import type { AnalysisResult, DataRequirement, Requirement, TransformedRequirements } from '../types/index.js';

export interface TransformerOptions {
  max_acceptance_criteria: number;
  max_open_questions: number;
}

export const REWRITTEN_SECTIONS = [
  'preconditions', 'functional_requirements', 'alternate_flows', 'acceptance_criteria', 'observability',
] as const;

function formatData(d: DataRequirement): string {
  return `${d.name}: ${d.description}${d.required ? ' (required)' : ''}`;
}

export function observabilityNotes(analysis: AnalysisResult): string[] {
  const notes = ['Log each request with its correlation id, actor and outcome'];
  if (analysis.functional_requirements.length > 0) {
    notes.push(`Record a latency metric for: ${analysis.intent}`);
  }
  for (const flow of analysis.error_flows) {
    notes.push(`Log a WARN entry and increment an error counter when: ${flow.text}`);
  }
  if (analysis.error_flows.length > 0) {
    notes.push('Alert when the error counter rate exceeds the agreed threshold');
  }
  return notes;
}

export class RequirementsTransformer {
  private readonly options: TransformerOptions;

  constructor(options: Partial<TransformerOptions> = {}) {
    const { max_acceptance_criteria, max_open_questions } = getConfig().story;
    this.options = { max_acceptance_criteria, max_open_questions, ...options };
  }

  transformRequirements(analysis: AnalysisResult, header: string, context: ProcessingContext): TransformedRequirements {
    const ears = (reqs: readonly Requirement[]) => reqs.map(toEars);
    const scenarios = generateScenarios([...analysis.functional_requirements, ...analysis.error_flows]);

    context.acceptance_criteria_count = scenarios.length;
    context.open_questions_count = analysis.open_questions.length;
    for (const section of REWRITTEN_SECTIONS) context.incrementSectionRewrite(section);

    return {
      header,
      intent: analysis.intent,
      actors: [...analysis.stakeholders],
      preconditions: ears(analysis.preconditions),
      functional_requirements: ears(analysis.functional_requirements),
      alternate_flows: ears(analysis.error_flows),
      business_rules: [...analysis.business_rules],
      data_requirements: analysis.data_requirements.map(formatData),
      acceptance_criteria: scenarios.slice(0, this.options.max_acceptance_criteria),
      observability: observabilityNotes(analysis),
      open_questions: analysis.open_questions.slice(0, this.options.max_open_questions),
    };
  }
}
