/**
 * Markdown rendering of strengthened requirements. The original body is
 * appended verbatim so reviewers can diff intent against the rewrite.
 */

import { formatScenario } from './gherkin.js';
import type { TransformedRequirements } from '../types/index.js';

export const EMPTY_SECTION = '- None identified';

function bullets(items: readonly string[]): string {
  return items.length === 0 ? EMPTY_SECTION : items.map((i) => `- ${i}`).join('\n');
}

function section(title: string, content: string): string {
  return `## ${title}\n\n${content}`;
}

export class OutputGenerator {
  generateOutput(t: TransformedRequirements, originalBody: string): string {
    const criteria = t.acceptance_criteria.length === 0
      ? EMPTY_SECTION
      : t.acceptance_criteria.map((s) => '```gherkin\n' + formatScenario(s) + '```').join('\n\n');

    const questions = t.open_questions.length === 0
      ? EMPTY_SECTION
      : t.open_questions
        .map((q, i) => `${i + 1}. **${q.question}**\n   - Why it matters: ${q.why_it_matters}\n   - Impact: ${q.impact}`)
        .join('\n');

    return [
      `# ${t.header}`,
      section('Intent', t.intent),
      section('Actors & Stakeholders', bullets(t.actors)),
      section('Preconditions', bullets(t.preconditions)),
      section('Functional Requirements', bullets(t.functional_requirements)),
      section('Alternate / Error Flows', bullets(t.alternate_flows)),
      section('Business Rules', bullets(t.business_rules)),
      section('Data Requirements', bullets(t.data_requirements)),
      section('Acceptance Criteria', criteria),
      section('Observability', bullets(t.observability)),
      section('Open Questions', questions),
      section('Original Story', originalBody),
    ].join('\n\n') + '\n';
  }
}
