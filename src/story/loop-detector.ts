/**
 * Loop detection for the story pipeline.
 *
 * ProcessingContext is the mutable tally one run accumulates; LoopDetector
 * reads it between stages and decides whether the run may continue.
 */

import { getConfig } from '../config.js';
import type { LoopDetectionResult, UnsafeDomain } from '../types/index.js';

export const STOP_REWRITE_LIMIT = 'STOP: Rewrite iteration limit exceeded';
export const STOP_ACCEPTANCE_CRITERIA_LIMIT = 'STOP: Acceptance criteria threshold exceeded';
export const STOP_OPEN_QUESTION_LIMIT = 'STOP: Open question threshold exceeded';
export const STOP_UNSAFE_INFERENCE = 'STOP: Unsafe inference required';

export const UNSAFE_DOMAINS: readonly UnsafeDomain[] = ['legal', 'financial', 'security', 'regulatory'];

export class ProcessingContext {
  private readonly rewrites = new Map<string, number>();
  private readonly unsafe = new Set<UnsafeDomain>();
  acceptance_criteria_count = 0;
  open_questions_count = 0;

  incrementSectionRewrite(section: string): number {
    const next = (this.rewrites.get(section) ?? 0) + 1;
    this.rewrites.set(section, next);
    return next;
  }

  getSectionRewriteCount(section: string): number {
    return this.rewrites.get(section) ?? 0;
  }

  get sectionRewrites(): ReadonlyMap<string, number> {
    return this.rewrites;
  }

  setRequiresInference(domain: UnsafeDomain, requires = true): void {
    if (requires) this.unsafe.add(domain);
    else this.unsafe.delete(domain);
  }

  requiresInference(domain: UnsafeDomain): boolean {
    return this.unsafe.has(domain);
  }

  requiresAnyUnsafeInference(): boolean {
    return this.unsafe.size > 0;
  }

  /** Flagged domains in fixed order. */
  get unsafeDomains(): UnsafeDomain[] {
    return UNSAFE_DOMAINS.filter((d) => this.unsafe.has(d));
  }

  toJSON(): Record<string, unknown> {
    return {
      section_rewrites: Object.fromEntries(this.rewrites),
      acceptance_criteria_count: this.acceptance_criteria_count,
      open_questions_count: this.open_questions_count,
      unsafe_domains: this.unsafeDomains,
    };
  }
}

export interface LoopDetectorOptions {
  max_rewrite_iterations: number;
  max_acceptance_criteria: number;
  max_open_questions: number;
  enable_loop_detection: boolean;
}

const NO_LOOP: LoopDetectionResult = { loop_detected: false, stop_phrase: null, details: null };

export class LoopDetector {
  private readonly options: LoopDetectorOptions;

  constructor(options: Partial<LoopDetectorOptions> = {}) {
    const { max_rewrite_iterations, max_acceptance_criteria, max_open_questions, enable_loop_detection } = getConfig().story;
    this.options = {
      max_rewrite_iterations, max_acceptance_criteria, max_open_questions, enable_loop_detection,
      ...options,
    };
  }

  /** First matching condition wins: rewrites, criteria, questions, unsafe inference. */
  checkForLoops(context: ProcessingContext): LoopDetectionResult {
    const { max_rewrite_iterations, max_acceptance_criteria, max_open_questions, enable_loop_detection } = this.options;
    if (!enable_loop_detection) return { ...NO_LOOP };

    for (const [section, count] of context.sectionRewrites) {
      if (count > max_rewrite_iterations) {
        return {
          loop_detected: true,
          stop_phrase: STOP_REWRITE_LIMIT,
          details: `Section '${section}' was rewritten ${count} times, exceeding the maximum of ${max_rewrite_iterations} iterations`,
        };
      }
    }

    if (context.acceptance_criteria_count > max_acceptance_criteria) {
      return {
        loop_detected: true,
        stop_phrase: STOP_ACCEPTANCE_CRITERIA_LIMIT,
        details: `Generated ${context.acceptance_criteria_count} acceptance criteria, which exceeds the maximum of ${max_acceptance_criteria} scenarios`,
      };
    }

    if (context.open_questions_count > max_open_questions) {
      return {
        loop_detected: true,
        stop_phrase: STOP_OPEN_QUESTION_LIMIT,
        details: `Raised ${context.open_questions_count} open questions, which exceeds the maximum of ${max_open_questions} questions`,
      };
    }

    if (context.requiresAnyUnsafeInference()) {
      return {
        loop_detected: true,
        stop_phrase: STOP_UNSAFE_INFERENCE,
        details: `Completing this story requires inferring ${context.unsafeDomains.join(', ')} rules that the issue does not state`,
      };
    }

    return { ...NO_LOOP };
  }
}
