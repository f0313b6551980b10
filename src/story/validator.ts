/**
 * Issue gate. Checks run in order and the first failure wins:
 * repository scope, title markers, functional-story shape.
 * The verdict depends only on the issue and the options.
 */

import { getConfig } from '../config.js';
import { storyVocabulary } from './vocabulary.js';
import type { GitHubIssue, ValidationResult } from '../types/index.js';

export const STOP_REPOSITORY_NOT_IN_SCOPE = 'STOP: Repository not in scope';
export const STOP_PREFIX_NOT_SUPPORTED = 'STOP: Issue prefix not supported';
export const STOP_NOT_FUNCTIONAL_STORY = 'STOP: Issue is not a functional story';

const MIN_BODY_LENGTH = 20;

export interface IssueValidatorOptions {
  allowed_repository: string;
  required_title_markers: readonly string[];
}

export interface IssueValidator {
  validateIssue(issue: GitHubIssue): ValidationResult;
}

export class DefaultIssueValidator implements IssueValidator {
  private readonly options: IssueValidatorOptions;

  constructor(options: Partial<IssueValidatorOptions> = {}) {
    const { allowed_repository, required_title_markers } = getConfig().story;
    this.options = { allowed_repository, required_title_markers, ...options };
  }

  validateIssue(issue: GitHubIssue): ValidationResult {
    const { allowed_repository, required_title_markers } = this.options;

    if (issue.repository !== allowed_repository) {
      return {
        valid: false,
        stop_phrase: STOP_REPOSITORY_NOT_IN_SCOPE,
        reason: `Repository '${issue.repository}' is not in scope. Expected: '${allowed_repository}'`,
      };
    }

    if (!required_title_markers.every((m) => issue.title.includes(m))) {
      return {
        valid: false,
        stop_phrase: STOP_PREFIX_NOT_SUPPORTED,
        reason: `Issue title '${issue.title}' does not contain required prefixes ${required_title_markers.join(' ')}`,
      };
    }

    if (!isFunctionalStory(issue)) {
      return {
        valid: false,
        stop_phrase: STOP_NOT_FUNCTIONAL_STORY,
        reason: 'Issue does not represent a functional story (may be epic, task, or bug)',
      };
    }

    return { valid: true };
  }
}

export function isFunctionalStory(issue: GitHubIssue): boolean {
  const vocab = storyVocabulary();
  const excluded = issue.labels.some((label) => {
    const lower = label.toLowerCase();
    return vocab.non_story_labels.some((n) => lower.includes(n));
  });
  if (excluded) return false;

  const body = issue.body.trim();
  if (body.length < MIN_BODY_LENGTH) return false;

  const lower = body.toLowerCase();
  return vocab.story_indicators.some((p) => lower.includes(p));
}
