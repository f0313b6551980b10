/**
 * Issue parser: metadata plus the markdown body split into heading sections.
 *
 * Section content is the raw markdown between one heading and the next, so
 * list items stay on their own lines for the analyzer.
 */

import { fromMarkdown } from 'mdast-util-from-markdown';
import { toString } from 'mdast-util-to-string';
import { IssueParseError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { RootContent } from 'mdast';
import type { GitHubIssue, IssueSection, ParsedIssue } from '../types/index.js';

const log = logger.child({ component: 'issue-parser' });

export class IssueParser {
  parseIssue(issue: GitHubIssue): ParsedIssue {
    if (!issue.title.trim()) {
      throw new IssueParseError(`Failed to parse issue ${issue.repository}#${issue.number}: title is empty`);
    }
    if (!issue.body.trim()) {
      throw new IssueParseError(`Failed to parse issue ${issue.repository}#${issue.number}: body is empty`);
    }

    let sections: IssueSection[];
    try {
      sections = parseSections(issue.body);
    } catch (err) {
      throw new IssueParseError(`Failed to parse issue ${issue.repository}#${issue.number}: ${errorMessage(err)}`);
    }
    log.debug({ repository: issue.repository, number: issue.number, sections: sections.length }, 'Issue parsed');

    return {
      metadata: {
        title: issue.title,
        labels: [...issue.labels],
        repository: issue.repository,
        number: issue.number,
      },
      body: issue.body,
      sections,
    };
  }
}

function sourceOf(node: RootContent, body: string): string {
  const start = node.position?.start.offset;
  const end = node.position?.end.offset;
  if (start === undefined || end === undefined) return toString(node);
  return body.slice(start, end);
}

export function parseSections(body: string): IssueSection[] {
  const tree = fromMarkdown(body);
  const sections: IssueSection[] = [];
  let current: { heading: string; level: number; parts: string[] } = { heading: '', level: 0, parts: [] };

  const flush = () => {
    const content = current.parts.join('\n\n').trim();
    if (current.heading || content) {
      sections.push({ heading: current.heading, level: current.level, content });
    }
  };

  for (const node of tree.children) {
    if (node.type === 'heading') {
      flush();
      current = { heading: toString(node).trim(), level: node.depth, parts: [] };
    } else {
      current.parts.push(sourceOf(node, body));
    }
  }
  flush();
  return sections;
}

export function sectionsMatching(parsed: ParsedIssue, keywords: readonly string[]): IssueSection[] {
  return parsed.sections.filter((s) => {
    const heading = s.heading.toLowerCase();
    return heading.length > 0 && keywords.some((k) => heading.includes(k));
  });
}
