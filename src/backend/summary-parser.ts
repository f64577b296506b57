import type { ProjectSummary } from '../schema/index.js';

const PERCENT_RE = /\s(\d+)%/;

function indentLevel(line: string): number {
  let spaces = 0;
  while (spaces < line.length && line[spaces] === ' ') spaces++;
  return Math.ceil(spaces / 2);
}

/**
 * Parses `task summary` output. Nesting is encoded by two spaces of indentation
 * per level; rows are returned with their full dotted names in output order.
 *
 *   Project      Remaining  Avg age  Complete  0%        100%
 *   home                 4     2w       33%  =====
 *     garden             2     1w        0%
 */
export function parseSummaryOutput(output: string): ProjectSummary[] {
  const summaries: ProjectSummary[] = [];
  const parents: string[] = [];
  let headerFound = false;

  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === '') continue;

    if (line.includes('Project') && line.includes('Complete')) {
      headerFound = true;
      continue;
    }
    if (!headerFound) continue;
    if (trimmed.startsWith('---') || trimmed.startsWith('===')) continue;
    if (/\d+ projects?$/.test(trimmed)) continue;

    const segment = trimmed.split(/\s+/)[0];
    if (!segment || segment === '(none)') continue;

    const level = indentLevel(line);
    parents.length = Math.min(parents.length, level);

    const match = PERCENT_RE.exec(line);
    summaries.push({
      name: [...parents, segment].join('.'),
      percentage: match?.[1] ? Number(match[1]) : 0,
    });
    parents.push(segment);
  }

  return summaries;
}
