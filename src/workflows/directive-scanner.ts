import type { CommitHistory } from '../services/repository/git-operations.js';
import type { Logger } from '../services/logging/logger.js';

export const DIRECTIVE_MARKER = 'wfrun:run[';

// Non-greedy so that several directives on one line stay separate
const DIRECTIVE_PATTERN = /wfrun:run\[(.+?)\]/g;

const MERGE_MARKER = 'Merge';

/**
 * One `wfrun:run[...]` occurrence in a commit message.
 */
export interface RunDirective {
  /**
   * Text between the brackets.
   */
  payload: string;
  /**
   * Payload split on whitespace, ready for the `run` grammar.
   */
  args: string[];
}

/**
 * `absent` means the marker does not occur at all, which is not the same as a
 * marker whose payloads yielded nothing.
 */
export type DirectiveScan =
  | { kind: 'absent' }
  | { kind: 'found'; directives: RunDirective[] };

export function splitDirectivePayload(payload: string): string[] {
  return payload.split(/\s+/).filter((arg) => arg.length > 0);
}

/**
 * Extracts every run directive from a commit message, left to right.
 *
 * @example
 * extractDirectives('Fix build wfrun:run[--wfile a.workflow build] wfrun:run[test]');
 * // { kind: 'found', directives: [
 * //   { payload: '--wfile a.workflow build', args: ['--wfile', 'a.workflow', 'build'] },
 * //   { payload: 'test', args: ['test'] } ] }
 */
export function extractDirectives(message: string): DirectiveScan {
  if (!message.includes(DIRECTIVE_MARKER)) {
    return { kind: 'absent' };
  }

  const directives: RunDirective[] = [];
  for (const match of message.matchAll(DIRECTIVE_PATTERN)) {
    const payload = match[1];
    directives.push({ payload, args: splitDirectivePayload(payload) });
  }

  return { kind: 'found', directives };
}

/**
 * Scans the head commit for run directives. On a merge commit with two
 * parents the merged-in commit's message is scanned instead.
 */
export async function scanHeadCommit(history: CommitHistory, logger: Logger): Promise<DirectiveScan> {
  const head = await history.getHeadCommit();
  if (!head) {
    logger.debug('No head commit found; skipping directive scan.');
    return { kind: 'absent' };
  }

  let message = head.message;
  if (message.includes(MERGE_MARKER)) {
    logger.info('Merge detected. Reading message from merged commit.');
    if (head.parents.length === 2) {
      message = head.parents[1].message;
    }
  }

  return extractDirectives(message);
}
