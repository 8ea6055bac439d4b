import { simpleGit } from 'simple-git';

/**
 * Minimal git surface used by the orchestrator. `createGitRunner()` backs it
 * with simple-git; tests substitute a fake.
 */
export interface GitRunner {
  raw(args: string[]): Promise<string>;
}

export interface CommitInfo {
  sha: string;
  message: string;
}

export interface HeadCommit extends CommitInfo {
  /**
   * Parent commits in git order; a merge commit has the merged-in side second.
   */
  parents: CommitInfo[];
}

/**
 * Source-control history as seen by the directive scanner.
 */
export interface CommitHistory {
  getHeadCommit(): Promise<HeadCommit | null>;
}

export interface RepositoryLocator {
  getRepositoryRoot(): Promise<string | null>;
}

export function createGitRunner(dir: string): GitRunner {
  const git = simpleGit(dir);
  return {
    raw: (args) => git.raw(args),
  };
}

/**
 * Reads the full message of a commit.
 *
 * @throws Error if git cannot read the commit
 */
export async function readCommitMessage(git: GitRunner, sha: string): Promise<string> {
  const output = await git.raw(['log', '-1', '--format=%B', sha]);
  return output.replace(/\n+$/, '');
}

/**
 * Reads HEAD with the messages of its parents.
 *
 * @returns the head commit, or null when the directory has no commits (or is
 * not a repository at all)
 *
 * @example
 * const head = await getHeadCommit(createGitRunner(process.cwd()));
 * if (head && head.parents.length === 2) {
 *   console.log(`Merged in: ${head.parents[1].message}`);
 * }
 */
export async function getHeadCommit(git: GitRunner): Promise<HeadCommit | null> {
  let revision: string;
  try {
    revision = await git.raw(['rev-list', '--parents', '-n', '1', 'HEAD']);
  } catch {
    return null;
  }

  const [sha, ...parentShas] = revision.trim().split(/\s+/).filter(Boolean);
  if (!sha) {
    return null;
  }

  const parents: CommitInfo[] = [];
  for (const parentSha of parentShas) {
    parents.push({ sha: parentSha, message: await readCommitMessage(git, parentSha) });
  }

  return {
    sha,
    message: await readCommitMessage(git, sha),
    parents,
  };
}

/**
 * @returns the top-level directory of the repository, or null outside one
 */
export async function getRepositoryRoot(git: GitRunner): Promise<string | null> {
  try {
    const root = (await git.raw(['rev-parse', '--show-toplevel'])).trim();
    return root || null;
  } catch {
    return null;
  }
}

/**
 * Git-backed history and repository lookups rooted at `dir`.
 */
export function createGitRepository(dir: string): CommitHistory & RepositoryLocator {
  const git = createGitRunner(dir);
  return {
    getHeadCommit: () => getHeadCommit(git),
    getRepositoryRoot: () => getRepositoryRoot(git),
  };
}
