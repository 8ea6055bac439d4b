import { readdir, stat } from 'fs/promises';
import { isAbsolute, join, relative, resolve } from 'path';
import { WorkflowNotFoundError } from '../../workflows/errors.js';

/**
 * Default workflow locations, relative to the workspace, in lookup order.
 */
export const DEFAULT_WORKFLOW_PATHS = ['.github/main.workflow', 'main.workflow'];

export const WORKFLOW_FILE_EXTENSION = '.workflow';

// Directories never searched for workflow files
const IGNORED_DIRECTORIES = new Set(['.git', 'node_modules']);

/**
 * Workflow file lookups used by the planner and the sequencer.
 */
export interface WorkflowLocator {
  resolveWorkflowFile(wfile: string | undefined, workspace: string): Promise<string>;
  findWorkflowFiles(root: string): Promise<string[]>;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolves the workflow file to run.
 *
 * An explicit path (relative paths are taken from the workspace) must exist.
 * Without one, the first existing default location wins.
 *
 * @throws WorkflowNotFoundError if no file exists
 */
export async function resolveWorkflowFile(wfile: string | undefined, workspace: string): Promise<string> {
  if (wfile) {
    const path = isAbsolute(wfile) ? wfile : resolve(workspace, wfile);
    if (await isFile(path)) {
      return path;
    }
    throw new WorkflowNotFoundError([path], `Workflow file not found: ${path}`);
  }

  const candidates = DEFAULT_WORKFLOW_PATHS.map((candidate) => resolve(workspace, candidate));
  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }

  throw new WorkflowNotFoundError(candidates);
}

/**
 * Finds every workflow file below `root`.
 *
 * @returns absolute paths, ordered by their path relative to `root`
 */
export async function findWorkflowFiles(root: string): Promise<string[]> {
  const base = resolve(root);
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!IGNORED_DIRECTORIES.has(entry.name)) {
          await walk(path);
        }
      } else if (entry.isFile() && entry.name.endsWith(WORKFLOW_FILE_EXTENSION)) {
        found.push(relative(base, path));
      }
    }
  }

  await walk(base);

  return found
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((path) => join(base, path));
}

export const fileSystemWorkflowLocator: WorkflowLocator = {
  resolveWorkflowFile,
  findWorkflowFiles,
};
