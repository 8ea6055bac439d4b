import { jest } from '@jest/globals';
import type {
  EngineCapabilities,
  EngineResult,
  WorkflowEngine,
  WorkflowExecutionRequest,
} from '../../src/engines/types.js';
import type { HeadCommit } from '../../src/services/repository/git-operations.js';
import { Logger, type LogEntry, type LogLevel } from '../../src/services/logging/logger.js';
import type { RunConfig } from '../../src/workflows/types.js';

export function createFakeEngine(
  exitCodeFor: (request: WorkflowExecutionRequest) => number = () => 0,
  capabilities: EngineCapabilities = { parallelExecution: true }
) {
  const execute = jest.fn(
    async (request: WorkflowExecutionRequest): Promise<EngineResult> => ({ exitCode: exitCodeFor(request) })
  );
  const interrupt = jest.fn((_signal: NodeJS.Signals): void => undefined);
  const engine: WorkflowEngine = { name: 'fake-engine', capabilities, execute, interrupt };
  return { engine, execute, interrupt };
}

export function createMemoryLogger(minLevel: LogLevel = 'debug') {
  const entries: LogEntry[] = [];
  const logger = new Logger({ minLevel, sinks: [(entry) => entries.push(entry)] });
  const messages = (level?: LogLevel) =>
    entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  return { logger, entries, messages };
}

/**
 * Stand-in for the default workflow lookup: explicit paths resolve to
 * themselves, otherwise `<workspace>/.github/main.workflow`.
 */
export function createFakeWorkflows(discovered: string[] = []) {
  const resolveWorkflowFile = jest.fn(
    async (wfile: string | undefined, workspace: string): Promise<string> =>
      wfile ?? `${workspace}/.github/main.workflow`
  );
  const findWorkflowFiles = jest.fn(async (_root: string): Promise<string[]> => [...discovered]);
  return { resolveWorkflowFile, findWorkflowFiles };
}

export function createFakeRepository(head: HeadCommit | null, root: string | null = '/repo') {
  return {
    getHeadCommit: jest.fn(async (): Promise<HeadCommit | null> => head),
    getRepositoryRoot: jest.fn(async (): Promise<string | null> => root),
  };
}

export function makeConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    workspace: '/repo',
    runtime: 'docker',
    parallel: false,
    dryRun: false,
    reuse: false,
    skipClone: false,
    skipPull: false,
    withDependencies: false,
    skip: [],
    logLevel: 'action_info',
    ...overrides,
  };
}
