import { describe, expect, it } from '@jest/globals';
import { buildEngineArguments, ProcessWorkflowEngine } from '../../src/engines/process-engine.js';
import type { WorkflowExecutionRequest } from '../../src/engines/types.js';
import { EngineLaunchError } from '../../src/workflows/errors.js';

function makeRequest(overrides: Partial<WorkflowExecutionRequest> = {}): WorkflowExecutionRequest {
  return {
    workflowFile: '/repo/.github/main.workflow',
    withDependencies: false,
    skip: [],
    runtime: 'docker',
    parallel: false,
    reuse: false,
    skipClone: false,
    skipPull: false,
    quiet: false,
    workspace: '/repo',
    ...overrides,
  };
}

describe('buildEngineArguments', () => {
  it('runs a whole workflow', () => {
    expect(buildEngineArguments(makeRequest())).toEqual([
      'run',
      '/repo/.github/main.workflow',
      '--runtime',
      'docker',
      '--workspace',
      '/repo',
    ]);
  });

  it('targets an action with its dependencies', () => {
    expect(buildEngineArguments(makeRequest({ action: 'build', withDependencies: true }))).toEqual([
      'run',
      '/repo/.github/main.workflow',
      'build',
      '--with-dependencies',
      '--runtime',
      'docker',
      '--workspace',
      '/repo',
    ]);
  });

  it('ignores dependency expansion without an action', () => {
    expect(buildEngineArguments(makeRequest({ withDependencies: true }))).not.toContain('--with-dependencies');
  });

  it('passes skipped actions and engine flags', () => {
    expect(
      buildEngineArguments(
        makeRequest({
          skip: ['lint', 'docs'],
          runtime: 'singularity',
          parallel: true,
          reuse: true,
          skipClone: true,
          skipPull: true,
          quiet: true,
        })
      )
    ).toEqual([
      'run',
      '/repo/.github/main.workflow',
      '--skip',
      'lint',
      '--skip',
      'docs',
      '--runtime',
      'singularity',
      '--parallel',
      '--reuse',
      '--skip-clone',
      '--skip-pull',
      '--quiet',
      '--workspace',
      '/repo',
    ]);
  });
});

describe('ProcessWorkflowEngine', () => {
  it('uses the given capabilities', () => {
    const engine = new ProcessWorkflowEngine('wfrun-engine', { parallelExecution: false });

    expect(engine.capabilities).toEqual({ parallelExecution: false });
    expect(engine.name).toBe('wfrun-engine');
  });

  it('reports an engine that cannot be started', async () => {
    const engine = new ProcessWorkflowEngine('wfrun-test-engine-that-does-not-exist');

    await expect(engine.execute(makeRequest({ workspace: process.cwd() }))).rejects.toThrow(EngineLaunchError);
    expect(engine.activeExecutions).toBe(0);
  });
});
