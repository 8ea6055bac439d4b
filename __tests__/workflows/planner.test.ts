import { describe, expect, it, jest } from '@jest/globals';
import { parseRunArguments } from '../../src/cli/run-command.js';
import { extractDirectives, type DirectiveScan } from '../../src/workflows/directive-scanner.js';
import { DirectiveParseError, WorkflowNotFoundError } from '../../src/workflows/errors.js';
import { buildInvocationPlan, mergeRunOptions, type PlanInput } from '../../src/workflows/planner.js';
import { resolveRunConfig, type ResolveContext } from '../../src/workflows/resolver.js';
import { createFakeWorkflows, createMemoryLogger } from '../helpers/fakes.js';

const context: ResolveContext = {
  defaultWorkspace: '/repo',
  capabilities: { parallelExecution: true },
};

function planInput(args: string[], ci: boolean): PlanInput {
  const base = parseRunArguments(args);
  return { base, baseConfig: resolveRunConfig(base.options, context), ci, context };
}

function dependenciesFor(scan: DirectiveScan, discovered: string[] = []) {
  const { logger } = createMemoryLogger();
  const scanDirectives = jest.fn(async (): Promise<DirectiveScan> => scan);
  const workflows = createFakeWorkflows(discovered);
  return { scanDirectives, workflows, logger };
}

describe('buildInvocationPlan', () => {
  it('runs the command line as given outside CI', async () => {
    const input = planInput(['--wfile', 'main.workflow', 'build'], false);
    const dependencies = dependenciesFor({ kind: 'absent' });

    const plan = await buildInvocationPlan(input, dependencies);

    expect(plan.mode).toBe('single');
    expect(plan.runs).toEqual([input.baseConfig]);
    expect(dependencies.scanDirectives).not.toHaveBeenCalled();
  });

  it('creates one run per directive in commit order', async () => {
    const input = planInput([], true);
    const dependencies = dependenciesFor(
      extractDirectives('Update pipeline wfrun:run[--wfile a.workflow build] then wfrun:run[test]')
    );

    const plan = await buildInvocationPlan(input, dependencies);

    expect(plan.mode).toBe('directives');
    expect(plan.runs).toHaveLength(2);
    expect(plan.runs[0]).toEqual({ ...input.baseConfig, wfile: 'a.workflow', action: 'build' });
    expect(plan.runs[1]).toEqual({ ...input.baseConfig, action: 'test' });
  });

  it('keeps base options a directive does not name', async () => {
    const input = planInput(['--reuse', '--runtime', 'singularity', '--quiet'], true);
    const dependencies = dependenciesFor(extractDirectives('wfrun:run[--debug deploy]'));

    const [run] = (await buildInvocationPlan(input, dependencies)).runs;

    expect(run).toMatchObject({
      action: 'deploy',
      reuse: true,
      runtime: 'singularity',
      logLevel: 'debug',
      workspace: '/repo',
    });
  });

  it('parses each directive independently', async () => {
    const input = planInput([], true);
    const dependencies = dependenciesFor(extractDirectives('wfrun:run[--skip lint] wfrun:run[docs]'));

    const plan = await buildInvocationPlan(input, dependencies);

    expect(plan.runs[0].skip).toEqual(['lint']);
    expect(plan.runs[1].skip).toEqual([]);
    expect(plan.runs[1].action).toBe('docs');
  });

  it('aborts the whole plan on a malformed directive', async () => {
    const input = planInput([], true);
    const dependencies = dependenciesFor(extractDirectives('wfrun:run[build] wfrun:run[--bogus]'));

    await expect(buildInvocationPlan(input, dependencies)).rejects.toThrow(DirectiveParseError);
    await expect(buildInvocationPlan(input, dependencies)).rejects.toThrow(
      "Invalid run directive [--bogus]: unknown option '--bogus'"
    );
  });

  it('takes the run target from the directive instead of the command line', async () => {
    const input = planInput(['--with-dependencies', 'build'], true);
    const dependencies = dependenciesFor(extractDirectives('wfrun:run[--skip lint] wfrun:run[--quiet]'));

    const plan = await buildInvocationPlan(input, dependencies);

    expect(plan.runs.map((run) => [run.action, run.skip, run.withDependencies, run.logLevel])).toEqual([
      [undefined, ['lint'], false, 'action_info'],
      [undefined, [], false, 'info'],
    ]);
  });

  it('applies the option rules within a directive', async () => {
    const input = planInput([], true);
    const dependencies = dependenciesFor(extractDirectives('wfrun:run[--skip lint build]'));

    await expect(buildInvocationPlan(input, dependencies)).rejects.toThrow(
      "Invalid run directive [--skip lint build]: `--skip` can't be used when action argument is passed."
    );
  });

  it('rejects a marker that carries no arguments', async () => {
    const input = planInput([], true);
    const dependencies = dependenciesFor(extractDirectives('wfrun:run[]'));

    await expect(buildInvocationPlan(input, dependencies)).rejects.toThrow(DirectiveParseError);
  });

  it('rejects a directive holding only whitespace', async () => {
    const input = planInput([], true);
    const dependencies = dependenciesFor(extractDirectives('Release wfrun:run[   ]'));

    await expect(buildInvocationPlan(input, dependencies)).rejects.toThrow(
      'Invalid run directive [   ]: the run directive carries no arguments'
    );
  });

  it('runs every discovered workflow when no directive marker is present', async () => {
    const input = planInput(['--parallel'], true);
    const dependencies = dependenciesFor({ kind: 'absent' }, [
      '/repo/.github/main.workflow',
      '/repo/services/api/main.workflow',
    ]);

    const plan = await buildInvocationPlan(input, dependencies);

    expect(plan.mode).toBe('recursive');
    expect(plan.runs).toEqual([
      { ...input.baseConfig, wfile: '/repo/.github/main.workflow' },
      { ...input.baseConfig, wfile: '/repo/services/api/main.workflow' },
    ]);
    expect(dependencies.workflows.findWorkflowFiles).toHaveBeenCalledWith('/repo');
  });

  it('fails when recursive discovery finds nothing', async () => {
    const input = planInput([], true);
    const dependencies = dependenciesFor({ kind: 'absent' }, []);

    await expect(buildInvocationPlan(input, dependencies)).rejects.toThrow(WorkflowNotFoundError);
  });

  it('builds identical plans from the same commit and tree', async () => {
    const input = planInput([], true);
    const dependencies = dependenciesFor(extractDirectives('wfrun:run[a] wfrun:run[--dry-run b]'));

    const first = await buildInvocationPlan(input, dependencies);
    const second = await buildInvocationPlan(input, dependencies);

    expect(second).toEqual(first);
  });

  it('returns a frozen plan', async () => {
    const plan = await buildInvocationPlan(planInput([], false), dependenciesFor({ kind: 'absent' }));

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.runs)).toBe(true);
    expect(Object.isFrozen(plan.runs[0])).toBe(true);
  });
});

describe('mergeRunOptions', () => {
  it('overlays only explicitly given options', () => {
    const base = parseRunArguments(['--reuse', '--wfile', 'base.workflow']).options;
    const overlay = parseRunArguments(['--wfile', 'other.workflow']);

    expect(mergeRunOptions(base, overlay)).toMatchObject({
      reuse: true,
      wfile: 'other.workflow',
    });
  });

  it('replaces the base target once the directive names anything', () => {
    const base = parseRunArguments(['--with-dependencies', 'build']).options;
    const overlay = parseRunArguments(['--reuse']);

    expect(mergeRunOptions(base, overlay)).toMatchObject({
      action: undefined,
      skip: [],
      withDependencies: false,
      reuse: true,
    });
  });
});
