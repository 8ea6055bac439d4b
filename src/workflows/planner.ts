import { parseRunArguments, type ParsedRunArguments } from '../cli/run-command.js';
import type { RunOptionName, RunOptions } from '../cli/schemas.js';
import type { Logger } from '../services/logging/logger.js';
import type { WorkflowLocator } from '../services/workflow/discovery.js';
import type { DirectiveScan, RunDirective } from './directive-scanner.js';
import { DirectiveParseError, isValidationError, WorkflowNotFoundError } from './errors.js';
import { resolveRunConfig, type ResolveContext } from './resolver.js';
import type { InvocationPlan, RunConfig } from './types.js';

export interface PlanInput {
  /**
   * Arguments of the command line itself.
   */
  base: ParsedRunArguments;
  /**
   * `base` resolved into a run configuration.
   */
  baseConfig: RunConfig;
  ci: boolean;
  context: ResolveContext;
}

export interface PlannerDependencies {
  scanDirectives: () => Promise<DirectiveScan>;
  workflows: Pick<WorkflowLocator, 'findWorkflowFiles'>;
  logger: Logger;
}

// Options that together select what a run executes
const TARGET_OPTIONS: readonly RunOptionName[] = ['action', 'skip', 'withDependencies'];

/**
 * Overlays the options a directive names explicitly on the base options.
 *
 * The target of the run (`action`, `skip`, `withDependencies`) is taken from
 * the directive as a whole as soon as the directive names anything, so a
 * directive never inherits the command line's target.
 */
export function mergeRunOptions(base: RunOptions, overlay: ParsedRunArguments): RunOptions {
  const merged: RunOptions = { ...base, skip: [...base.skip] };
  if (overlay.provided.size > 0) {
    for (const name of TARGET_OPTIONS) {
      copyOption(merged, overlay.options, name);
    }
  }
  for (const name of overlay.provided) {
    copyOption(merged, overlay.options, name);
  }
  return merged;
}

function copyOption<K extends RunOptionName>(target: RunOptions, source: RunOptions, name: K): void {
  target[name] = source[name];
}

/**
 * Parses one directive with the command-line grammar and resolves it on top of
 * the base options.
 *
 * @throws DirectiveParseError if the payload is empty or does not parse or
 * validate
 */
export function resolveDirective(
  directive: RunDirective,
  base: RunOptions,
  context: ResolveContext
): RunConfig {
  if (directive.args.length === 0) {
    throw new DirectiveParseError(directive.payload, 'the run directive carries no arguments');
  }

  try {
    const parsed = parseRunArguments(directive.args);
    return resolveRunConfig(mergeRunOptions(base, parsed), context);
  } catch (error) {
    if (isValidationError(error)) {
      throw new DirectiveParseError(directive.payload, error.message, error);
    }
    throw error;
  }
}

function freezePlan(mode: InvocationPlan['mode'], runs: RunConfig[]): InvocationPlan {
  return Object.freeze({
    mode,
    runs: Object.freeze(runs.map((run) => Object.freeze({ ...run, skip: Object.freeze([...run.skip]) }))),
  });
}

/**
 * Builds the ordered list of runs for one command invocation.
 *
 * Outside CI the command line is run as given. In CI every directive of the
 * head commit becomes one run; without any directive marker, every workflow
 * file under the workspace is run.
 *
 * @throws DirectiveParseError if any directive is malformed; nothing is run then
 */
export async function buildInvocationPlan(
  input: PlanInput,
  dependencies: PlannerDependencies
): Promise<InvocationPlan> {
  const { base, baseConfig, ci, context } = input;
  const { logger } = dependencies;

  if (!ci) {
    return freezePlan('single', [baseConfig]);
  }

  const scan = await dependencies.scanDirectives();

  if (scan.kind === 'found') {
    if (scan.directives.length === 0) {
      throw new DirectiveParseError('', 'the run directive marker is present but carries no arguments');
    }

    const runs = scan.directives.map((directive) => resolveDirective(directive, base.options, context));
    logger.debug(`Found ${runs.length} run directive(s) in the head commit.`);
    return freezePlan('directives', runs);
  }

  logger.debug(`No run directives found. Searching ${baseConfig.workspace} for workflows.`);
  const workflowFiles = await dependencies.workflows.findWorkflowFiles(baseConfig.workspace);
  if (workflowFiles.length === 0) {
    throw new WorkflowNotFoundError(
      [baseConfig.workspace],
      `No workflow files found under ${baseConfig.workspace}`
    );
  }

  return freezePlan(
    'recursive',
    workflowFiles.map((wfile) => ({ ...baseConfig, wfile }))
  );
}
