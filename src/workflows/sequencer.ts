import type { RunEnvironment } from '../config.js';
import type { WorkflowEngine, WorkflowExecutionRequest } from '../engines/types.js';
import { isLogLevelEnabled, type Logger } from '../services/logging/logger.js';
import type { WorkflowLocator } from '../services/workflow/discovery.js';
import { warnAboutParallelOutput } from './execution-policy.js';
import type { RunConfig, RunOutcome } from './types.js';

export interface SequencerDependencies {
  engine: WorkflowEngine;
  environment: Pick<RunEnvironment, 'preWorkflowPath' | 'postWorkflowPath'>;
  workflows: Pick<WorkflowLocator, 'resolveWorkflowFile'>;
  logger: Logger;
}

type StageName = 'pre' | 'main' | 'post' | 'on-failure';

interface Stage {
  name: StageName;
  request: WorkflowExecutionRequest;
}

/**
 * Engine request for a whole workflow, carrying the engine flags of `config`.
 */
function wholeWorkflowRequest(workflowFile: string, config: RunConfig): WorkflowExecutionRequest {
  return {
    workflowFile,
    withDependencies: false,
    skip: [],
    runtime: config.runtime,
    parallel: config.parallel,
    reuse: config.reuse,
    skipClone: config.skipClone,
    skipPull: config.skipPull,
    quiet: !isLogLevelEnabled('action_info', config.logLevel),
    workspace: config.workspace,
  };
}

function describeStage(stage: Stage): string {
  const { request } = stage;
  const target = request.action
    ? `action "${request.action}"${request.withDependencies ? ' and its dependencies' : ''} from ${request.workflowFile}`
    : `workflow ${request.workflowFile}`;
  const skipped = request.skip.length > 0 ? ` (skipping ${request.skip.join(', ')})` : '';
  return `${stage.name} stage: ${target}${skipped}`;
}

async function executeStage(stage: Stage, config: RunConfig, dependencies: SequencerDependencies): Promise<RunOutcome> {
  const { engine, logger } = dependencies;
  const target = stage.request.action ?? stage.request.workflowFile;

  if (config.dryRun) {
    logger.info(`[dry-run] ${describeStage(stage)}`);
    return { status: 'success', target };
  }

  logger.debug(`Running ${describeStage(stage)}`);
  const result = await engine.execute(stage.request);
  if (result.exitCode === 0) {
    return { status: 'success', target };
  }
  return { status: 'failure', exitCode: result.exitCode, target };
}

/**
 * Workflow files of one run, resolved against its workspace.
 */
export interface SequenceFiles {
  workflowFile: string;
  preWorkflowFile?: string;
  postWorkflowFile?: string;
}

/**
 * Resolves the main, pre and post workflow files of `config` without running
 * anything.
 *
 * @throws WorkflowNotFoundError
 */
export async function resolveSequenceFiles(
  config: RunConfig,
  dependencies: Pick<SequencerDependencies, 'environment' | 'workflows'>
): Promise<SequenceFiles> {
  const { workflows, environment } = dependencies;
  return {
    workflowFile: await workflows.resolveWorkflowFile(config.wfile, config.workspace),
    preWorkflowFile: environment.preWorkflowPath
      ? await workflows.resolveWorkflowFile(environment.preWorkflowPath, config.workspace)
      : undefined,
    postWorkflowFile: environment.postWorkflowPath
      ? await workflows.resolveWorkflowFile(environment.postWorkflowPath, config.workspace)
      : undefined,
  };
}

/**
 * Runs one configuration: optional pre workflow, main workflow, optional post
 * workflow, then the on-failure action if any of them failed.
 *
 * Execution failures come back as a `RunOutcome`. Only validation problems
 * (such as a missing workflow file) are thrown, and those are raised before
 * the engine is called. Callers that already resolved the files pass them in.
 *
 * @throws WorkflowNotFoundError
 */
export async function runSequence(
  config: RunConfig,
  dependencies: SequencerDependencies,
  files?: SequenceFiles
): Promise<RunOutcome> {
  const { logger } = dependencies;
  const { workflowFile, preWorkflowFile, postWorkflowFile } =
    files ?? (await resolveSequenceFiles(config, dependencies));

  logger.info(`Found and running workflow at ${workflowFile}`);
  warnAboutParallelOutput(config, logger);

  const stages: Stage[] = [];
  if (preWorkflowFile) {
    stages.push({ name: 'pre', request: wholeWorkflowRequest(preWorkflowFile, config) });
  }
  stages.push({
    name: 'main',
    request: {
      ...wholeWorkflowRequest(workflowFile, config),
      action: config.action,
      withDependencies: config.withDependencies,
      skip: config.skip,
    },
  });
  if (postWorkflowFile) {
    stages.push({ name: 'post', request: wholeWorkflowRequest(postWorkflowFile, config) });
  }

  let outcome: RunOutcome = { status: 'success', target: config.action ?? workflowFile };
  for (const stage of stages) {
    const stageOutcome = await executeStage(stage, config, dependencies);
    if (stageOutcome.status === 'failure') {
      outcome = stageOutcome;
      break;
    }
  }

  if (outcome.status === 'failure') {
    if (!config.onFailure) {
      logger.error(`"${outcome.target}" failed with exit code ${outcome.exitCode}.`);
      return outcome;
    }

    logger.warn(
      `"${outcome.target}" failed with exit code ${outcome.exitCode}. Running on-failure action "${config.onFailure}".`
    );
    outcome = await executeStage(
      {
        name: 'on-failure',
        request: { ...wholeWorkflowRequest(workflowFile, config), action: config.onFailure },
      },
      config,
      dependencies
    );

    if (outcome.status === 'failure') {
      logger.error(`On-failure action "${outcome.target}" failed with exit code ${outcome.exitCode}.`);
      return outcome;
    }

    logger.info(`Action "${outcome.target}" finished successfully.`);
    return outcome;
  }

  if (config.action) {
    logger.info(`Action "${config.action}" finished successfully.`);
  } else {
    logger.info(`Workflow "${workflowFile}" finished successfully.`);
  }
  return outcome;
}
