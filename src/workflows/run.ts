import type { ParsedRunArguments } from '../cli/run-command.js';
import type { RunEnvironment } from '../config.js';
import { createWorkflowEngine } from '../engines/index.js';
import type { WorkflowEngine } from '../engines/types.js';
import {
  createGitRepository,
  type CommitHistory,
  type RepositoryLocator,
} from '../services/repository/git-operations.js';
import { getLogger, type Logger } from '../services/logging/logger.js';
import { fileSystemWorkflowLocator, type WorkflowLocator } from '../services/workflow/discovery.js';
import { scanHeadCommit } from './directive-scanner.js';
import {
  createInterruptContext,
  installInterruptHandler,
  type InterruptContext,
} from './interrupt.js';
import { buildInvocationPlan } from './planner.js';
import { applyLogging, resolveRunConfig, type ResolveContext } from './resolver.js';
import { resolveSequenceFiles, runSequence, type SequenceFiles } from './sequencer.js';

export interface RunCommandDependencies {
  environment: RunEnvironment;
  engine: WorkflowEngine;
  repository: CommitHistory & RepositoryLocator;
  workflows: WorkflowLocator;
  logger: Logger;
  /**
   * Directory used as workspace outside a repository.
   */
  cwd: string;
  installInterruptHandler?: (context: InterruptContext, engine: WorkflowEngine, logger: Logger) => () => void;
}

function defaultInterruptHandler(context: InterruptContext, engine: WorkflowEngine, logger: Logger): () => void {
  return installInterruptHandler(context, engine, { logger });
}

export function createRunDependencies(environment: RunEnvironment, cwd: string = process.cwd()): RunCommandDependencies {
  return {
    environment,
    engine: createWorkflowEngine(environment),
    repository: createGitRepository(cwd),
    workflows: fileSystemWorkflowLocator,
    logger: getLogger(),
    cwd,
  };
}

/**
 * Runs the `run` command: resolve, plan, then sequence every planned run in
 * order.
 *
 * @returns the exit code of the command; 0 when every run succeeded (possibly
 * through its on-failure action), otherwise the status of the first failure
 * @throws ValidationError before anything is executed
 */
export async function runCommand(parsed: ParsedRunArguments, dependencies: RunCommandDependencies): Promise<number> {
  const { environment, engine, repository, workflows, logger } = dependencies;

  const defaultWorkspace = parsed.options.workspace
    ? parsed.options.workspace
    : (await repository.getRepositoryRoot()) ?? dependencies.cwd;
  const context: ResolveContext = {
    defaultWorkspace,
    capabilities: engine.capabilities,
  };

  const baseConfig = resolveRunConfig(parsed.options, context);
  const detachBaseLogging = applyLogging(baseConfig, logger);

  try {
    if (environment.ci) {
      logger.info('Running in CI environment...');
    }

    const plan = await buildInvocationPlan(
      { base: parsed, baseConfig, ci: environment.ci, context },
      {
        scanDirectives: () => scanHeadCommit(repository, logger),
        workflows,
        logger,
      }
    );
    logger.debug(`Planned ${plan.runs.length} run(s) (${plan.mode}).`);

    // Missing workflow files abort the command before any run starts
    const planFiles: SequenceFiles[] = [];
    for (const config of plan.runs) {
      planFiles.push(await resolveSequenceFiles(config, { environment, workflows }));
    }

    const install = dependencies.installInterruptHandler ?? defaultInterruptHandler;
    const removeInterruptHandler = install(createInterruptContext(plan), engine, logger);

    try {
      for (const [index, config] of plan.runs.entries()) {
        // The base log file stays attached; only another file needs its own sink
        const detachRunLogging = applyLogging(
          {
            logLevel: config.logLevel,
            logFile: config.logFile === baseConfig.logFile ? undefined : config.logFile,
          },
          logger
        );

        try {
          const outcome = await runSequence(config, { engine, environment, workflows, logger }, planFiles[index]);
          if (outcome.status === 'failure') {
            return outcome.exitCode;
          }
        } finally {
          detachRunLogging();
        }
      }
    } finally {
      removeInterruptHandler();
    }

    return 0;
  } finally {
    detachBaseLogging();
  }
}
