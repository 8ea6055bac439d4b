import { spawn, type ChildProcess } from 'child_process';
import { availableParallelism } from 'os';
import { EngineLaunchError } from '../workflows/errors.js';
import type {
  EngineCapabilities,
  EngineResult,
  WorkflowEngine,
  WorkflowExecutionRequest,
} from './types.js';

// Exit status reported when the engine process is killed by a signal.
const SIGNAL_EXIT_CODE = 128;

/**
 * Builds the argument list for one engine invocation:
 * `run <workflow> [action] [--with-dependencies] [--skip a]... --runtime r [flags]`.
 */
export function buildEngineArguments(request: WorkflowExecutionRequest): string[] {
  const args = ['run', request.workflowFile];

  if (request.action) {
    args.push(request.action);
    if (request.withDependencies) {
      args.push('--with-dependencies');
    }
  }

  for (const action of request.skip) {
    args.push('--skip', action);
  }

  args.push('--runtime', request.runtime);

  if (request.parallel) args.push('--parallel');
  if (request.reuse) args.push('--reuse');
  if (request.skipClone) args.push('--skip-clone');
  if (request.skipPull) args.push('--skip-pull');
  if (request.quiet) args.push('--quiet');

  args.push('--workspace', request.workspace);
  return args;
}

/**
 * Runs workflows through an external engine executable. Engine output is not
 * buffered: the child inherits stdio.
 */
export class ProcessWorkflowEngine implements WorkflowEngine {
  readonly name: string;
  readonly capabilities: EngineCapabilities;
  private readonly running = new Set<ChildProcess>();

  constructor(
    private readonly command: string,
    capabilities?: EngineCapabilities
  ) {
    this.name = command;
    this.capabilities = capabilities ?? {
      parallelExecution: availableParallelism() > 1,
    };
  }

  execute(request: WorkflowExecutionRequest): Promise<EngineResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.command, buildEngineArguments(request), {
        cwd: request.workspace,
        stdio: 'inherit',
        env: {
          ...process.env,
        },
      });
      this.running.add(child);

      // Track if we've resolved/rejected to avoid double settlement
      let settled = false;

      child.on('error', (error) => {
        this.running.delete(child);
        if (!settled) {
          settled = true;
          reject(new EngineLaunchError(this.command, error.message, error));
        }
      });

      child.on('close', (code) => {
        this.running.delete(child);
        if (!settled) {
          settled = true;
          resolve({ exitCode: code ?? SIGNAL_EXIT_CODE });
        }
      });
    });
  }

  interrupt(signal: NodeJS.Signals): void {
    for (const child of this.running) {
      child.kill(signal);
    }
  }

  get activeExecutions(): number {
    return this.running.size;
  }
}
