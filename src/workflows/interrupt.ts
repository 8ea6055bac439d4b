import type { WorkflowEngine } from '../engines/types.js';
import type { Logger } from '../services/logging/logger.js';
import type { InvocationPlan } from './types.js';

// Conventional exit status after SIGINT
export const INTERRUPTED_EXIT_CODE = 130;

const HANDLED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * What the interrupt handler needs to know about the current command.
 * Written once while the command is set up, read-only afterwards.
 */
export interface InterruptContext {
  readonly parallel: boolean;
}

export function createInterruptContext(plan: InvocationPlan): InterruptContext {
  return Object.freeze({
    parallel: plan.runs.some((run) => run.parallel),
  });
}

export interface InterruptHandlerOptions {
  logger: Logger;
  exit?: (code: number) => void;
}

/**
 * Stops running engine processes on SIGINT/SIGTERM and exits. Parallel runs
 * may have several actions in flight, so every process gets SIGTERM; a
 * sequential run forwards the received signal.
 *
 * @returns a function that removes the handlers
 */
export function installInterruptHandler(
  context: InterruptContext,
  engine: Pick<WorkflowEngine, 'interrupt'>,
  options: InterruptHandlerOptions
): () => void {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let interrupted = false;

  const handleSignal = (signal: NodeJS.Signals) => {
    if (interrupted) {
      return;
    }
    interrupted = true;
    options.logger.warn(`Received ${signal}. Stopping running workflows...`);
    engine.interrupt(context.parallel ? 'SIGTERM' : signal);
    exit(INTERRUPTED_EXIT_CODE);
  };

  for (const signal of HANDLED_SIGNALS) {
    process.on(signal, handleSignal);
  }

  return () => {
    for (const signal of HANDLED_SIGNALS) {
      process.off(signal, handleSignal);
    }
  };
}
