import type { Runtime } from '../workflows/types.js';

/**
 * Declares what an engine implementation supports.
 *
 * The orchestrator checks these before running anything, so a run asking for
 * a missing feature fails fast instead of partway through a workflow.
 */
export interface EngineCapabilities {
  /**
   * Whether the engine can run the actions of one stage concurrently.
   *
   * **Enforcement:** See `assertEngineCapabilities()` in
   * `workflows/execution-policy.ts`.
   */
  parallelExecution: boolean;
}

/**
 * One call into the workflow engine. Pre and post workflows are sent without
 * `action`, `withDependencies` or `skip`.
 */
export interface WorkflowExecutionRequest {
  workflowFile: string;
  action?: string;
  withDependencies: boolean;
  skip: readonly string[];
  runtime: Runtime;
  parallel: boolean;
  reuse: boolean;
  skipClone: boolean;
  skipPull: boolean;
  /**
   * Suppress the output generated by actions.
   */
  quiet: boolean;
  workspace: string;
}

export interface EngineResult {
  exitCode: number;
}

export interface WorkflowEngine {
  name: string;
  capabilities: EngineCapabilities;
  execute(request: WorkflowExecutionRequest): Promise<EngineResult>;

  /**
   * Stops every execution still running. Called from the interrupt handler.
   */
  interrupt(signal: NodeJS.Signals): void;
}
