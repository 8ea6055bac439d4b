import type { LogLevel } from '../services/logging/logger.js';

export const RUNTIMES = ['docker', 'singularity'] as const;
export type Runtime = (typeof RUNTIMES)[number];

/**
 * Canonical, validated parameters of one workflow execution.
 *
 * Built by `resolveRunConfig()`; `withDependencies` implies `action`, and
 * `skip` is empty whenever `action` is set.
 */
export interface RunConfig {
  action?: string;
  wfile?: string;
  workspace: string;
  runtime: Runtime;
  parallel: boolean;
  dryRun: boolean;
  reuse: boolean;
  skipClone: boolean;
  skipPull: boolean;
  withDependencies: boolean;
  skip: readonly string[];
  onFailure?: string;
  logLevel: LogLevel;
  logFile?: string;
}

export type PlanMode = 'single' | 'directives' | 'recursive';

export interface InvocationPlan {
  readonly mode: PlanMode;
  readonly runs: readonly RunConfig[];
}

/**
 * Result of one sequenced execution. `target` is the action name, or the
 * workflow file when the whole workflow ran.
 */
export type RunOutcome =
  | { status: 'success'; target: string }
  | { status: 'failure'; exitCode: number; target: string };
