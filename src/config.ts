/**
 * Run configuration read from the process environment.
 */

/**
 * Environment variables consulted by `wfrun run`.
 */
export const ENV_VARS = {
  CI: 'CI',
  PRE_WORKFLOW: 'WFRUN_PRE_WORKFLOW_PATH',
  POST_WORKFLOW: 'WFRUN_POST_WORKFLOW_PATH',
  ENGINE: 'WFRUN_ENGINE',
} as const;

export const DEFAULT_ENGINE_COMMAND = 'wfrun-engine';

export interface RunEnvironment {
  /**
   * Running in a continuous-integration environment (`CI=true`).
   */
  ci: boolean;

  /**
   * Workflow executed in full before every main workflow.
   */
  preWorkflowPath?: string;

  /**
   * Workflow executed in full after every successful main workflow.
   */
  postWorkflowPath?: string;

  /**
   * Executable of the external workflow engine.
   * Default: 'wfrun-engine'
   */
  engineCommand: string;
}

function readVariable(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Reads the run environment. Empty values count as unset.
 */
export function loadRunEnvironment(env: NodeJS.ProcessEnv = process.env): RunEnvironment {
  return {
    ci: readVariable(env, ENV_VARS.CI) === 'true',
    preWorkflowPath: readVariable(env, ENV_VARS.PRE_WORKFLOW),
    postWorkflowPath: readVariable(env, ENV_VARS.POST_WORKFLOW),
    engineCommand: readVariable(env, ENV_VARS.ENGINE) ?? DEFAULT_ENGINE_COMMAND,
  };
}
