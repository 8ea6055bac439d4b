import type { RunOptions } from '../cli/schemas.js';
import type { EngineCapabilities } from '../engines/types.js';
import { createFileSink, type Logger, type LogLevel } from '../services/logging/logger.js';
import { InvalidArgumentCombinationError } from './errors.js';
import { assertEngineCapabilities } from './execution-policy.js';
import type { RunConfig } from './types.js';

export interface ResolveContext {
  /**
   * Workspace used when the options name none.
   */
  defaultWorkspace: string;
  capabilities: EngineCapabilities;
}

/**
 * `--debug` wins over `--quiet`; `--quiet` hides action-level output.
 */
export function resolveLogLevel(options: Pick<RunOptions, 'debug' | 'quiet'>): LogLevel {
  if (options.debug) {
    return 'debug';
  }
  if (options.quiet) {
    return 'info';
  }
  return 'action_info';
}

/**
 * Turns validated options into a run configuration.
 *
 * @throws InvalidArgumentCombinationError for options that exclude each other
 * @throws UnsupportedPlatformError when the engine lacks a requested feature
 */
export function resolveRunConfig(options: RunOptions, context: ResolveContext): RunConfig {
  if (options.withDependencies && !options.action) {
    throw new InvalidArgumentCombinationError(
      '`--with-dependencies` can be used only with action argument.'
    );
  }

  if (options.skip.length > 0 && options.action) {
    throw new InvalidArgumentCombinationError(
      "`--skip` can't be used when action argument is passed."
    );
  }

  assertEngineCapabilities(options, context.capabilities);

  return {
    action: options.action,
    wfile: options.wfile,
    workspace: options.workspace ?? context.defaultWorkspace,
    runtime: options.runtime,
    parallel: options.parallel,
    dryRun: options.dryRun,
    reuse: options.reuse,
    skipClone: options.skipClone,
    skipPull: options.skipPull,
    withDependencies: options.withDependencies,
    skip: [...options.skip],
    onFailure: options.onFailure,
    logLevel: resolveLogLevel(options),
    logFile: options.logFile,
  };
}

/**
 * Applies the verbosity of `config` to `logger` and attaches the log file, if
 * any. The returned function detaches the file again.
 */
export function applyLogging(config: Pick<RunConfig, 'logLevel' | 'logFile'>, logger: Logger): () => void {
  logger.setLevel(config.logLevel);
  if (!config.logFile) {
    return () => undefined;
  }
  return logger.addSink(createFileSink(config.logFile));
}
