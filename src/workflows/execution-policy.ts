import type { EngineCapabilities } from '../engines/types.js';
import type { Logger } from '../services/logging/logger.js';
import { UnsupportedPlatformError } from './errors.js';
import type { RunConfig } from './types.js';

export const PARALLEL_OUTPUT_WARNING =
  'Using --parallel may result in interleaved output. You may use --quiet flag to avoid confusion.';

/**
 * Fails fast when a run asks for something the engine cannot do.
 *
 * @throws UnsupportedPlatformError
 */
export function assertEngineCapabilities(
  options: Pick<RunConfig, 'parallel'>,
  capabilities: EngineCapabilities
): void {
  if (options.parallel && !capabilities.parallelExecution) {
    throw new UnsupportedPlatformError(
      'parallel',
      '--parallel is not supported: the workflow engine cannot run actions concurrently on this platform.'
    );
  }
}

export function warnAboutParallelOutput(config: Pick<RunConfig, 'parallel'>, logger: Logger): void {
  if (config.parallel) {
    logger.warn(PARALLEL_OUTPUT_WARNING);
  }
}
