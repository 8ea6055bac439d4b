/**
 * Error types for run orchestration.
 *
 * Validation errors are always fatal: they are raised before any workflow is
 * executed and are never retried. Execution failures are not errors at this
 * layer; they travel as `RunOutcome` values (see ./types.ts).
 */

/**
 * Error categories for classification and reporting.
 */
export type ErrorCategory =
  | 'arguments'
  | 'workflow'
  | 'platform'
  | 'directive'
  | 'engine';

/**
 * Base class for all orchestration errors.
 */
export abstract class OrchestrationError extends Error {
  /**
   * Error category for logging.
   */
  abstract readonly category: ErrorCategory;

  /**
   * Human-readable suggestion for how to resolve this error.
   */
  abstract readonly suggestion: string;

  constructor(message: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Raised for invalid input. Aborts the command before execution begins.
 */
export abstract class ValidationError extends OrchestrationError {
  readonly fatal = true;
}

/**
 * Two options were given that cannot be combined.
 */
export class InvalidArgumentCombinationError extends ValidationError {
  readonly category: ErrorCategory = 'arguments';
  readonly suggestion = 'Run `wfrun run --help` to see how the options combine.';
}

/**
 * An option value is malformed or unknown.
 */
export class InvalidOptionError extends ValidationError {
  readonly category: ErrorCategory = 'arguments';
  readonly suggestion = 'Run `wfrun run --help` to list the accepted options.';
}

/**
 * No workflow file exists at the given or default location.
 */
export class WorkflowNotFoundError extends ValidationError {
  readonly category: ErrorCategory = 'workflow';
  readonly suggestion: string;

  constructor(
    public readonly searched: string[],
    message?: string
  ) {
    super(message ?? `Workflow file not found (looked for ${searched.join(', ')})`);
    this.suggestion = searched.length > 1
      ? 'Create one of the default workflow files or pass --wfile.'
      : 'Check the workflow path.';
  }
}

/**
 * The engine cannot provide a feature the run asks for.
 */
export class UnsupportedPlatformError extends ValidationError {
  readonly category: ErrorCategory = 'platform';
  readonly suggestion = 'Run again without the unsupported option.';

  constructor(
    public readonly feature: string,
    message: string
  ) {
    super(message);
  }
}

/**
 * A run directive found in a commit message could not be parsed.
 */
export class DirectiveParseError extends ValidationError {
  readonly category: ErrorCategory = 'directive';
  readonly suggestion = 'Fix the run directive in the commit message and push a new commit.';

  constructor(
    public readonly payload: string,
    message: string,
    cause?: Error
  ) {
    super(`Invalid run directive [${payload}]: ${message}`, cause);
  }
}

/**
 * The workflow engine could not be started at all.
 */
export class EngineLaunchError extends OrchestrationError {
  readonly category: ErrorCategory = 'engine';
  readonly suggestion = 'Make sure the workflow engine is installed, or point WFRUN_ENGINE at it.';

  constructor(
    public readonly command: string,
    message: string,
    cause?: Error
  ) {
    super(`Failed to start workflow engine '${command}': ${message}`, cause);
  }
}

export function isOrchestrationError(error: unknown): error is OrchestrationError {
  return error instanceof OrchestrationError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Extracts error category from any error.
 */
export function getErrorCategory(error: unknown): ErrorCategory | 'unknown' {
  if (isOrchestrationError(error)) {
    return error.category;
  }
  return 'unknown';
}
