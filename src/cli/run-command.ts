import { Command, CommanderError, Option } from 'commander';
import { InvalidOptionError } from '../workflows/errors.js';
import { RUNTIMES } from '../workflows/types.js';
import { formatZodError, runOptionsSchema, type RunOptionName, type RunOptions } from './schemas.js';

/**
 * Options of one `run` invocation together with the names of the options that
 * were actually given (as opposed to defaulted).
 */
export interface ParsedRunArguments {
  options: RunOptions;
  provided: ReadonlySet<RunOptionName>;
}

export type RunHandler = (parsed: ParsedRunArguments) => void | Promise<void>;

const RUN_DESCRIPTION = `Runs a workflow or a single action from it.

By default, wfrun searches for a workflow in .github/main.workflow or
main.workflow and executes it if found.

   $ wfrun run

When an action name is passed as argument, that action is executed:

   $ wfrun run myaction

Together with --wfile, the action is taken from the given workflow:

   $ wfrun run --wfile /path/to/main.workflow myaction

When CI=true, wfrun looks for directives of the form wfrun:run[...] in the
head commit message and runs once per directive, with the options given
inside the brackets. Without directives every workflow found under the
workspace is run.`;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function isRunOptionName(key: string): key is RunOptionName {
  return key in runOptionsSchema.shape;
}

/**
 * Defines the `run` grammar. The command line and commit-message directives
 * are both parsed through a command built here.
 */
export function createRunCommand(onRun: RunHandler): Command {
  return new Command('run')
    .summary('Run a workflow or action.')
    .description(RUN_DESCRIPTION)
    .argument('[action]', 'The action to execute from a workflow.')
    .option(
      '--wfile <path>',
      'File containing the definition of the workflow. [default: ./.github/main.workflow OR ./main.workflow]'
    )
    .option('--debug', 'Generate detailed messages of what wfrun does (overrides --quiet).', false)
    .option('--dry-run', 'Do not run the workflow, only print what would be executed.', false)
    .option('--log-file <path>', 'Path to a log file. No log is created if this is not given.')
    .option('--on-failure <action>', 'Run the given action if there is a failure.')
    .option('--parallel', 'Executes actions in stages in parallel.', false)
    .option('--quiet', 'Do not print output generated by actions.', false)
    .option('--reuse', 'Reuse containers between executions (persist container state).', false)
    .addOption(
      new Option('--runtime <runtime>', 'Specify runtime for executing the workflow.')
        .choices(RUNTIMES)
        .default('docker')
    )
    .option('--skip <action>', 'Skip the given action (can be given multiple times).', collect, [])
    .option('--skip-clone', 'Skip cloning action repositories (assume they have been cloned).', false)
    .option('--skip-pull', 'Skip pulling container images (assume they exist in local cache).', false)
    .option(
      '--with-dependencies',
      'When an action argument is given, execute all its dependencies as well.',
      false
    )
    .addOption(new Option('--workspace <path>', 'Path to workspace folder.').hideHelp())
    .allowExcessArguments(false)
    .action((action: string | undefined, _options: unknown, command: Command) =>
      onRun(readParsedArguments(command, action))
    );
}

/**
 * Validates the values commander collected on `command`.
 *
 * @throws InvalidOptionError if a value does not match the run options schema
 */
export function readParsedArguments(command: Command, action: string | undefined): ParsedRunArguments {
  const result = runOptionsSchema.safeParse({ ...command.opts(), action });
  if (!result.success) {
    throw new InvalidOptionError(formatZodError(result.error));
  }

  const provided = new Set<RunOptionName>();
  for (const key of Object.keys(command.opts())) {
    if (isRunOptionName(key) && command.getOptionValueSource(key) === 'cli') {
      provided.add(key);
    }
  }
  if (action !== undefined) {
    provided.add('action');
  }

  return { options: result.data, provided };
}

/**
 * Parses a `run` argument list without executing anything.
 *
 * @throws InvalidOptionError if the arguments do not fit the `run` grammar
 */
export function parseRunArguments(args: string[]): ParsedRunArguments {
  const holder: { parsed?: ParsedRunArguments } = {};
  const command = createRunCommand((parsed) => {
    holder.parsed = parsed;
  })
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    });

  try {
    command.parse(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new InvalidOptionError(error.message.replace(/^error: /, ''));
    }
    throw error;
  }

  if (!holder.parsed) {
    throw new InvalidOptionError(`No run arguments could be read from '${args.join(' ')}'`);
  }
  return holder.parsed;
}
