#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import { loadRunEnvironment } from '../config.js';
import { isOrchestrationError } from '../workflows/errors.js';
import { createRunDependencies, runCommand } from '../workflows/run.js';
import { createRunCommand } from './run-command.js';

// Both src/cli and dist/cli sit two levels below package.json
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '../../package.json'), 'utf-8')
);

function reportError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`Error: ${message}`));
  if (isOrchestrationError(error)) {
    console.error(chalk.dim(error.suggestion));
  }
}

const program = new Command();

program
  .name('wfrun')
  .description('Run workflows and actions, locally or from CI commit directives')
  .version(packageJson.version);

program.addCommand(
  createRunCommand(async (parsed) => {
    try {
      const exitCode = await runCommand(parsed, createRunDependencies(loadRunEnvironment()));
      process.exit(exitCode);
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  })
);

program.parseAsync().catch((error: unknown) => {
  reportError(error);
  process.exit(1);
});
