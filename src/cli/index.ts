#!/usr/bin/env node
import { Command, type CommanderError } from 'commander';
import { CLI_USAGE_EXIT_CODE } from '../errors.js';
import { runCommand } from './commands/run.js';

// Help and version exit 0, usage errors exit 2
function exitOnCommanderError(err: CommanderError): never {
  process.exit(err.exitCode === 0 ? 0 : CLI_USAGE_EXIT_CODE);
}

const program = new Command()
  .name('cmdprobe')
  .description('Test runner for command-line programs')
  .version('0.1.0')
  .exitOverride(exitOnCommanderError);

program.addCommand(runCommand.exitOverride(exitOnCommanderError));

await program.parseAsync();
