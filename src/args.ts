import { Command } from 'commander';
import type { CliArgs } from './types.js';

/**
 * Every argument after the program name belongs to git, flags included, so
 * the command defines no options of its own (not even --help).
 */
export function parseCliArgs(argv: readonly string[] = process.argv): CliArgs {
  const program = new Command();
  program
    .name('gitjuggling')
    .description('Run a git command in every repository directly below the current directory')
    .helpOption(false)
    .allowUnknownOption()
    .passThroughOptions()
    .argument('[git-args...]', 'Arguments forwarded to git')
    .parse([...argv]);

  return { gitArgs: [...program.args] };
}
