import pc from 'picocolors';
import { discover } from './discovery.js';
import { GIT_BINARY, runGit } from './git.js';
import type { ExecutionResult, RunOptions, Summary } from './types.js';

/** Line announcing the command about to run in a repository */
export function formatExecuting(repoPath: string, args: readonly string[], color = false): string {
  const c = pc.createColors(color);
  return `${c.green(repoPath)} executing ${c.yellow(args.join(' '))}\n`;
}

export function formatSummary(succeeded: number, failed: number, color = false): string {
  const c = pc.createColors(color);
  return `${c.magenta(String(succeeded))} ${c.blue('items succeeded,')} ${c.magenta(String(failed))} ${c.blue('items failed')}\n`;
}

/** Run the command in one repository, streaming its output to the console */
export async function runOne(
  repoPath: string,
  args: readonly string[],
  options: RunOptions = {},
): Promise<ExecutionResult> {
  process.stdout.write(formatExecuting(repoPath, args, options.color));

  const error = await runGit(repoPath, args, options.binary ?? GIT_BINARY);
  if (error) {
    return { status: 'failed', repoPath, error };
  }
  return { status: 'succeeded', repoPath };
}

/**
 * Run the command in every repository found under `workingDir`, one after
 * the other. A failing repository does not stop the others; a working
 * directory that cannot be listed rejects with DiscoveryError before
 * anything is spawned.
 */
export async function run(
  workingDir: string,
  args: readonly string[],
  options: RunOptions = {},
): Promise<Summary> {
  const repositories = await discover(workingDir, options);

  let succeeded = 0;
  let failed = 0;
  const results: ExecutionResult[] = [];

  for (const repoPath of repositories) {
    const result = await runOne(repoPath, args, options);
    if (result.status === 'succeeded') {
      succeeded++;
    } else {
      failed++;
    }
    results.push(result);
  }

  process.stdout.write(formatSummary(succeeded, failed, options.color));
  return { succeeded, failed, results };
}
