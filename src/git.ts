import { spawn } from 'node:child_process';
import { ExecutionError, SpawnError } from './errors.js';

export const GIT_BINARY = 'git';

/**
 * Run `binary args...` inside `cwd` with the parent's stdio, so its output
 * streams straight to the console. Resolves with null on exit status 0 and
 * with the failure otherwise; never rejects.
 */
export function runGit(
  cwd: string,
  args: readonly string[],
  binary: string = GIT_BINARY,
): Promise<SpawnError | ExecutionError | null> {
  return new Promise((resolve) => {
    let settled = false;
    const settle = (outcome: SpawnError | ExecutionError | null) => {
      if (!settled) {
        settled = true;
        resolve(outcome);
      }
    };

    const child = spawn(binary, [...args], { cwd, stdio: 'inherit' });

    // A failed spawn may also be followed by 'close'; the first event wins
    child.once('error', (err) => settle(new SpawnError(binary, err)));
    child.once('close', (code, signal) => {
      settle(code === 0 ? null : new ExecutionError(binary, code, signal));
    });
  });
}
