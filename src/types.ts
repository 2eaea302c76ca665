import type { ExecutionError, SpawnError } from './errors.js';

/** Parsed CLI arguments */
export interface CliArgs {
  /** Arguments forwarded verbatim to git in every repository */
  gitArgs: string[];
}

/** Outcome of running the command in a single repository */
export type ExecutionResult =
  | { status: 'succeeded'; repoPath: string }
  | { status: 'failed'; repoPath: string; error: SpawnError | ExecutionError };

/** Tally of a whole run */
export interface Summary {
  succeeded: number;
  failed: number;
  results: ExecutionResult[];
}

/** One `[submodule "..."]` section of a .gitmodules file */
export interface GitSubmodule {
  name: string;
  path: string;
  url: string;
  branch?: string;
}

export interface DiscoverOptions {
  /** Entry whose presence marks a repository root. Defaults to `.git`. */
  marker?: string;
}

export interface RunOptions extends DiscoverOptions {
  /** Binary to spawn in each repository. Defaults to `git`. */
  binary?: string;
  /** Colourise the executing and summary lines */
  color?: boolean;
}
