/** The working directory could not be listed. Fatal for the whole run. */
export class DiscoveryError extends Error {
  readonly directory: string;

  constructor(directory: string, cause: unknown) {
    super(`unable to list repositories in ${directory}: ${describe(cause)}`, { cause });
    this.name = 'DiscoveryError';
    this.directory = directory;
  }
}

/** The binary could not be started in a repository (missing, not executable...) */
export class SpawnError extends Error {
  readonly binary: string;
  readonly code?: string;

  constructor(binary: string, cause: unknown) {
    super(`unable to run ${binary}: ${describe(cause)}`, { cause });
    this.name = 'SpawnError';
    this.binary = binary;
    this.code = systemCode(cause);
  }
}

/** The binary ran but did not exit cleanly */
export class ExecutionError extends Error {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(binary: string, exitCode: number | null, signal: NodeJS.Signals | null) {
    super(
      signal !== null
        ? `${binary} was terminated by ${signal}`
        : `${binary} exited with code ${exitCode ?? 'unknown'}`,
    );
    this.name = 'ExecutionError';
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

export class GitModulesParseError extends Error {
  readonly line: number;

  constructor(line: number, message: string) {
    super(`invalid .gitmodules at line ${line}: ${message}`);
    this.name = 'GitModulesParseError';
    this.line = line;
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Extract the `code` of a Node system error (ENOENT, EACCES...) */
export function systemCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
