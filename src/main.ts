import { parseCliArgs } from './args.js';
import { run } from './executor.js';
import type { Summary } from './types.js';

/** 0 when every repository succeeded (or there were none), 1 otherwise */
export function exitCodeFor(summary: Summary): number {
  return summary.failed > 0 ? 1 : 0;
}

export function formatFatal(err: unknown): string {
  return `gitjuggling: fatal error: ${err instanceof Error ? err.message : String(err)}\n`;
}

/** Run the whole command line and resolve with the process exit code */
export async function main(argv: readonly string[], workingDir: string, color = false): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    const summary = await run(workingDir, args.gitArgs, { color });
    return exitCodeFor(summary);
  } catch (err: unknown) {
    process.stderr.write(formatFatal(err));
    return 1;
  }
}
