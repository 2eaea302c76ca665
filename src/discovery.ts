import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { DiscoveryError, systemCode } from './errors.js';
import { normalizeSubmodulePath, parseGitModules } from './gitmodules.js';
import type { DiscoverOptions } from './types.js';

export const DEFAULT_MARKER = '.git';

/** True when `dir` directly contains an entry named `marker` (file or directory) */
export async function hasMarker(dir: string, marker: string = DEFAULT_MARKER): Promise<boolean> {
  try {
    await stat(join(dir, marker));
    return true;
  } catch {
    return false;
  }
}

/**
 * Paths of the submodules registered in `dir/.gitmodules`, normalised to be
 * compared against entry names. A missing file means no submodules; an
 * unreadable or malformed one is reported on stderr and ignored.
 */
export async function readSubmodulePaths(dir: string): Promise<Set<string>> {
  let text: string;
  try {
    text = await readFile(join(dir, '.gitmodules'), 'utf-8');
  } catch (err: unknown) {
    if (systemCode(err) !== 'ENOENT') {
      warn(`ignoring ${join(dir, '.gitmodules')}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return new Set();
  }

  try {
    return new Set(parseGitModules(text).map((s) => normalizeSubmodulePath(s.path)));
  } catch (err: unknown) {
    warn(`ignoring ${join(dir, '.gitmodules')}: ${err instanceof Error ? err.message : String(err)}`);
    return new Set();
  }
}

/**
 * Immediate child directories of `workingDir` that are repository roots,
 * sorted by name. Children registered as submodules of `workingDir` itself
 * are left out: they are handled by the enclosing repository.
 */
export async function discover(workingDir: string, options: DiscoverOptions = {}): Promise<string[]> {
  const marker = options.marker ?? DEFAULT_MARKER;

  let entries: Dirent[];
  try {
    entries = await readdir(workingDir, { withFileTypes: true });
  } catch (err: unknown) {
    throw new DiscoveryError(workingDir, err);
  }

  const submodules = await readSubmodulePaths(workingDir);
  const names = entries
    .filter((entry) => entry.isDirectory() && !submodules.has(entry.name))
    .map((entry) => entry.name)
    .sort();

  const repositories: string[] = [];
  for (const name of names) {
    const path = join(workingDir, name);
    if (await hasMarker(path, marker)) {
      repositories.push(path);
    }
  }
  return repositories;
}

function warn(message: string): void {
  process.stderr.write(`gitjuggling: ${message}\n`);
}
