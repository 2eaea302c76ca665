import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ChildProcess, SpawnOptions } from 'node:child_process';

const mockSpawn = vi.hoisted(() =>
  vi.fn<(command: string, args: readonly string[], options: SpawnOptions) => ChildProcess>(),
);

vi.mock('node:child_process', () => ({
  spawn: mockSpawn,
}));

import { exitCodeFor, formatFatal, main } from '../main.js';

function stubExit(code: number) {
  return mockSpawn.mockImplementationOnce(() => {
    const child = new EventEmitter();
    process.nextTick(() => child.emit('close', code, null));
    return child as unknown as ChildProcess;
  });
}

function written(stream: NodeJS.WriteStream): string[] {
  return vi.mocked(stream.write).mock.calls.map((call) => String(call[0]));
}

let tmpDir: string;

beforeEach(async () => {
  mockSpawn.mockReset();
  tmpDir = await mkdtemp(join(tmpdir(), 'gitjuggling-main-'));
  vi.spyOn(process.stdout, 'write').mockReturnValue(true);
  vi.spyOn(process.stderr, 'write').mockReturnValue(true);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tmpDir, { recursive: true, force: true });
});

describe('exitCodeFor', () => {
  it('is 0 when nothing failed', () => {
    expect(exitCodeFor({ succeeded: 3, failed: 0, results: [] })).toBe(0);
  });

  it('is 0 when there were no repositories', () => {
    expect(exitCodeFor({ succeeded: 0, failed: 0, results: [] })).toBe(0);
  });

  it('is 1 when at least one repository failed', () => {
    expect(exitCodeFor({ succeeded: 2, failed: 1, results: [] })).toBe(1);
  });
});

describe('formatFatal', () => {
  it('prefixes the error message', () => {
    expect(formatFatal(new Error('boom'))).toBe('gitjuggling: fatal error: boom\n');
  });

  it('stringifies non-Error values', () => {
    expect(formatFatal('plain')).toBe('gitjuggling: fatal error: plain\n');
  });
});

describe('main', () => {
  it('exits 0 when there are no repositories', async () => {
    expect(await main(['node', 'gitjuggling', 'status'], tmpDir)).toBe(0);
    expect(written(process.stdout)).toEqual(['0 items succeeded, 0 items failed\n']);
  });

  it('exits 1 when one repository out of three fails', async () => {
    for (const name of ['bar', 'baz', 'foo']) {
      await mkdir(join(tmpDir, name, '.git'), { recursive: true });
    }
    stubExit(0);
    stubExit(1);
    stubExit(0);

    expect(await main(['node', 'gitjuggling', 'pull'], tmpDir)).toBe(1);
    expect(written(process.stdout).at(-1)).toBe('2 items succeeded, 1 items failed\n');
    expect(written(process.stderr)).toEqual([]);
  });

  it('forwards the arguments after the program name to git', async () => {
    const repo = join(tmpDir, 'repo');
    await mkdir(join(repo, '.git'), { recursive: true });
    stubExit(0);

    expect(await main(['node', 'gitjuggling', '--no-pager', 'log', '-1'], tmpDir)).toBe(0);
    expect(mockSpawn).toHaveBeenCalledWith('git', ['--no-pager', 'log', '-1'], { cwd: repo, stdio: 'inherit' });
  });

  it('reports a fatal error and exits 1 when the directory cannot be listed', async () => {
    const missing = join(tmpDir, 'missing');
    expect(await main(['node', 'gitjuggling', 'status'], missing)).toBe(1);
    expect(mockSpawn).not.toHaveBeenCalled();
    expect(written(process.stdout)).toEqual([]);
    const [line, ...rest] = written(process.stderr);
    expect(rest).toEqual([]);
    expect(line.startsWith(`gitjuggling: fatal error: unable to list repositories in ${missing}: ENOENT`)).toBe(true);
    expect(line.endsWith('\n')).toBe(true);
  });
});
