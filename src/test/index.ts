// src/test/index.ts
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { vi } from 'vitest';

import { makeCli } from '@/cli';

/** Create a fresh temp directory for one test. */
export const makeTempDir = (prefix = 'inikv-'): Promise<string> =>
  mkdtemp(path.join(tmpdir(), prefix));

/** Write a file under `root`, creating parent directories. */
export const writeFixture = async (
  root: string,
  rel: string,
  content: string | Uint8Array,
): Promise<string> => {
  const abs = path.join(root, rel);
  await mkdir(path.dirname(abs), { recursive: true });
  await writeFile(abs, content);
  return abs;
};

/** Remove a directory tree, retrying briefly on transient EBUSY/EPERM (Windows). */
export const rmDirWithRetries = async (
  dir: string,
  retries = 5,
): Promise<void> => {
  for (let i = 0; ; i++) {
    try {
      await rm(dir, { recursive: true, force: true });
      return;
    } catch (e) {
      if (i >= retries) throw e;
      await new Promise((r) => setTimeout(r, 50 * (i + 1)));
    }
  }
};

export type CliRun = { out: string[]; err: string[]; thrown: unknown };

/**
 * Run the CLI in-process with console output captured.
 * Commander exits (help, usage errors) come back in `thrown`.
 */
export const runCli = async (args: string[]): Promise<CliRun> => {
  const run: CliRun = { out: [], err: [], thrown: undefined };
  const logSpy = vi.spyOn(console, 'log').mockImplementation((m: unknown) => {
    run.out.push(String(m));
  });
  const errSpy = vi
    .spyOn(console, 'error')
    .mockImplementation((m: unknown) => {
      run.err.push(String(m));
    });
  try {
    await makeCli().parseAsync(args, { from: 'user' });
  } catch (e) {
    run.thrown = e;
  } finally {
    logSpy.mockRestore();
    errSpy.mockRestore();
  }
  return run;
};
