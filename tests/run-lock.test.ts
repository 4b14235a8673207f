import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InfrastructureError } from '../src/errors.js';
import { acquireRunLock, RunInProgressError } from '../src/pipeline/run-lock.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'momentum-lock-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('acquireRunLock', () => {
  it('writes the holder pid and removes the file on release', async () => {
    const path = join(dir, 'public.lock');
    const lock = await acquireRunLock(path, 4242);

    expect((await readFile(path, 'utf-8')).startsWith('4242 ')).toBe(true);

    await lock.release();
    await lock.release();
    await expect(stat(path)).rejects.toThrow();
  });

  it('rejects a second holder immediately', async () => {
    const path = join(dir, 'public.lock');
    const lock = await acquireRunLock(path, 4242);

    const second = acquireRunLock(path, 5151);
    await expect(second).rejects.toBeInstanceOf(RunInProgressError);
    await expect(second).rejects.toBeInstanceOf(InfrastructureError);
    await expect(second).rejects.toThrow(`Another pipeline run holds ${path} (4242 `);

    await lock.release();
    const third = await acquireRunLock(path, 5151);
    await third.release();
  });

  it('reports an unwritable location as infrastructure failure', async () => {
    const path = join(dir, 'missing', 'public.lock');

    await expect(acquireRunLock(path)).rejects.toThrow(`Cannot create run lock ${path}: `);
  });
});
