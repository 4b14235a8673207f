import { open, readFile, unlink } from 'node:fs/promises';
import { InfrastructureError, describeError } from '../errors.js';

export interface RunLock {
  path: string;
  release(): Promise<void>;
}

export class RunInProgressError extends InfrastructureError {
  constructor(
    readonly path: string,
    readonly holder: string,
  ) {
    super(`Another pipeline run holds ${path} (${holder || 'unknown holder'})`);
  }
}

/**
 * Exclusive lock file created with O_EXCL. A second caller is rejected
 * immediately rather than queued. Stale locks are not broken automatically;
 * remove the file by hand after a crash.
 */
export async function acquireRunLock(path: string, pid: number = process.pid): Promise<RunLock> {
  try {
    const handle = await open(path, 'wx');
    try {
      await handle.writeFile(`${pid} ${new Date().toISOString()}\n`, 'utf-8');
    } finally {
      await handle.close();
    }
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
      const holder = await readFile(path, 'utf-8').then((s) => s.trim(), () => '');
      throw new RunInProgressError(path, holder);
    }
    throw new InfrastructureError(`Cannot create run lock ${path}: ${describeError(err)}`, { cause: err });
  }

  let released = false;
  return {
    path,
    async release() {
      if (released) return;
      released = true;
      await unlink(path);
    },
  };
}
