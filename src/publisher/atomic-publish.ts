import { chmod, chown, readdir, rename, rm, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { PublishError, describeError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { findForbiddenTerms } from './content-check.js';

/** The filesystem calls the swap relies on; injectable so failures can be simulated. */
export interface PublishFs {
  rename(from: string, to: string): Promise<void>;
  rm(path: string, opts: { recursive: boolean; force: boolean }): Promise<void>;
  isDirectory(path: string): Promise<boolean | null>; // null when the path does not exist
}

export const nodePublishFs: PublishFs = {
  rename,
  rm,
  async isDirectory(path) {
    try {
      return (await stat(path)).isDirectory();
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  },
};

export interface TreePermissions {
  fileMode?: number;
  dirMode?: number;
  uid?: number;
  gid?: number;
}

export interface PublishOptions {
  fs?: PublishFs;
  permissions?: TreePermissions;
  /** Case-insensitive terms that must not appear in any staged page or feed. */
  forbiddenTerms?: readonly string[];
  logger?: Logger;
}

export interface PublishOutcome {
  liveDir: string;
  replacedPrevious: boolean;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function backupPath(liveDir: string): string {
  return `${resolve(liveDir)}.prev`;
}

/** Apply modes (and ownership when uid/gid are set) to every entry under `root`. */
export async function prepareTree(root: string, perms: TreePermissions): Promise<void> {
  const dirMode = perms.dirMode ?? 0o755;
  const fileMode = perms.fileMode ?? 0o644;
  const owned = perms.uid !== undefined || perms.gid !== undefined;

  const visit = async (path: string, isDir: boolean): Promise<void> => {
    await chmod(path, isDir ? dirMode : fileMode);
    if (owned) await chown(path, perms.uid ?? -1, perms.gid ?? -1);
    if (!isDir) return;
    for (const entry of await readdir(path, { withFileTypes: true })) {
      await visit(join(path, entry.name), entry.isDirectory());
    }
  };

  await visit(root, true);
}

/**
 * Swap `stagedDir` into `liveDir` with two renames.
 *
 *   live   -> live.prev
 *   staged -> live
 *   rm live.prev
 *
 * When the second rename fails the backup is renamed back, so `liveDir`
 * keeps serving the previous tree. A backup left without a live tree by an
 * interrupted publish is moved back into place first. Both paths must sit on
 * one filesystem.
 */
export async function publishTree(stagedDir: string, liveDir: string, opts: PublishOptions = {}): Promise<PublishOutcome> {
  const fs = opts.fs ?? nodePublishFs;
  const logger = opts.logger ?? silentLogger;
  const staged = resolve(stagedDir);
  const live = resolve(liveDir);
  const prev = backupPath(live);

  const stagedKind = await fs.isDirectory(staged).catch((err: unknown) => {
    throw new PublishError(`Cannot inspect staged tree ${staged}: ${describeError(err)}`, { cause: err });
  });
  if (stagedKind === null) throw new PublishError(`Staged tree does not exist: ${staged}`);
  if (!stagedKind) throw new PublishError(`Staged path is not a directory: ${staged}`);

  if (opts.forbiddenTerms && opts.forbiddenTerms.length > 0) {
    const hits = await findForbiddenTerms(staged, opts.forbiddenTerms).catch((err: unknown) => {
      throw new PublishError(`Content check on ${staged} failed: ${describeError(err)}`, { cause: err });
    });
    if (hits.length > 0) {
      const first = hits[0];
      throw new PublishError(
        `Staged tree contains forbidden terms (${hits.length} hit(s)), first "${first.term}" in ${first.file}:${first.line}`,
      );
    }
  }

  if (opts.permissions) {
    try {
      await prepareTree(staged, opts.permissions);
    } catch (err) {
      throw new PublishError(`Permission fix-up on ${staged} failed: ${describeError(err)}`, { cause: err });
    }
  }

  try {
    let hadLive = (await fs.isDirectory(live)) !== null;
    const prevKind = await fs.isDirectory(prev);
    if (!hadLive && prevKind === true) {
      // interrupted between the two renames: the backup is the served tree
      await fs.rename(prev, live);
      hadLive = true;
      logger.warn({ live, backup: prev }, 'restored backup left by an interrupted publish');
    } else if (prevKind !== null) {
      await fs.rm(prev, { recursive: true, force: true });
    }

    if (hadLive) {
      await fs.rename(live, prev);
    }

    try {
      await fs.rename(staged, live);
    } catch (err) {
      if (hadLive) {
        await restore(fs, prev, live, logger);
      }
      throw new PublishError(`Swap ${staged} -> ${live} failed: ${describeError(err)}`, { cause: err });
    }

    try {
      await fs.rm(prev, { recursive: true, force: true });
    } catch (err) {
      logger.warn({ path: prev, err: describeError(err) }, 'published, but old tree could not be removed');
    }

    logger.info({ live, replaced_previous: hadLive }, 'published static tree');
    return { liveDir: live, replacedPrevious: hadLive };
  } catch (err) {
    if (err instanceof PublishError) throw err;
    throw new PublishError(`Publish to ${live} failed: ${describeError(err)}`, { cause: err });
  }
}

async function restore(fs: PublishFs, prev: string, live: string, logger: Logger): Promise<void> {
  try {
    await fs.rename(prev, live);
    logger.warn({ live }, 'swap failed, previous tree restored');
  } catch (err) {
    throw new PublishError(`Swap failed and restoring ${prev} -> ${live} also failed: ${describeError(err)}`, { cause: err });
  }
}
