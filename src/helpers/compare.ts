import { open, lstat, readdir, readlink } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { join } from 'path';
import { errorMessage } from './errors';

const CHUNK_SIZE = 64 * 1024;

export interface Mismatch {
  path: string;
  reason: string;
}

/** Byte-for-byte equality of two regular files. */
export async function filesEqual(left: string, right: string): Promise<boolean> {
  const [leftStats, rightStats] = [await lstat(left), await lstat(right)];
  if (leftStats.size !== rightStats.size) return false;

  const leftHandle = await open(left, 'r');
  try {
    const rightHandle = await open(right, 'r');
    try {
      return await handlesEqual(leftHandle, rightHandle);
    } finally {
      await rightHandle.close();
    }
  } finally {
    await leftHandle.close();
  }
}

async function handlesEqual(left: FileHandle, right: FileHandle): Promise<boolean> {
  const leftBuffer = Buffer.alloc(CHUNK_SIZE);
  const rightBuffer = Buffer.alloc(CHUNK_SIZE);
  let position = 0;
  while (true) {
    const { bytesRead: leftRead } = await left.read(leftBuffer, 0, CHUNK_SIZE, position);
    const { bytesRead: rightRead } = await right.read(rightBuffer, 0, CHUNK_SIZE, position);
    if (leftRead !== rightRead) return false;
    if (leftRead === 0) return true;
    if (!leftBuffer.subarray(0, leftRead).equals(rightBuffer.subarray(0, rightRead))) return false;
    position += leftRead;
  }
}

/**
 * Paths of every non-directory below `directory`, relative to it and sorted.
 */
export async function listFilesRecursive(directory: string, prefix = ''): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(join(directory, prefix), { withFileTypes: true });
  for (const entry of entries) {
    const relativePath = prefix ? join(prefix, entry.name) : entry.name;
    if (entry.isDirectory()) {
      files.push(...await listFilesRecursive(directory, relativePath));
    } else {
      files.push(relativePath);
    }
  }
  return files.sort();
}

async function kindOf(path: string): Promise<'file' | 'dir' | 'symlink' | 'other' | 'missing'> {
  try {
    const stats = await lstat(path);
    if (stats.isSymbolicLink()) return 'symlink';
    if (stats.isDirectory()) return 'dir';
    if (stats.isFile()) return 'file';
    return 'other';
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return 'missing';
    throw error;
  }
}

/**
 * Compares one restored path with its live counterpart. Returns undefined when
 * they match; special files are not compared.
 */
export async function compareRestoredFile(restored: string, live: string, displayPath: string): Promise<Mismatch | undefined> {
  const [restoredKind, liveKind] = [await kindOf(restored), await kindOf(live)];
  if (restoredKind === 'missing') return { path: displayPath, reason: 'missing from restore' };
  if (liveKind === 'missing') return { path: displayPath, reason: 'missing on live filesystem' };
  if (restoredKind !== liveKind) {
    return { path: displayPath, reason: `type differs (restored ${restoredKind}, live ${liveKind})` };
  }
  if (restoredKind === 'symlink') {
    const [restoredTarget, liveTarget] = [await readlink(restored), await readlink(live)];
    return restoredTarget === liveTarget
      ? undefined
      : { path: displayPath, reason: `link target differs (${restoredTarget} != ${liveTarget})` };
  }
  if (restoredKind === 'file' && !await filesEqual(restored, live)) {
    return { path: displayPath, reason: 'content differs' };
  }
  return undefined;
}

export interface SampleComparison {
  compared: number;
  mismatches: Mismatch[];
}

/**
 * Compares a sampled snapshot path. Directories are walked and every file
 * under them is compared; a path that was not restored counts as a mismatch,
 * and so does a file inside a directory that could not be compared.
 */
export async function compareSampledPath(restoreRoot: string, snapshotPath: string): Promise<SampleComparison> {
  const restored = join(restoreRoot, snapshotPath);
  if (await kindOf(restored) !== 'dir') {
    const mismatch = await compareRestoredFile(restored, snapshotPath, snapshotPath);
    return { compared: 1, mismatches: mismatch ? [mismatch] : [] };
  }

  const mismatches: Mismatch[] = [];
  const files = await listFilesRecursive(restored);
  for (const file of files) {
    const live = join(snapshotPath, file);
    try {
      const mismatch = await compareRestoredFile(join(restored, file), live, live);
      if (mismatch) mismatches.push(mismatch);
    } catch (error) {
      mismatches.push({ path: live, reason: `could not compare (${errorMessage(error)})` });
    }
  }
  return { compared: files.length, mismatches };
}
