import type { BackupEngine, VerifyOptions, VerifyResult } from '../types';
import { compareSampledPath } from './compare';
import type { SampleComparison } from './compare';
import { EmptySampleError, ErrorCounter, SnapshotResolutionError, VerifyFailedError, errorMessage } from './errors';
import type { Logger } from './log';
import type { TempResources } from './temp';

export const DEFAULT_SAMPLE_SIZE = 10;
export const LATEST = 'latest';

/**
 * Draws `count` distinct items by a partial Fisher-Yates shuffle. A count
 * larger than the input yields every item once.
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, random: () => number = Math.random): T[] {
  const pool = [...items];
  const size = Math.min(Math.max(0, Math.floor(count)), pool.length);
  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const picked = pool[j];
    const current = pool[i];
    if (picked === undefined || current === undefined) continue;
    pool[i] = picked;
    pool[j] = current;
  }
  return pool.slice(0, size);
}

export async function resolveSnapshot(engine: BackupEngine, snapshot: string, tag?: string): Promise<string> {
  if (snapshot !== LATEST) return snapshot;
  const snapshots = await engine.listSnapshots(tag);
  const latest = snapshots[snapshots.length - 1];
  if (!latest) throw new SnapshotResolutionError(snapshot, tag);
  return latest.id;
}

export interface VerificationDeps {
  engine: BackupEngine;
  resources: TempResources;
  errors: ErrorCounter;
  logger: Logger;
  random?: () => number;
}

/**
 * Restores a random sample of a snapshot into a scratch directory and, when
 * asked, compares it with the live filesystem. Mismatches are counted and
 * reported; only a failed restore aborts.
 */
export async function verifyRandomly(deps: VerificationDeps, options: VerifyOptions): Promise<VerifyResult> {
  const { engine, resources, errors, logger } = deps;
  const snapshotId = await resolveSnapshot(engine, options.snapshot ?? LATEST, options.tag);
  logger.verbose(`Verifying snapshot ${snapshotId}`);

  const restoreDir = resources.makeDirectory('resticrun-verify-');

  const entries = await engine.listEntries(snapshotId);
  const requested = options.numFiles ?? DEFAULT_SAMPLE_SIZE;
  if (requested > entries.length && entries.length > 0) {
    logger.warn(`Snapshot ${snapshotId} has only ${entries.length} entries, sampling all of them instead of ${requested}`);
  }
  const sampled = sampleWithoutReplacement(entries.map(entry => entry.path), requested, deps.random);
  if (sampled.length === 0) throw new EmptySampleError(snapshotId);
  for (const path of sampled) logger.debug(`Sampled ${path}`);

  logger.info(`Restoring ${sampled.length} sampled entries from ${snapshotId}`);
  const status = await engine.restore(snapshotId, restoreDir, sampled);
  if (status !== 0) throw new VerifyFailedError(snapshotId, status);

  const result: VerifyResult = { snapshotId, sampled, filesCompared: 0, mismatches: [] };
  if (!options.compare) return result;

  for (const path of sampled) {
    let comparison: SampleComparison;
    try {
      comparison = await compareSampledPath(restoreDir, path);
    } catch (error) {
      errors.record();
      result.mismatches.push(path);
      logger.error(`${path}: could not compare (${errorMessage(error)})`);
      continue;
    }
    result.filesCompared += comparison.compared;
    for (const mismatch of comparison.mismatches) {
      errors.record();
      result.mismatches.push(mismatch.path);
      logger.error(`${mismatch.path}: ${mismatch.reason}`);
    }
  }
  return result;
}
