import type { BackupEngine, DiffFilter, DiffIntent } from '../types';
import { EngineError, InsufficientSnapshotsError } from './errors';
import type { Logger } from './log';

export interface DiffSelection {
  first: string;
  second: string;
}

/**
 * Picks the pair of snapshots to compare. Two explicit ids are used in the
 * order given; a single id is paired with the newest tagged snapshot;
 * otherwise the two newest tagged snapshots are used, older first.
 */
export async function selectSnapshots(
  engine: BackupEngine,
  explicit: readonly string[],
  tag?: string
): Promise<DiffSelection> {
  const [first, second] = explicit;
  if (first !== undefined && second !== undefined) {
    return { first, second };
  }

  const snapshots = await engine.listSnapshots(tag);
  const latest = snapshots[snapshots.length - 1];

  if (first !== undefined) {
    if (!latest) throw new InsufficientSnapshotsError(0, tag);
    return { first, second: latest.id };
  }

  const previous = snapshots[snapshots.length - 2];
  if (!previous || !latest) throw new InsufficientSnapshotsError(snapshots.length, tag);
  return { first: previous.id, second: latest.id };
}

export function chooseFilter(intent: DiffIntent): DiffFilter {
  if (intent.added && intent.modified) return 'added-or-modified';
  if (intent.added) return 'added';
  if (intent.modified) return 'modified';
  if (intent.removed) return 'removed';
  return 'none';
}

function lastToken(line: string): string {
  const tokens = line.trim().split(/\s+/);
  return tokens[tokens.length - 1] ?? '';
}

/**
 * Maps one line of `restic diff` output through the filter. Returns undefined
 * for lines the filter drops.
 *
 * `added-or-modified` emits only the path token while the other filters keep
 * whole lines; callers rely on both shapes.
 */
export function applyFilter(filter: DiffFilter, line: string): string | undefined {
  switch (filter) {
    case 'none':
      return line;
    case 'added':
      return line.startsWith('+') ? line : undefined;
    case 'modified':
      return line.startsWith('M') ? line : undefined;
    case 'removed':
      return line.startsWith('-') ? line : undefined;
    case 'added-or-modified':
      return line.startsWith('+') || line.startsWith('M') ? lastToken(line) : undefined;
  }
}

export interface DiffRunOptions extends DiffIntent {
  snapshots: readonly string[];
  tag?: string;
}

export async function runDiff(
  engine: BackupEngine,
  options: DiffRunOptions,
  emit: (line: string) => void,
  logger?: Logger
): Promise<DiffSelection> {
  const selection = await selectSnapshots(engine, options.snapshots, options.tag);
  const filter = chooseFilter(options);
  logger?.verbose(`Comparing ${selection.first} with ${selection.second} (filter: ${filter})`);

  const status = await engine.diff(selection.first, selection.second, line => {
    const output = applyFilter(filter, line);
    if (output !== undefined) emit(output);
  });
  if (status !== 0) throw new EngineError('diff', status);
  return selection;
}
