import type { BackupEngine, Snapshot, SnapshotEntry } from '../types';

export interface EngineCall {
  method: keyof BackupEngine;
  args: unknown[];
}

export function snapshot(id: string, time: string): Snapshot {
  return { id, time, tags: null };
}

/**
 * In-process stand-in for restic. Every call is recorded; results come from
 * the public fields.
 */
export class FakeEngine implements BackupEngine {
  calls: EngineCall[] = [];
  snapshots: Snapshot[] = [];
  entries: SnapshotEntry[] = [];
  diffLines: string[] = [];
  status = 0;
  restoreStatus = 0;
  sizes: (number | undefined)[] = [];
  onRestore?: (snapshotId: string, target: string, includes: readonly string[]) => Promise<void> | void;

  get methods(): string[] {
    return this.calls.map(call => call.method);
  }

  private record(method: keyof BackupEngine, ...args: unknown[]): void {
    this.calls.push({ method, args });
  }

  async backup(paths: readonly string[], excludeFile: string | undefined, excludeIfPresent: readonly string[], tag: string | undefined): Promise<number> {
    this.record('backup', [...paths], excludeFile, [...excludeIfPresent], tag);
    return this.status;
  }

  async check(): Promise<number> {
    this.record('check');
    return this.status;
  }

  async diff(first: string, second: string, onLine: (line: string) => void): Promise<number> {
    this.record('diff', first, second);
    for (const line of this.diffLines) onLine(line);
    return this.status;
  }

  async forget(tag: string | undefined, keep: readonly string[], prune: boolean): Promise<number> {
    this.record('forget', tag, [...keep], prune);
    return this.status;
  }

  async init(): Promise<number> {
    this.record('init');
    return this.status;
  }

  async mount(mountPoint: string): Promise<number> {
    this.record('mount', mountPoint);
    return this.status;
  }

  async listSnapshots(tag?: string): Promise<Snapshot[]> {
    this.record('listSnapshots', tag);
    return [...this.snapshots];
  }

  async listEntries(snapshotId: string): Promise<SnapshotEntry[]> {
    this.record('listEntries', snapshotId);
    return [...this.entries];
  }

  async restore(snapshotId: string, target: string, includes: readonly string[]): Promise<number> {
    this.record('restore', snapshotId, target, [...includes]);
    await this.onRestore?.(snapshotId, target, includes);
    return this.restoreStatus;
  }

  async passthroughRaw(args: readonly string[]): Promise<number> {
    this.record('passthroughRaw', [...args]);
    return this.status;
  }

  async repositorySizeBytes(): Promise<number | undefined> {
    this.record('repositorySizeBytes');
    return this.sizes.shift();
  }
}
