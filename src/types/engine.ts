export interface Snapshot {
  id: string;
  short_id?: string;
  time: string;
  hostname?: string;
  paths?: string[];
  tags?: string[] | null;
}

export interface SnapshotEntry {
  path: string;
  type: 'file' | 'dir' | 'symlink' | 'other';
}

export interface EngineEnvironment {
  binary: string;
  repository: string;
  passwordFile: string;
  env?: Record<string, string>;
}

/**
 * Operations of the backup engine this tool drives. Methods returning a number
 * resolve with the engine's exit status; listing methods reject on failure.
 */
export interface BackupEngine {
  backup(paths: readonly string[], excludeFile: string | undefined, excludeIfPresent: readonly string[], tag: string | undefined): Promise<number>;
  check(): Promise<number>;
  diff(first: string, second: string, onLine: (line: string) => void): Promise<number>;
  forget(tag: string | undefined, keep: readonly string[], prune: boolean): Promise<number>;
  init(): Promise<number>;
  mount(mountPoint: string): Promise<number>;
  listSnapshots(tag?: string): Promise<Snapshot[]>;
  listEntries(snapshotId: string): Promise<SnapshotEntry[]>;
  restore(snapshotId: string, target: string, includes: readonly string[]): Promise<number>;
  passthroughRaw(args: readonly string[]): Promise<number>;
  repositorySizeBytes(): Promise<number | undefined>;
}
