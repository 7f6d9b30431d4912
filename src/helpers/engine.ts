import type { BackupEngine, EngineEnvironment, Snapshot, SnapshotEntry } from '../types';
import { ResticRunError, errorMessage } from './errors';
import type { Logger } from './log';
import { runCommand } from './spawn';
import type { CommandRunner, SpawnRequest } from './spawn';
import { directorySize, localRepositoryPath } from './usage';

export function splitKeepPolicy(keep: readonly string[]): string[] {
  return keep.flatMap(entry => entry.trim().split(/\s+/).filter(Boolean));
}

export function rewriteHelp(args: readonly string[]): string[] {
  return args.map(arg => (arg === 'help' ? '--help' : arg));
}

export function buildBackupArgs(
  paths: readonly string[],
  excludeFile: string | undefined,
  excludeIfPresent: readonly string[],
  tag: string | undefined
): string[] {
  const args = ['backup'];
  if (tag) args.push('--tag', tag);
  if (excludeFile) args.push('--exclude-file', excludeFile);
  for (const marker of excludeIfPresent) args.push('--exclude-if-present', marker);
  args.push(...paths);
  return args;
}

export function buildForgetArgs(tag: string | undefined, keep: readonly string[], prune: boolean): string[] {
  const args = ['forget'];
  if (tag) args.push('--tag', tag);
  if (prune) args.push('--prune');
  args.push(...splitKeepPolicy(keep));
  return args;
}

export function buildRestoreArgs(snapshotId: string, target: string, includes: readonly string[]): string[] {
  const args = ['restore', snapshotId, '--target', target];
  for (const include of includes) args.push('--include', include);
  return args;
}

/**
 * Parses `restic snapshots --json` output and orders it oldest first.
 */
export function parseSnapshots(output: string): Snapshot[] {
  const parsed: unknown = JSON.parse(output.trim() || '[]');
  if (!Array.isArray(parsed)) {
    throw new ResticRunError('Snapshot listing is not a JSON array', 'EENGINE');
  }
  const snapshots: Snapshot[] = [];
  for (const item of parsed) {
    if (!isRecord(item) || typeof item.id !== 'string' || typeof item.time !== 'string') continue;
    snapshots.push({
      id: item.id,
      short_id: typeof item.short_id === 'string' ? item.short_id : undefined,
      time: item.time,
      hostname: typeof item.hostname === 'string' ? item.hostname : undefined,
      paths: stringArray(item.paths),
      tags: stringArray(item.tags) ?? null
    });
  }
  return snapshots
    .map((snapshot, index) => ({ snapshot, index, at: Date.parse(snapshot.time) }))
    .sort((a, b) => (a.at - b.at) || (a.index - b.index))
    .map(({ snapshot }) => snapshot);
}

/**
 * Parses `restic ls --json` output: one JSON document per line, the first
 * describing the snapshot and the rest its nodes.
 */
export function parseEntries(output: string): SnapshotEntry[] {
  const entries: SnapshotEntry[] = [];
  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const item: unknown = JSON.parse(trimmed);
    if (!isRecord(item) || typeof item.path !== 'string') continue;
    if (item.struct_type !== undefined && item.struct_type !== 'node') continue;
    entries.push({ path: item.path, type: entryType(item.type) });
  }
  return entries;
}

function entryType(value: unknown): SnapshotEntry['type'] {
  switch (value) {
    case 'file':
    case 'dir':
    case 'symlink':
      return value;
    default:
      return 'other';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringArray(value: unknown): string[] | undefined {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : undefined;
}

/**
 * restic driven as a subprocess. Repository and password file travel in the
 * environment so that they never show up in the argument list.
 */
export class ResticEngine implements BackupEngine {
  constructor(
    private readonly environment: EngineEnvironment,
    private readonly logger: Logger,
    private readonly run: CommandRunner = runCommand
  ) {}

  backup(paths: readonly string[], excludeFile: string | undefined, excludeIfPresent: readonly string[], tag: string | undefined): Promise<number> {
    return this.status(buildBackupArgs(paths, excludeFile, excludeIfPresent, tag));
  }

  check(): Promise<number> {
    return this.status(['check']);
  }

  diff(first: string, second: string, onLine: (line: string) => void): Promise<number> {
    return this.status(['diff', first, second], { onLine });
  }

  forget(tag: string | undefined, keep: readonly string[], prune: boolean): Promise<number> {
    return this.status(buildForgetArgs(tag, keep, prune));
  }

  init(): Promise<number> {
    return this.status(['init']);
  }

  mount(mountPoint: string): Promise<number> {
    return this.status(['mount', mountPoint]);
  }

  async listSnapshots(tag?: string): Promise<Snapshot[]> {
    const args = ['snapshots', '--json'];
    if (tag) args.push('--tag', tag);
    return parseSnapshots(await this.capture(args));
  }

  async listEntries(snapshotId: string): Promise<SnapshotEntry[]> {
    return parseEntries(await this.capture(['ls', '--json', snapshotId]));
  }

  restore(snapshotId: string, target: string, includes: readonly string[]): Promise<number> {
    return this.status(buildRestoreArgs(snapshotId, target, includes));
  }

  passthroughRaw(args: readonly string[]): Promise<number> {
    return this.status(rewriteHelp(args));
  }

  async repositorySizeBytes(): Promise<number | undefined> {
    const path = localRepositoryPath(this.environment.repository);
    if (path === undefined) {
      this.logger.warn(`Disk usage is only measured for local repositories, skipping ${this.environment.repository}`);
      return undefined;
    }
    try {
      return await directorySize(path);
    } catch (error) {
      this.logger.warn(`Could not measure ${path}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private request(args: readonly string[], extra: Partial<SpawnRequest> = {}): SpawnRequest {
    this.logger.debug(`${this.environment.binary} ${args.join(' ')}`);
    return {
      command: this.environment.binary,
      args,
      env: {
        ...this.environment.env,
        RESTIC_REPOSITORY: this.environment.repository,
        RESTIC_PASSWORD_FILE: this.environment.passwordFile
      },
      ...extra
    };
  }

  private async status(args: readonly string[], extra: Partial<SpawnRequest> = {}): Promise<number> {
    const result = await this.run(this.request(args, extra));
    return result.code;
  }

  private async capture(args: readonly string[]): Promise<string> {
    const result = await this.run(this.request(args, { capture: true }));
    if (result.code !== 0) {
      throw new ResticRunError(
        `${this.environment.binary} ${args[0] ?? ''} failed with exit status ${result.code}: ${result.stderr.trim()}`,
        'EENGINE',
        { context: { args: [...args], exitCode: result.code } }
      );
    }
    return result.stdout;
  }
}
