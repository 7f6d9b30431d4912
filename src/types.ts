export const COMMANDS = [
  'backup',
  'check',
  'diff',
  'expire',
  'init',
  'mount',
  'passthrough',
  'verify-randomly'
] as const;

export type CommandName = typeof COMMANDS[number];

/** Names accepted on the command line that map onto another command. */
export const COMMAND_ALIASES: Readonly<Record<string, CommandName>> = {
  command: 'passthrough'
};

/**
 * One configuration file as written on disk. Every key is optional: a layer
 * only carries what it wants to set or extend.
 */
export interface ConfigLayer {
  repository?: string;
  passwordFile?: string;
  diskUsage?: boolean;
  tag?: string;
  paths?: string[];
  exclude?: string[];
  excludeIfPresent?: string[];
  keep?: string[];
  env?: Record<string, string>;
  resticBinary?: string;
  defaultRepository?: string;
  defaultSet?: string;
}

export type LayerName = 'global' | 'repository' | 'set';

export interface LoadedLayer {
  name: LayerName;
  path: string;
  values: ConfigLayer;
}

export interface ResolvedConfig {
  readonly repository: string;
  readonly passwordFile: string;
  readonly diskUsage: boolean;
  readonly tag?: string;
  readonly paths: readonly string[];
  readonly exclude: readonly string[];
  readonly excludeIfPresent: readonly string[];
  readonly keep: readonly string[];
  readonly env: Readonly<Record<string, string>>;
  readonly resticBinary: string;
  readonly repositoryName?: string;
  readonly setName?: string;
  readonly sources: readonly string[];
}

export interface ResolveOptions {
  configDir: string;
  repository?: string;
  set?: string;
  tag?: string;
}

export interface CommandRequest {
  command: string;
  args: string[];
  snapshot?: string;
  compare: boolean;
  added: boolean;
  modified: boolean;
  removed: boolean;
  assumeYes: boolean;
}

export type DiffFilter = 'none' | 'added' | 'modified' | 'added-or-modified' | 'removed';

export interface DiffIntent {
  added?: boolean;
  modified?: boolean;
  removed?: boolean;
}

export interface VerifyOptions {
  snapshot?: string;
  numFiles?: number;
  compare?: boolean;
  tag?: string;
}

export interface VerifyResult {
  snapshotId: string;
  sampled: string[];
  filesCompared: number;
  mismatches: string[];
}

export interface RunSummary {
  command: CommandName;
  durationMs: number;
  sizeBefore?: number;
  sizeAfter?: number;
}

export * from './types/engine';
