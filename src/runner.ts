import { stat } from 'fs/promises';
import type { BackupEngine, CommandName, CommandRequest, ResolvedConfig, ResolveOptions, RunSummary } from './types';
import { COMMANDS, COMMAND_ALIASES } from './types';
import { resolveConfig } from './helpers/config';
import { runDiff } from './helpers/diff';
import { ResticEngine } from './helpers/engine';
import { ConfigLoadError, EngineError, ErrorCounter, ResourceError, UnknownCommandError } from './helpers/errors';
import { buildExcludeSet } from './helpers/exclude';
import { formatBytes, formatDuration, formatSignedBytes } from './helpers/format';
import { Logger } from './helpers/log';
import { isInteractive, promptConfirmation } from './helpers/prompt';
import { TempResources } from './helpers/temp';
import { DEFAULT_SAMPLE_SIZE, LATEST, verifyRandomly } from './helpers/verify';

export type RunState = 'start' | 'config-resolved' | 'command-validated' | 'executing' | 'finished';

export function isCommandName(name: string): name is CommandName {
  return (COMMANDS as readonly string[]).includes(name);
}

/** Maps a command-line name onto a known command, following aliases. */
export function toCommandName(name: string): CommandName {
  const alias = Object.hasOwn(COMMAND_ALIASES, name) ? COMMAND_ALIASES[name] : undefined;
  const target = alias ?? name;
  if (!isCommandName(target)) throw new UnknownCommandError(name, COMMANDS);
  return target;
}

export interface RunnerDeps {
  logger: Logger;
  errors: ErrorCounter;
  resources: TempResources;
  createEngine?: (config: ResolvedConfig, logger: Logger) => BackupEngine;
  resolve?: (options: ResolveOptions, logger: Logger) => Promise<ResolvedConfig>;
  confirm?: (message: string) => Promise<boolean>;
  interactive?: () => boolean;
  now?: () => number;
}

const defaultEngine = (config: ResolvedConfig, logger: Logger): BackupEngine => new ResticEngine({
  binary: config.resticBinary,
  repository: config.repository,
  passwordFile: config.passwordFile,
  env: { ...config.env }
}, logger);

/**
 * Resolves configuration once, validates the command, runs it against the
 * backup engine and reports duration and repository growth.
 */
export class ResticRunner {
  private currentState: RunState = 'start';
  private readonly logger: Logger;
  private readonly errors: ErrorCounter;
  private readonly resources: TempResources;
  private readonly now: () => number;

  constructor(private readonly deps: RunnerDeps) {
    this.logger = deps.logger;
    this.errors = deps.errors;
    this.resources = deps.resources;
    this.now = deps.now ?? Date.now;
  }

  get state(): RunState {
    return this.currentState;
  }

  async run(request: CommandRequest, options: ResolveOptions): Promise<RunSummary> {
    const startedAt = this.now();

    const config = await (this.deps.resolve ?? resolveConfig)(options, this.logger);
    this.currentState = 'config-resolved';
    this.logger.debug(`Configuration sources: ${config.sources.join(', ') || '(none)'}`);

    const command = toCommandName(request.command);
    this.currentState = 'command-validated';

    const engine = (this.deps.createEngine ?? defaultEngine)(config, this.logger);
    const sizeBefore = config.diskUsage ? await engine.repositorySizeBytes() : undefined;

    this.currentState = 'executing';
    await this.execute(command, request, config, engine);

    const sizeAfter = config.diskUsage ? await engine.repositorySizeBytes() : undefined;
    this.currentState = 'finished';

    const summary: RunSummary = { command, durationMs: this.now() - startedAt, sizeBefore, sizeAfter };
    this.report(summary);
    return summary;
  }

  private report(summary: RunSummary): void {
    if (summary.sizeBefore !== undefined && summary.sizeAfter !== undefined) {
      const delta = summary.sizeAfter - summary.sizeBefore;
      this.logger.info(`Repository size: ${formatBytes(summary.sizeAfter)} (${formatSignedBytes(delta)})`);
    }
    if (this.errors.value > 0) {
      this.logger.warn(`${summary.command} finished with ${this.errors.value} error(s)`);
    }
    this.logger.info(`Duration: ${formatDuration(summary.durationMs)}`);
  }

  private async execute(command: CommandName, request: CommandRequest, config: ResolvedConfig, engine: BackupEngine): Promise<void> {
    switch (command) {
      case 'backup':
        return this.backup(config, engine);
      case 'check':
        return expectSuccess('check', await engine.check());
      case 'diff':
        return this.diff(request, config, engine);
      case 'expire':
        return this.expire(request, config, engine);
      case 'init':
        return expectSuccess('init', await engine.init());
      case 'mount':
        return this.mount(request, engine);
      case 'passthrough':
        return expectSuccess('passthrough', await engine.passthroughRaw(request.args));
      case 'verify-randomly':
        return this.verify(request, config, engine);
    }
  }

  private async backup(config: ResolvedConfig, engine: BackupEngine): Promise<void> {
    if (config.paths.length === 0) {
      throw new ConfigLoadError('No paths configured to back up');
    }
    const excludes = buildExcludeSet(config.exclude, config.excludeIfPresent, this.resources);
    this.logger.verbose(`Backing up ${config.paths.join(', ')}${config.tag ? ` with tag ${config.tag}` : ''}`);
    expectSuccess('backup', await engine.backup(config.paths, excludes.excludeFile, excludes.excludeIfPresent, config.tag));
  }

  private async diff(request: CommandRequest, config: ResolvedConfig, engine: BackupEngine): Promise<void> {
    const ids = request.snapshot ? [request.snapshot, ...request.args] : [...request.args];
    if (ids.length > 2) {
      this.notice(`diff takes at most two snapshots, ignoring ${ids.slice(2).join(' ')}`);
    }
    await runDiff(engine, {
      snapshots: ids.slice(0, 2),
      tag: config.tag,
      added: request.added,
      modified: request.modified,
      removed: request.removed
    }, line => this.logger.line(line), this.logger);
  }

  private async expire(request: CommandRequest, config: ResolvedConfig, engine: BackupEngine): Promise<void> {
    if (config.keep.length === 0) {
      throw new ConfigLoadError('No keep policy configured, refusing to expire snapshots');
    }
    const interactive = (this.deps.interactive ?? isInteractive)();
    if (interactive && !request.assumeYes) {
      const confirm = this.deps.confirm ?? promptConfirmation;
      const proceed = await confirm(`Forget and prune snapshots${config.tag ? ` tagged ${config.tag}` : ''} keeping ${config.keep.join(' ')}?`);
      if (!proceed) {
        this.logger.info('Expire cancelled');
        return;
      }
    }
    expectSuccess('expire', await engine.forget(config.tag, config.keep, true));
  }

  private async mount(request: CommandRequest, engine: BackupEngine): Promise<void> {
    const [mountPoint] = request.args;
    if (!mountPoint) throw new ResourceError('mount needs a mount point');
    const isDirectory = await stat(mountPoint).then(stats => stats.isDirectory(), () => false);
    if (!isDirectory) throw new ResourceError(`Mount point ${mountPoint} is not a directory`, mountPoint);
    this.logger.info(`Mounting repository at ${mountPoint}, unmount to continue`);
    expectSuccess('mount', await engine.mount(mountPoint));
  }

  private async verify(request: CommandRequest, config: ResolvedConfig, engine: BackupEngine): Promise<void> {
    const positional = [...request.args];
    const snapshot = request.snapshot ?? positional.shift() ?? LATEST;
    const numFiles = this.parseCount(positional[0]);

    const result = await verifyRandomly(
      { engine, resources: this.resources, errors: this.errors, logger: this.logger },
      { snapshot, numFiles, compare: request.compare, tag: config.tag }
    );

    if (!request.compare) {
      this.logger.success(`Restored ${result.sampled.length} entries from ${result.snapshotId}`);
    } else if (result.mismatches.length === 0) {
      this.logger.success(`Verified ${result.filesCompared} files from ${result.snapshotId}`);
    } else {
      this.logger.warn(`${result.mismatches.length} of ${result.filesCompared} files differ in ${result.snapshotId}`);
    }
  }

  private parseCount(value: string | undefined): number {
    if (value === undefined) return DEFAULT_SAMPLE_SIZE;
    const count = Number(value);
    if (!Number.isInteger(count) || count < 1) {
      this.notice(`"${value}" is not a positive number of files, using ${DEFAULT_SAMPLE_SIZE}`);
      return DEFAULT_SAMPLE_SIZE;
    }
    return count;
  }

  /** A soft failure: counted and reported, the run carries on. */
  private notice(message: string): void {
    this.errors.record();
    this.logger.error(message);
  }
}

function expectSuccess(operation: string, status: number): void {
  if (status !== 0) throw new EngineError(operation, status);
}
