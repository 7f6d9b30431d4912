import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { TempResourceError, errorMessage } from './errors';
import type { Logger } from './log';

const HANDLED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

export interface SignalHooks {
  on(signal: NodeJS.Signals, listener: () => void): void;
  off(signal: NodeJS.Signals, listener: () => void): void;
}

const processHooks: SignalHooks = {
  on: (signal, listener) => { process.on(signal, listener); },
  off: (signal, listener) => { process.off(signal, listener); }
};

/**
 * Paths created during a run that must not outlive it. Removal happens once,
 * whichever of normal completion, a fatal error or a signal comes first.
 */
export class TempResources {
  private readonly paths: string[] = [];
  private released = false;
  private signalListeners = new Map<NodeJS.Signals, () => void>();
  private hooks?: SignalHooks;
  private readonly exitListener = () => this.cleanup();

  constructor(
    private readonly logger?: Logger,
    private readonly baseDir: string = tmpdir()
  ) {}

  get registered(): readonly string[] {
    return this.paths;
  }

  get isReleased(): boolean {
    return this.released;
  }

  register(path: string): string {
    if (this.released) {
      throw new TempResourceError('Temporary resources were already released', path);
    }
    this.paths.push(path);
    this.logger?.debug(`Registered temporary resource ${path}`);
    return path;
  }

  makeDirectory(prefix: string): string {
    try {
      return this.register(mkdtempSync(join(this.baseDir, prefix)));
    } catch (error) {
      if (error instanceof TempResourceError) throw error;
      throw new TempResourceError(`Could not create temporary directory: ${errorMessage(error)}`, this.baseDir, error);
    }
  }

  writeFile(prefix: string, name: string, content: string): string {
    const directory = this.makeDirectory(prefix);
    const filePath = join(directory, name);
    try {
      writeFileSync(filePath, content, { encoding: 'utf-8', mode: 0o600 });
    } catch (error) {
      throw new TempResourceError(`Could not write ${filePath}: ${errorMessage(error)}`, filePath, error);
    }
    return filePath;
  }

  /**
   * Removes every registered path, newest first. Later calls do nothing.
   */
  cleanup(): void {
    if (this.released) return;
    this.released = true;
    for (const path of [...this.paths].reverse()) {
      try {
        rmSync(path, { recursive: true, force: true });
        this.logger?.debug(`Removed temporary resource ${path}`);
      } catch (error) {
        this.logger?.warn(`Could not remove ${path}: ${errorMessage(error)}`);
      }
    }
    this.detach();
  }

  /**
   * Installs signal and exit listeners. `onSignal` runs after cleanup and is
   * expected to end the process.
   */
  attach(onSignal: (signal: NodeJS.Signals) => void, hooks: SignalHooks = processHooks): void {
    for (const signal of HANDLED_SIGNALS) {
      const listener = () => {
        this.logger?.warn(`Received ${signal}, cleaning up`);
        this.cleanup();
        onSignal(signal);
      };
      this.signalListeners.set(signal, listener);
      hooks.on(signal, listener);
    }
    this.hooks = hooks;
    process.once('exit', this.exitListener);
  }

  private detach(): void {
    const hooks = this.hooks;
    if (hooks) {
      for (const [signal, listener] of this.signalListeners) hooks.off(signal, listener);
    }
    this.signalListeners = new Map();
    process.off('exit', this.exitListener);
  }
}
