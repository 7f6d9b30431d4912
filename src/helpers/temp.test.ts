import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { TempResources } from './temp';
import type { SignalHooks } from './temp';
import { ErrorCounter, TempResourceError } from './errors';
import { Logger, createMemorySink } from './log';
import { verifyRandomly } from './verify';
import { FakeEngine } from '../test-utils/fake-engine';

function fakeHooks() {
  const listeners = new Map<NodeJS.Signals, () => void>();
  const hooks: SignalHooks = {
    on: (signal, listener) => { listeners.set(signal, listener); },
    off: (signal, listener) => {
      if (listeners.get(signal) === listener) listeners.delete(signal);
    }
  };
  const raise = (signal: NodeJS.Signals) => listeners.get(signal)?.();
  return { hooks, listeners, raise };
}

describe('TempResources', () => {
  let baseDir: string;
  let sink: ReturnType<typeof createMemorySink>;
  let resources: TempResources;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'resticrun-temp-'));
    sink = createMemorySink();
    resources = new TempResources(new Logger('normal', sink), baseDir);
  });

  afterEach(async () => {
    resources.cleanup();
    await rm(baseDir, { recursive: true, force: true });
  });

  it('creates and registers directories and files', async () => {
    const dir = resources.makeDirectory('probe-');
    const file = resources.writeFile('probe-file-', 'list.txt', 'a\nb\n');

    expect(existsSync(dir)).toBe(true);
    expect(await readFile(file, 'utf-8')).toBe('a\nb\n');
    expect(resources.registered).toHaveLength(2);
    expect(resources.registered[0]).toBe(dir);
  });

  it('removes everything once and ignores later calls', () => {
    const dir = resources.makeDirectory('probe-');
    resources.cleanup();
    expect(existsSync(dir)).toBe(false);
    expect(resources.isReleased).toBe(true);
    resources.cleanup();
    expect(sink.errors).toEqual([]);
  });

  it('refuses registrations after release', () => {
    resources.cleanup();
    expect(() => resources.register('/tmp/late')).toThrow(TempResourceError);
  });

  it('wraps creation failures', () => {
    const broken = new TempResources(undefined, join(baseDir, 'does', 'not', 'exist'));
    expect(() => broken.makeDirectory('probe-')).toThrow(TempResourceError);
  });

  it('cleans up on a signal and hands over to the exit callback', () => {
    const { hooks, listeners, raise } = fakeHooks();
    const received: NodeJS.Signals[] = [];
    resources.attach(signal => received.push(signal), hooks);
    const dir = resources.makeDirectory('probe-');

    expect([...listeners.keys()]).toEqual(['SIGINT', 'SIGTERM', 'SIGHUP']);
    raise('SIGTERM');

    expect(existsSync(dir)).toBe(false);
    expect(received).toEqual(['SIGTERM']);
    expect(listeners.size).toBe(0);
    expect(sink.errors).toEqual(['⚠️  Warning: Received SIGTERM, cleaning up']);
  });

  it('removes the restore directory when interrupted mid-verification', async () => {
    const { hooks, raise } = fakeHooks();
    const received: NodeJS.Signals[] = [];
    resources.attach(signal => received.push(signal), hooks);

    const engine = new FakeEngine();
    engine.entries = [{ path: '/data/a.txt', type: 'file' }];
    let restoreDir = '';
    engine.onRestore = (_id, target) => {
      restoreDir = target;
      expect(existsSync(target)).toBe(true);
      raise('SIGINT');
    };

    await verifyRandomly(
      { engine, resources, errors: new ErrorCounter(), logger: new Logger('normal', sink) },
      { snapshot: 'snap-1' }
    );

    expect(restoreDir).not.toBe('');
    expect(existsSync(restoreDir)).toBe(false);
    expect(received).toEqual(['SIGINT']);
    resources.cleanup();
    expect(received).toEqual(['SIGINT']);
  });
});
