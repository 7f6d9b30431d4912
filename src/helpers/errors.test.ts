import { describe, it, expect } from 'vitest';
import {
  ConfigLoadError,
  EngineError,
  ErrorCounter,
  InsufficientSnapshotsError,
  ResticRunError,
  errorMessage
} from './errors';

describe('errors', () => {
  it('carries a code and context through serialization', () => {
    const error = new EngineError('backup', 3);
    expect(error).toBeInstanceOf(ResticRunError);
    expect(error.name).toBe('EngineError');
    expect(JSON.parse(JSON.stringify(error))).toEqual({
      name: 'EngineError',
      code: 'EENGINE',
      message: 'backup failed with exit status 3',
      context: { operation: 'backup', exitCode: 3 }
    });
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('EACCES');
    const error = new ConfigLoadError('Could not read set configuration', '/etc/resticrun/sets/home.yaml', cause);
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ source: '/etc/resticrun/sets/home.yaml' });
  });

  it('mentions the tag when too few snapshots match', () => {
    expect(new InsufficientSnapshotsError(1, 'nightly').message).toBe('Need at least two snapshots to diff, found 1 with tag "nightly"');
    expect(new InsufficientSnapshotsError(0).message).toBe('Need at least two snapshots to diff, found 0');
  });

  it('counts recorded failures', () => {
    const counter = new ErrorCounter();
    expect(counter.value).toBe(0);
    counter.record();
    expect(counter.record()).toBe(2);
    expect(counter.value).toBe(2);
  });

  it('describes thrown values that are not errors', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });
});
