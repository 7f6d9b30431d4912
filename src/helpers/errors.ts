export const ERROR_MESSAGES = {
  ECONFIG: 'Configuration could not be loaded',
  ECOMMAND: 'Unknown command',
  EENGINE: 'Backup engine returned a failure status',
  ETEMP: 'Temporary resource operation failed',
  ERESOURCE: 'Required resource is unavailable',
  ESNAPSHOTS: 'Not enough snapshots',
  ERESOLVE: 'Snapshot could not be resolved',
  EEMPTY: 'Nothing to sample',
  EVERIFY: 'Verification restore failed',
  EINTERRUPT: 'Interrupted'
} as const;

export type ErrorCode = keyof typeof ERROR_MESSAGES;

export type ErrorContext = Readonly<Record<string, unknown>>;

export class ResticRunError extends Error {
  public readonly context?: ErrorContext;

  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown; context?: ErrorContext }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.context = options?.context;
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

export class ConfigLoadError extends ResticRunError {
  constructor(message: string, public readonly source?: string, cause?: unknown) {
    super(message, 'ECONFIG', { cause, context: source ? { source } : undefined });
  }
}

export class UnknownCommandError extends ResticRunError {
  constructor(public readonly command: string, known: readonly string[]) {
    super(`Unknown command "${command}". Known commands: ${known.join(', ')}`, 'ECOMMAND', {
      context: { command }
    });
  }
}

export class EngineError extends ResticRunError {
  constructor(operation: string, public readonly exitCode: number, cause?: unknown) {
    super(`${operation} failed with exit status ${exitCode}`, 'EENGINE', {
      cause,
      context: { operation, exitCode }
    });
  }
}

export class TempResourceError extends ResticRunError {
  constructor(message: string, path?: string, cause?: unknown) {
    super(message, 'ETEMP', { cause, context: path ? { path } : undefined });
  }
}

export class ResourceError extends ResticRunError {
  constructor(message: string, path?: string) {
    super(message, 'ERESOURCE', { context: path ? { path } : undefined });
  }
}

export class InsufficientSnapshotsError extends ResticRunError {
  constructor(public readonly found: number, tag?: string) {
    super(`Need at least two snapshots to diff, found ${found}${tag ? ` with tag "${tag}"` : ''}`, 'ESNAPSHOTS', {
      context: { found, tag }
    });
  }
}

export class SnapshotResolutionError extends ResticRunError {
  constructor(snapshot: string, tag?: string) {
    super(`No snapshot found for "${snapshot}"${tag ? ` with tag "${tag}"` : ''}`, 'ERESOLVE', {
      context: { snapshot, tag }
    });
  }
}

export class EmptySampleError extends ResticRunError {
  constructor(snapshotId: string) {
    super(`Snapshot ${snapshotId} has no entries to sample`, 'EEMPTY', { context: { snapshotId } });
  }
}

export class VerifyFailedError extends ResticRunError {
  constructor(snapshotId: string, public readonly exitCode: number) {
    super(`Restore of snapshot ${snapshotId} failed with exit status ${exitCode}`, 'EVERIFY', {
      context: { snapshotId, exitCode }
    });
  }
}

export class InterruptedError extends ResticRunError {
  constructor(public readonly signal: NodeJS.Signals) {
    super(`Received ${signal}`, 'EINTERRUPT', { context: { signal } });
  }
}

/**
 * Process-wide tally of failures. Its value becomes the exit code.
 */
export class ErrorCounter {
  private count = 0;

  get value(): number {
    return this.count;
  }

  record(): number {
    this.count += 1;
    return this.count;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
