import { spawn } from 'child_process';
import { createInterface } from 'readline';

export interface SpawnRequest {
  command: string;
  args: readonly string[];
  env?: Record<string, string>;
  /** Called for each stdout line. When absent, stdout goes to the terminal. */
  onLine?: (line: string) => void;
  /** Collect stdout instead of passing it through. */
  capture?: boolean;
}

export interface SpawnResult {
  code: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (request: SpawnRequest) => Promise<SpawnResult>;

/**
 * Starts a process from an argument list (no shell involved) and resolves once
 * it exits. A process killed by a signal resolves with 128 + signal number,
 * or 1 when the number is unknown.
 */
export const runCommand: CommandRunner = (request) => new Promise((resolve, reject) => {
  const piped = request.capture || request.onLine !== undefined;
  const child = spawn(request.command, [...request.args], {
    env: { ...process.env, ...request.env },
    stdio: ['inherit', piped ? 'pipe' : 'inherit', request.capture ? 'pipe' : 'inherit']
  });

  let stdout = '';
  let stderr = '';
  let lines: Promise<void> = Promise.resolve();

  if (child.stdout) {
    if (request.onLine) {
      const onLine = request.onLine;
      const reader = createInterface({ input: child.stdout, crlfDelay: Infinity });
      reader.on('line', line => onLine(line));
      lines = new Promise(done => reader.once('close', () => done()));
    } else {
      child.stdout.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => { stdout += chunk; });
    }
  }
  if (child.stderr) {
    child.stderr.setEncoding('utf-8');
    child.stderr.on('data', (chunk: string) => { stderr += chunk; });
  }

  child.once('error', reject);
  child.once('close', (code, signal) => {
    const status = code ?? (signal ? signalExitCode(signal) : 1);
    lines.then(() => resolve({ code: status, stdout, stderr }), reject);
  });
});

function signalExitCode(signal: NodeJS.Signals): number {
  const numbers: Partial<Record<NodeJS.Signals, number>> = { SIGHUP: 1, SIGINT: 2, SIGKILL: 9, SIGTERM: 15 };
  const value = numbers[signal];
  return value === undefined ? 1 : 128 + value;
}
