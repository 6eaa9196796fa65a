/**
 * Child process helper
 *
 * Spawns a program, optionally feeds it standard input, and resolves with
 * the exit code and captured output once it closes. Launch failures
 * (missing binary, permission denied) reject.
 */

import { spawn } from 'node:child_process';

export interface RunOptions {
  /** Written to stdin, which is then closed */
  input?: string;

  /** Kill the process after this many ms */
  timeout?: number;

  /** Extra environment variables */
  env?: Record<string, string>;
}

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export function runProcess(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    let stdout = '';
    let stderr = '';

    const proc = spawn(command, args, {
      env: { ...process.env, ...options.env },
      timeout: options.timeout,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', reject);

    proc.on('close', (code) => {
      resolve({ exitCode: code ?? -1, stdout, stderr });
    });

    // A process that exits without reading stdin raises EPIPE here
    proc.stdin.on('error', () => undefined);
    if (options.input !== undefined) {
      proc.stdin.end(options.input);
    } else {
      proc.stdin.end();
    }
  });
}

/**
 * Run a program with the terminal handed over to it.
 */
export function runInteractive(command: string, args: string[]): Promise<number> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: 'inherit' });
    proc.on('error', reject);
    proc.on('close', (code) => resolve(code ?? -1));
  });
}
