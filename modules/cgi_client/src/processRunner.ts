import { spawn } from 'node:child_process';
import { invocationError } from './cgiErrors.js';

export interface ProcessRunOptions {
  /** Complete environment of the child; nothing is inherited. */
  env: Record<string, string>;
  input?: Uint8Array;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: Buffer;
}

export interface ProcessRunner {
  run(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessResult>;
}

export interface SpawnProcessRunnerOptions {
  cwd?: string;
  timeoutMs?: number;
}

export class SpawnProcessRunner implements ProcessRunner {
  constructor(private readonly options: SpawnProcessRunnerOptions = {}) {}

  run(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: this.options.cwd,
        env: options.env,
        timeout: this.options.timeoutMs,
        stdio: ['pipe', 'pipe', 'pipe']
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => {
        stdout.push(chunk);
      });

      child.stderr.on('data', (chunk: Buffer) => {
        stderr.push(chunk);
      });

      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        // EPIPE: the program exited without reading its input.
        if (error.code !== 'EPIPE') {
          child.kill();
          reject(invocationError(`Failed to write input to ${command}: ${error.message}`, error));
        }
      });

      child.once('error', (error) => {
        reject(invocationError(`Failed to start ${command}: ${error.message}`, error));
      });

      child.once('close', (code, signal) => {
        resolve({
          exitCode: code,
          signal,
          stdout: Buffer.concat(stdout),
          stderr: Buffer.concat(stderr)
        });
      });

      child.stdin.end(options.input ?? Buffer.alloc(0));
    });
  }
}
