import { spawn } from 'node:child_process';

export interface ProcessResult {
  readonly exitCode: number | null;
  /** Set when the process was killed instead of exiting. */
  readonly signal: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;
}

export type ProcessRunner = (binary: string, args: readonly string[]) => Promise<ProcessResult>;

const MAX_CAPTURED_BYTES = 256 * 1024;

function appendBounded(current: string, chunk: Buffer): string {
  const next = current + chunk.toString('utf8');
  return next.length > MAX_CAPTURED_BYTES ? next.slice(next.length - MAX_CAPTURED_BYTES) : next;
}

/**
 * Runs a binary to completion. Resolves with the exit code whatever it is;
 * only a failure to start the process rejects.
 */
export const runProcess: ProcessRunner = (binary, args) =>
  new Promise<ProcessResult>((resolve, reject) => {
    const proc = spawn(binary, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (chunk: Buffer) => {
      stdout = appendBounded(stdout, chunk);
    });
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr = appendBounded(stderr, chunk);
    });

    proc.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        reject(new Error(`${binary} binary not found. Install it or point the matching *_PATH variable at it.`));
        return;
      }
      reject(error);
    });
    proc.on('close', (code, signal) => {
      resolve({ exitCode: code, signal, stdout, stderr });
    });
  });
