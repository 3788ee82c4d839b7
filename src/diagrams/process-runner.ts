import { spawn } from 'node:child_process';
import type { ProcessResult } from './types.js';

/**
 * Spawn a process and collect its output. Never rejects: spawn failures
 * surface as a null exit code with the error text in stderr, and a
 * process outliving `timeoutMs` is killed with SIGKILL.
 */
export function spawnProcess(
  command: string,
  args: string[],
  timeoutMs: number
): Promise<ProcessResult> {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const finish = (exitCode: number | null): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      resolve({ exitCode, stdout, stderr, timedOut });
    };

    const timeout = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (err) => {
      stderr += err.message;
      finish(null);
    });

    child.on('close', (code) => {
      finish(code);
    });
  });
}
