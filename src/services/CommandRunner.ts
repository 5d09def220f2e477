import { spawn } from 'child_process';

export interface RunOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  timeoutMs?: number;
}

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<void>;

/**
 * Run a helper binary to completion. Rejects on spawn failure, a non-zero
 * exit code, or the timeout.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['pipe', 'ignore', 'pipe'] });
    const timeoutMs = options.timeoutMs ?? 5000;
    let stderr = '';
    let settled = false;

    const finish = (error?: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      finish(new Error(`${command} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error) => finish(new Error(`${command} failed to start: ${error.message}`)));

    child.on('close', (code) => {
      if (code === 0) {
        finish();
      } else {
        finish(new Error(`${command} exited with code ${code}: ${stderr.slice(0, 300).trim()}`));
      }
    });

    // EPIPE when the helper exits early; reported with the exit code
    child.stdin.on('error', (error) => {
      stderr += `${error.message}\n`;
    });
    child.stdin.end(options.input ?? '');
  });
};
