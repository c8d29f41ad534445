import { spawn } from 'child_process';
import { enforceCommandPolicy } from './command-policy.js';
import { abortError } from './concurrency.js';

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

const DEFAULT_TIMEOUT_MS = Number(process.env.DR_COMMAND_TIMEOUT_MS || 60000);

export type CommandOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Written to stdin, which is then closed. */
  input?: string;
  signal?: AbortSignal;
};

export function runCommand(
  command: string,
  args: string[],
  timeoutMs = DEFAULT_TIMEOUT_MS,
  options: CommandOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    enforceCommandPolicy(command, args, { source: 'exec.runCommand' });
    if (options.signal?.aborted) {
      reject(abortError());
      return;
    }
    const child = spawn(command, args, {
      stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      cwd: options.cwd,
      env: options.env,
    });
    let stdout = '';
    let stderr = '';
    let aborted = false;
    let stdinError: Error | undefined;
    const timer = setTimeout(() => {
      child.kill('SIGKILL');
    }, timeoutMs);
    const onAbort = () => {
      aborted = true;
      child.kill('SIGKILL');
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.input !== undefined && child.stdin) {
      child.stdin.on('error', (error: Error) => {
        // EPIPE: the child exited without reading its answer; 'close' reports the exit code.
        if ('code' in error && error.code === 'EPIPE') return;
        stdinError = error;
        child.kill('SIGKILL');
      });
      child.stdin.end(options.input);
    }
    child.stdout?.on('data', (chunk) => {
      stdout += chunk.toString();
    });
    child.stderr?.on('data', (chunk) => {
      stderr += chunk.toString();
    });
    child.on('error', (err) => {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      reject(err);
    });
    child.on('close', (code) => {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      if (aborted) {
        reject(abortError());
        return;
      }
      if (stdinError) {
        reject(stdinError);
        return;
      }
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
}
