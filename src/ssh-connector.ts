import crypto from 'crypto';
import path from 'path';
import { runCommand, type CommandResult } from './exec.js';
import { CommandPolicyError, ConnectionError, errorMessage, isAbortError } from './errors.js';
import type { ClusterConnector, ClusterSession, RemoteCommandOutput, RemoteExecuteOptions } from './remote.js';

export type SshConnectorOptions = {
  user?: string;
  identityFile?: string;
  controlDir: string;
  timeoutMs: number;
};

// OpenSSH reserves exit status 255 for its own (transport/auth) failures.
const SSH_TRANSPORT_EXIT = 255;

function firstLine(value: string): string {
  return value.trim().split(/\r?\n/)[0] || '';
}

class SshClusterSession implements ClusterSession {
  private closed = false;

  constructor(
    readonly cluster: string,
    private readonly target: string,
    private readonly socketPath: string,
    private readonly options: SshConnectorOptions,
  ) {}

  async execute(command: string, options: RemoteExecuteOptions = {}): Promise<RemoteCommandOutput> {
    if (this.closed) {
      throw new ConnectionError(`session to ${this.cluster} is closed`, this.cluster);
    }
    let result: CommandResult;
    try {
      result = await runCommand(
        'ssh',
        ['-S', this.socketPath, '-T', '-o', 'BatchMode=yes', this.target, command],
        this.options.timeoutMs,
        { input: options.input, signal: options.signal },
      );
    } catch (error) {
      if (isAbortError(error) || error instanceof CommandPolicyError) throw error;
      throw new ConnectionError(
        `ssh to ${this.cluster} failed: ${errorMessage(error)}`,
        this.cluster,
        error instanceof Error ? error : undefined,
      );
    }
    if (result.code === SSH_TRANSPORT_EXIT) {
      throw new ConnectionError(`ssh to ${this.cluster} failed: ${firstLine(result.stderr) || 'connection lost'}`, this.cluster);
    }
    const stderr = result.stderr.trim();
    // The cluster shell reports rejected commands on stdout.
    const shellError = result.stdout.match(/^Error:.*$/m)?.[0] ?? '';
    if (result.code !== 0 || stderr || shellError) {
      return { output: result.stdout, error: stderr || shellError || `exit code ${result.code}` };
    }
    return { output: result.stdout };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const result = await runCommand('ssh', ['-S', this.socketPath, '-O', 'exit', this.target], this.options.timeoutMs);
    if (result.code !== 0) {
      console.warn('dr.ssh.close_failed', { cluster: this.cluster, stderr: firstLine(result.stderr) });
    }
  }
}

/**
 * Opens one OpenSSH ControlMaster connection per cluster so that a batch
 * of commands shares a single authenticated transport.
 */
export class SshConnector implements ClusterConnector {
  constructor(private readonly options: SshConnectorOptions) {}

  async connect(cluster: string): Promise<ClusterSession> {
    const target = this.options.user ? `${this.options.user}@${cluster}` : cluster;
    const socketPath = path.join(this.options.controlDir, `dr-agent-${crypto.randomUUID()}.sock`);
    const args = ['-M', '-S', socketPath, '-o', 'BatchMode=yes', '-o', 'ControlPersist=yes'];
    if (this.options.identityFile) {
      args.push('-i', this.options.identityFile);
    }
    args.push('-fN', target);
    let result: CommandResult;
    try {
      result = await runCommand('ssh', args, this.options.timeoutMs);
    } catch (error) {
      if (error instanceof CommandPolicyError) throw error;
      throw new ConnectionError(
        `cannot connect to ${cluster}: ${errorMessage(error)}`,
        cluster,
        error instanceof Error ? error : undefined,
      );
    }
    if (result.code !== 0) {
      throw new ConnectionError(`cannot connect to ${cluster}: ${firstLine(result.stderr) || `exit code ${result.code}`}`, cluster);
    }
    console.log('dr.ssh.connected', { cluster });
    return new SshClusterSession(cluster, target, socketPath, this.options);
  }
}
