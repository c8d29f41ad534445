import { errorMessage } from './errors.js';

export type RemoteCommandOutput = {
  output: string;
  error?: string;
};

export type RemoteExecuteOptions = {
  signal?: AbortSignal;
  /** Answer for interactive confirmations (written to stdin). */
  input?: string;
};

/**
 * Runs one cluster shell command. Must be safe to call concurrently for
 * different clusters. Transport failures reject with ConnectionError;
 * a command the cluster rejected resolves with `error` set.
 */
export interface RemoteExecutor {
  execute(cluster: string, command: string, options?: RemoteExecuteOptions): Promise<RemoteCommandOutput>;
}

export interface ClusterSession {
  readonly cluster: string;
  execute(command: string, options?: RemoteExecuteOptions): Promise<RemoteCommandOutput>;
  close(): Promise<void>;
}

export interface ClusterConnector {
  connect(cluster: string): Promise<ClusterSession>;
}

/**
 * Lazily opens one session per cluster and hands out an executor that
 * routes through them. Sessions live until `closeAll`.
 */
export class SessionPool implements RemoteExecutor {
  private readonly sessions = new Map<string, Promise<ClusterSession>>();

  constructor(private readonly connector: ClusterConnector) {}

  private acquire(cluster: string): Promise<ClusterSession> {
    let pending = this.sessions.get(cluster);
    if (!pending) {
      pending = this.connector.connect(cluster);
      this.sessions.set(cluster, pending);
      // A failed connect is not cached: the next call reconnects.
      void pending.catch(() => {
        if (this.sessions.get(cluster) === pending) {
          this.sessions.delete(cluster);
        }
      });
    }
    return pending;
  }

  async execute(cluster: string, command: string, options: RemoteExecuteOptions = {}): Promise<RemoteCommandOutput> {
    const session = await this.acquire(cluster);
    return session.execute(command, options);
  }

  openClusters(): string[] {
    return [...this.sessions.keys()];
  }

  async closeAll(): Promise<void> {
    const pending = [...this.sessions.values()];
    this.sessions.clear();
    const settled = await Promise.allSettled(pending);
    await Promise.all(
      settled.map(async (entry) => {
        if (entry.status !== 'fulfilled') return;
        try {
          await entry.value.close();
        } catch (error) {
          console.warn('dr.session.close_failed', { cluster: entry.value.cluster, message: errorMessage(error) });
        }
      }),
    );
  }
}

/**
 * Scopes cluster sessions to one batch: every session opened while `fn`
 * runs is closed afterwards, including when `fn` throws.
 */
export async function withClusterSessions<T>(
  connector: ClusterConnector,
  fn: (executor: RemoteExecutor) => Promise<T>,
): Promise<T> {
  const pool = new SessionPool(connector);
  try {
    return await fn(pool);
  } finally {
    await pool.closeAll();
  }
}
