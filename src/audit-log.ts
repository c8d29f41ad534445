import fs from 'fs';
import path from 'path';
import { delay } from './concurrency.js';
import { AuditWriteError, errorMessage } from './errors.js';
import type { AuditRecord } from './model.js';

export type AuditLogOptions = {
  filePath: string;
  /** IANA zone for timestamps; the host zone when unset. */
  timezone?: string;
  lockTimeoutMs?: number;
  lockStaleMs?: number;
  lockRetryMs?: number;
};

const LINE_PATTERN =
  /^(\d{2}-[A-Za-z]{3}-\d{4} \d{2}:\d{2}:\d{2} [AP]M) action=(\S+) app=(\S+) user=(\S+) outcome=(.*)$/;

/** `DD-MMM-YYYY hh:mm:ss AM/PM`, e.g. `18-Oct-2026 01:05:09 PM`. */
export function formatAuditTimestamp(date: Date, timezone?: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    day: '2-digit',
    month: 'short',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((entry) => entry.type === type)?.value ?? '';
  const period = part('dayPeriod').toUpperCase();
  return `${part('day')}-${part('month')}-${part('year')} ${part('hour')}:${part('minute')}:${part('second')} ${period}`;
}

function singleToken(value: string): string {
  return value.trim().replace(/\s+/g, '_') || '-';
}

export function formatAuditLine(record: AuditRecord): string {
  const outcome = record.outcome.replace(/[\r\n]+/g, ' ').trim();
  return `${record.timestamp} action=${singleToken(record.action)} app=${singleToken(record.application)} user=${singleToken(record.operator)} outcome=${outcome}`;
}

export function parseAuditLine(line: string): AuditRecord | null {
  const match = LINE_PATTERN.exec(line.trim());
  if (!match) {
    return null;
  }
  const [, timestamp, action, application, operator, outcome] = match;
  return { timestamp, action, application, operator, outcome };
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Append-only log of confirmed actions. Writers from any number of
 * processes serialize on an exclusive lock file beside the log.
 */
export class AuditLog {
  private readonly lockPath: string;

  constructor(private readonly options: AuditLogOptions) {
    this.lockPath = `${options.filePath}.lock`;
  }

  get filePath(): string {
    return this.options.filePath;
  }

  async record(
    action: string,
    application: string,
    operator: string,
    outcome: string,
    now: Date = new Date(),
  ): Promise<AuditRecord> {
    const record: AuditRecord = {
      action,
      application,
      operator,
      timestamp: formatAuditTimestamp(now, this.options.timezone),
      outcome,
    };
    const line = `${formatAuditLine(record)}\n`;
    try {
      await fs.promises.mkdir(path.dirname(this.options.filePath), { recursive: true });
    } catch (error) {
      throw new AuditWriteError(`cannot create audit directory: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
    }
    await this.acquireLock();
    try {
      await fs.promises.appendFile(this.options.filePath, line, { encoding: 'utf8', flag: 'a' });
    } catch (error) {
      throw new AuditWriteError(`cannot append to ${this.options.filePath}: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
    } finally {
      await this.releaseLock();
    }
    return record;
  }

  async readRecords(): Promise<AuditRecord[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.options.filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }
    const records: AuditRecord[] = [];
    for (const line of content.split('\n')) {
      const record = parseAuditLine(line);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  async latestByApplication(): Promise<Map<string, AuditRecord>> {
    const latest = new Map<string, AuditRecord>();
    // Lines are in append order, so the last one per application wins.
    for (const record of await this.readRecords()) {
      latest.set(record.application, record);
    }
    return latest;
  }

  private async acquireLock(): Promise<void> {
    const timeoutMs = this.options.lockTimeoutMs ?? 10_000;
    const staleMs = this.options.lockStaleMs ?? 60_000;
    const retryMs = this.options.lockRetryMs ?? 25;
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      try {
        const handle = await fs.promises.open(this.lockPath, 'wx');
        try {
          await handle.writeFile(`${process.pid} ${new Date().toISOString()}\n`);
        } finally {
          await handle.close();
        }
        return;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') {
          throw new AuditWriteError(`cannot create ${this.lockPath}: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
        }
      }
      if (await this.breakStaleLock(staleMs)) {
        continue;
      }
      if (Date.now() >= deadline) {
        throw new AuditWriteError(`timed out waiting for ${this.lockPath}`);
      }
      await delay(retryMs);
    }
  }

  private async breakStaleLock(staleMs: number): Promise<boolean> {
    try {
      const stats = await fs.promises.stat(this.lockPath);
      if (Date.now() - stats.mtimeMs <= staleMs) {
        return false;
      }
      await fs.promises.unlink(this.lockPath);
      console.warn('dr.audit.stale_lock_removed', { lock: this.lockPath });
      return true;
    } catch (error) {
      // Released between our attempts.
      if (errorCode(error) === 'ENOENT') {
        return true;
      }
      throw new AuditWriteError(`cannot inspect ${this.lockPath}: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
    }
  }

  private async releaseLock(): Promise<void> {
    try {
      await fs.promises.unlink(this.lockPath);
    } catch (error) {
      console.warn('dr.audit.lock_release_failed', { lock: this.lockPath, message: errorMessage(error) });
    }
  }
}
