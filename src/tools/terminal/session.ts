import type {
  ProcessRecord,
  SessionInfo,
  SessionStatus,
} from '../../types/session.js';
import { createNotFoundError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

export const UNKNOWN_EXIT_CODE = -1;

type RecordOfMode<M extends ProcessRecord['mode']> = Extract<ProcessRecord, { mode: M }>;

/**
 * Owns every detached and interactive process record, keyed by id.
 * Blocking runs never enter the table.
 */
export class SessionTable {
  private sessions: Map<string, ProcessRecord> = new Map();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(
    private logger: Logger,
    private sessionTtl: number = 30 * 60 * 1000 // 30 minutes default
  ) {
    this.startCleanupInterval();
  }

  insert(record: ProcessRecord): void {
    if (this.sessions.has(record.id)) {
      throw new Error(`Duplicate session id: ${record.id}`);
    }
    this.sessions.set(record.id, record);
  }

  get(id: string): ProcessRecord | undefined {
    return this.sessions.get(id);
  }

  /**
   * Look up a record, failing with NOT_FOUND when absent or of another mode
   */
  require(id: string): ProcessRecord;
  require<M extends ProcessRecord['mode']>(id: string, mode: M): RecordOfMode<M>;
  require(id: string, mode?: ProcessRecord['mode']): ProcessRecord {
    const record = this.sessions.get(id);
    if (!record || (mode !== undefined && record.mode !== mode)) {
      throw createNotFoundError(id, mode === 'interactive' ? 'Interactive session' : 'Process');
    }
    return record;
  }

  /**
   * Move a running record to its terminal status and release its handle.
   * Returns false when the record already left 'running'.
   */
  settle(record: ProcessRecord, status: Exclude<SessionStatus, 'running'>, exitCode: number): boolean {
    if (record.status !== 'running') {
      return false;
    }

    record.status = status;
    record.exitCode = exitCode;
    record.endedAt = new Date();

    const handle = record.handle;
    record.handle = null;
    handle?.release();

    this.logger.info({
      id: record.id,
      mode: record.mode,
      pid: record.pid,
      status,
      exitCode,
    }, 'Process settled');

    return true;
  }

  /**
   * Convert a drain or OS fault into a terminal state so the record never
   * stays 'running' with a dead handle.
   */
  fail(record: ProcessRecord, error: unknown): void {
    if (record.status !== 'running') {
      return;
    }

    this.logger.error({ error, id: record.id, pid: record.pid }, 'Process fault, marking killed');

    try {
      record.handle?.signal('SIGKILL');
    } catch (killError) {
      this.logger.error({ error: killError, id: record.id }, 'Failed to kill faulted process');
    }

    this.settle(record, 'killed', UNKNOWN_EXIT_CODE);
  }

  remove(id: string): boolean {
    return this.sessions.delete(id);
  }

  list(): SessionInfo[] {
    const now = Date.now();
    return Array.from(this.sessions.values()).map(record => ({
      id: record.id,
      mode: record.mode,
      command: record.command,
      pid: record.pid,
      status: record.status,
      exitCode: record.exitCode,
      uptime: (record.endedAt ?? new Date(now)).getTime() - record.createdAt.getTime(),
      bufferedChars: record.mode === 'detached'
        ? record.stdout.retained + record.stderr.retained
        : record.output.retained,
    }));
  }

  /**
   * Purge finished records that ended more than sessionTtl ago
   */
  cleanupStale(now: number = Date.now()): number {
    let cleaned = 0;

    for (const [id, record] of this.sessions) {
      if (record.endedAt && now - record.endedAt.getTime() > this.sessionTtl) {
        this.sessions.delete(id);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      this.logger.info({ cleaned }, 'Purged finished sessions');
    }

    return cleaned;
  }

  private startCleanupInterval(): void {
    if (this.cleanupInterval) {
      return;
    }

    this.cleanupInterval = setInterval(() => {
      this.cleanupStale();
    }, 60 * 1000);

    // Don't prevent process from exiting
    this.cleanupInterval.unref();
  }

  /**
   * Stop the janitor, force-kill running processes and forget every record
   */
  dispose(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }

    for (const record of this.sessions.values()) {
      if (record.status !== 'running' || !record.handle) continue;

      try {
        record.handle.signal('SIGKILL');
      } catch (error) {
        this.logger.error({ error, id: record.id }, 'Failed to kill process on shutdown');
      }
      this.settle(record, 'killed', UNKNOWN_EXIT_CODE);
    }

    this.sessions.clear();
    this.logger.info('SessionTable disposed');
  }

  get count(): number {
    return this.sessions.size;
  }
}
