import { renderDelta } from './buffer.js';
import { runCommand, startDetached, waitFor, type BlockingResult, type ExecOptions } from './process.js';
import { defaultInteractiveShell, startInteractive } from './pty.js';
import { SessionTable, UNKNOWN_EXIT_CODE } from './session.js';
import type { ApprovalHook } from '../../security/approval.js';
import type { CommandValidator } from '../../security/validator.js';
import type { Config } from '../../types/config.js';
import type {
  ExecMode,
  KillResult,
  ProcessRecord,
  SessionInfo,
} from '../../types/session.js';
import {
  createInternalError,
  createRejectedError,
  createSessionClosedError,
} from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

/** How long to wait for a SIGKILLed process before giving up on its exit status */
const FORCE_KILL_WAIT_MS = 1000;

export interface EngineOptions {
  shell: string;
  interactiveShell?: string;
  cwd?: string;
  killGracePeriod: number;
  maxBufferSize: number;
  pty: { cols: number; rows: number };
  approval?: ApprovalHook;
  validator?: CommandValidator;
}

export interface OutputCursor {
  stdout?: number;
  stderr?: number;
}

export interface OutputSnapshot {
  stdout: string;
  stderr: string;
  running: boolean;
  exitCode: number | null;
  stdoutOffset: number;
  stderrOffset: number;
}

export interface InteractiveSnapshot {
  output: string;
  running: boolean;
  exitCode: number | null;
  offset: number;
}

export function engineOptionsFromConfig(
  config: Config,
  extras: Pick<EngineOptions, 'approval' | 'validator'> = {}
): EngineOptions {
  return {
    shell: config.shell,
    interactiveShell: config.interactiveShell,
    cwd: config.cwd,
    killGracePeriod: config.killGracePeriod,
    maxBufferSize: config.maxBufferSize,
    pty: config.pty,
    ...extras,
  };
}

/**
 * Uniform control surface over blocking, detached and interactive processes.
 * Records are only ever reached through the session table.
 */
export class ExecutionEngine {
  constructor(
    private table: SessionTable,
    private logger: Logger,
    private options: EngineOptions
  ) {}

  private get execOptions(): ExecOptions {
    return {
      shell: this.options.shell,
      cwd: this.options.cwd,
      maxBufferSize: this.options.maxBufferSize,
    };
  }

  /**
   * Blocked-list check, then the approval hook. Nothing is spawned on rejection.
   */
  private async authorize(command: string, mode: ExecMode): Promise<void> {
    const validation = this.options.validator?.validateCommand(command);
    if (validation && !validation.valid) {
      throw createRejectedError(command, validation.error);
    }

    if (this.options.approval && !(await this.options.approval.approve(command, mode))) {
      this.logger.info({ command, mode }, 'Command declined');
      throw createRejectedError(command, `Command declined by operator: ${command}`);
    }
  }

  async runBlocking(command: string, stdin?: string): Promise<BlockingResult> {
    this.logger.info({ mode: 'blocking', command }, 'Run requested');
    await this.authorize(command, 'blocking');
    return runCommand(command, stdin, this.execOptions, this.logger);
  }

  async startDetached(command: string, stdin?: string): Promise<string> {
    this.logger.info({ mode: 'detached', command }, 'Start requested');
    await this.authorize(command, 'detached');
    const record = await startDetached(command, stdin, this.execOptions, this.table, this.logger);
    return record.id;
  }

  /**
   * Output of a detached process since the previous poll, or since the
   * given offsets when the caller keeps its own cursor.
   */
  getOutput(id: string, cursor: OutputCursor = {}): OutputSnapshot {
    const record = this.table.require(id, 'detached');

    const stdout = cursor.stdout === undefined
      ? record.stdout.drain()
      : record.stdout.readFrom(cursor.stdout);
    const stderr = cursor.stderr === undefined
      ? record.stderr.drain()
      : record.stderr.readFrom(cursor.stderr);

    return {
      stdout: renderDelta(stdout),
      stderr: renderDelta(stderr),
      running: record.status === 'running',
      exitCode: record.exitCode,
      stdoutOffset: stdout.nextOffset,
      stderrOffset: stderr.nextOffset,
    };
  }

  async kill(id: string): Promise<KillResult> {
    const record = this.table.require(id);
    return this.terminate(record, record.mode === 'interactive' ? 'SIGHUP' : 'SIGTERM');
  }

  async interactiveStart(command?: string): Promise<string> {
    const shell = this.options.interactiveShell || defaultInteractiveShell();
    this.logger.info({ mode: 'interactive', command: command ?? shell }, 'Interactive session requested');
    await this.authorize(command ?? shell, 'interactive');

    const record = startInteractive(command, {
      shell,
      cwd: this.options.cwd,
      cols: this.options.pty.cols,
      rows: this.options.pty.rows,
      maxBufferSize: this.options.maxBufferSize,
    }, this.table, this.logger);

    return record.id;
  }

  interactiveOutput(id: string, offset?: number): InteractiveSnapshot {
    const record = this.table.require(id, 'interactive');
    const delta = offset === undefined ? record.output.drain() : record.output.readFrom(offset);

    return {
      output: renderDelta(delta),
      running: record.status === 'running',
      exitCode: record.exitCode,
      offset: delta.nextOffset,
    };
  }

  /**
   * Write text verbatim to the PTY. Callers add the trailing newline themselves.
   */
  interactiveInput(id: string, text: string): void {
    const record = this.table.require(id, 'interactive');
    if (record.status !== 'running' || !record.handle) {
      throw createSessionClosedError(id);
    }

    try {
      record.handle.write(text);
    } catch (error) {
      this.table.fail(record, error);
      throw createInternalError(
        `Failed to write to session ${id}: ${error instanceof Error ? error.message : String(error)}`,
        { id }
      );
    }

    this.logger.debug({ id, inputLength: text.length }, 'Input sent');
  }

  async interactiveKill(id: string): Promise<KillResult> {
    const record = this.table.require(id, 'interactive');
    return this.terminate(record, 'SIGHUP');
  }

  listSessions(): SessionInfo[] {
    return this.table.list();
  }

  dispose(): void {
    this.table.dispose();
  }

  /**
   * Idempotent: a finished record reports its recorded exit code, and a
   * kill already in flight is shared.
   */
  private terminate(record: ProcessRecord, signal: NodeJS.Signals): Promise<KillResult> {
    if (record.status !== 'running') {
      return Promise.resolve({
        message: `Process ${record.id} already ${record.status}.`,
        exitCode: record.exitCode ?? UNKNOWN_EXIT_CODE,
      });
    }

    if (!record.killing) {
      record.killing = this.escalate(record, signal);
    }
    return record.killing;
  }

  private async escalate(record: ProcessRecord, signal: NodeJS.Signals): Promise<KillResult> {
    this.logger.info({ id: record.id, pid: record.pid, signal }, 'Terminating process');

    try {
      record.handle?.signal(signal);
    } catch (error) {
      this.table.fail(record, error);
      return {
        message: `Process ${record.id} could not be signalled and was marked killed.`,
        exitCode: record.exitCode ?? UNKNOWN_EXIT_CODE,
      };
    }

    let exitCode = await waitFor(record.exited, this.options.killGracePeriod);

    if (exitCode === undefined) {
      this.logger.warn({
        id: record.id,
        pid: record.pid,
        gracePeriod: this.options.killGracePeriod,
      }, 'Grace period expired, sending SIGKILL');

      try {
        record.handle?.signal('SIGKILL');
      } catch (error) {
        this.logger.error({ error, id: record.id }, 'SIGKILL failed');
      }
      exitCode = await waitFor(record.exited, FORCE_KILL_WAIT_MS);

      if (exitCode === undefined) {
        this.logger.warn({
          id: record.id,
          mode: record.mode,
          pid: record.pid,
        }, 'Process survived SIGKILL, releasing its handle without an exit status');
      }
    }

    this.table.settle(record, 'killed', exitCode ?? UNKNOWN_EXIT_CODE);

    return {
      message: `Process ${record.id} terminated.`,
      exitCode: record.exitCode ?? UNKNOWN_EXIT_CODE,
    };
  }
}
