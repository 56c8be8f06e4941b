import { randomUUID } from 'node:crypto';
import { spawn as spawnPty } from 'node-pty';
import type { IDisposable, IPty } from 'node-pty';
import { OutputBuffer } from './buffer.js';
import { resolveExitCode, signalProcessTree } from './process.js';
import type { SessionTable } from './session.js';
import type { InteractiveRecord, ProcessHandle } from '../../types/session.js';
import { createExecError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

export interface PtyOptions {
  /** Shell started when no command is given, and used to run a given one */
  shell: string;
  cwd?: string;
  cols: number;
  rows: number;
  maxBufferSize: number;
}

export function defaultInteractiveShell(): string {
  return process.env.SHELL || '/bin/sh';
}

function inheritEnv(): Record<string, string> {
  return Object.fromEntries(
    Object.entries(process.env).filter(
      (entry): entry is [string, string] => typeof entry[1] === 'string'
    )
  );
}

function ptyHandle(pty: IPty, disposables: IDisposable[]): ProcessHandle {
  return {
    pid: pty.pid,
    write: (data) => pty.write(data),
    // The PTY child is a session leader, so its pid is also its group id
    signal: (signal) => signalProcessTree(pty.pid, signal, () => pty.kill(signal)),
    release: () => {
      for (const disposable of disposables.splice(0)) {
        disposable.dispose();
      }
    },
  };
}

/**
 * Allocate a PTY, run `command` (or the bare shell) on it and register the session.
 */
export function startInteractive(
  command: string | undefined,
  options: PtyOptions,
  table: SessionTable,
  logger: Logger
): InteractiveRecord {
  const args = command ? ['-c', command] : [];
  const cwd = options.cwd || process.env.HOME || process.cwd();

  let pty: IPty;
  try {
    pty = spawnPty(options.shell, args, {
      name: 'xterm-256color',
      cols: options.cols,
      rows: options.rows,
      cwd,
      env: inheritEnv(),
    });
  } catch (error) {
    logger.error({ error, command, shell: options.shell, cwd }, 'Failed to allocate PTY session');
    throw createExecError(command ?? options.shell, error);
  }

  const disposables: IDisposable[] = [];

  const record: InteractiveRecord = {
    id: randomUUID(),
    mode: 'interactive',
    command: command ?? options.shell,
    pid: pty.pid,
    status: 'running',
    exitCode: null,
    handle: ptyHandle(pty, disposables),
    exited: new Promise<number>((resolve) => {
      disposables.push(pty.onExit(({ exitCode, signal }) => {
        resolve(signal ? resolveExitCode(null, signal) : exitCode);
      }));
    }),
    killing: null,
    createdAt: new Date(),
    endedAt: null,
    output: new OutputBuffer(options.maxBufferSize),
  };

  disposables.push(pty.onData((data) => {
    record.output.append(data);
    logger.debug({ id: record.id, stream: 'pty', chunk: data }, 'output');
  }));

  table.insert(record);

  record.exited.then(
    (exitCode) => table.settle(record, record.killing ? 'killed' : 'exited', exitCode),
    (error: unknown) => table.fail(record, error)
  );

  logger.info({
    id: record.id,
    mode: record.mode,
    pid: record.pid,
    command: record.command,
    cwd,
  }, 'Session created');

  return record;
}
