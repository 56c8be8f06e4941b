import { spawn, type ChildProcess } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { constants } from 'node:os';
import type { Readable } from 'node:stream';
import { OutputBuffer, renderDelta } from './buffer.js';
import { UNKNOWN_EXIT_CODE, type SessionTable } from './session.js';
import type { DetachedRecord, ProcessHandle } from '../../types/session.js';
import {
  createExecError,
  createInternalError,
  isErrnoException,
} from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

export interface ExecOptions {
  /** Shell used as `<shell> -c <command>` */
  shell: string;
  cwd?: string;
  /** Per-stream cap for tracked records; blocking runs keep all output */
  maxBufferSize: number;
}

export interface BlockingResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** How long output may keep arriving after the shell exited before the record settles */
export const EXIT_DRAIN_MS = 100;

const SIGNAL_NUMBERS = new Map<string, number>(
  Object.entries(constants.signals).filter(
    (entry): entry is [string, number] => typeof entry[1] === 'number'
  )
);

/**
 * Collapse an exit status into one number: the exit code when the OS reports one,
 * 128 + signal number for signal deaths, -1 when neither is known.
 */
export function resolveExitCode(
  code: number | null | undefined,
  signal: NodeJS.Signals | number | null | undefined
): number {
  if (typeof code === 'number') return code;
  if (typeof signal === 'number' && signal > 0) return 128 + signal;
  if (typeof signal === 'string') {
    const signalNumber = SIGNAL_NUMBERS.get(signal);
    if (signalNumber !== undefined) return 128 + signalNumber;
  }
  return UNKNOWN_EXIT_CODE;
}

/**
 * Signal a whole process group (the pid leads it), falling back to the
 * process alone when the group is gone or groups are unsupported.
 */
export function signalProcessTree(
  pid: number | undefined,
  signal: NodeJS.Signals,
  fallback: () => void
): void {
  if (pid === undefined || process.platform === 'win32') {
    fallback();
    return;
  }

  try {
    process.kill(-pid, signal);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ESRCH' || error.code === 'EPERM')) {
      fallback();
      return;
    }
    throw error;
  }
}

/**
 * Resolve with the promise's value, or undefined once `ms` elapse first
 */
export async function waitFor<T>(promise: Promise<T>, ms: number): Promise<T | undefined> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      child.off('spawn', onSpawn);
      reject(error);
    };
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    child.once('error', onError);
    child.once('spawn', onSpawn);
  });
}

function spawnShell(command: string, withStdin: boolean, options: ExecOptions, ownGroup: boolean): ChildProcess {
  return spawn(command, {
    shell: options.shell,
    cwd: options.cwd,
    env: process.env,
    stdio: [withStdin ? 'pipe' : 'ignore', 'pipe', 'pipe'],
    // New process group on POSIX so kill reaches the command's children
    detached: ownGroup && process.platform !== 'win32',
  });
}

function requireStreams(child: ChildProcess): { stdout: Readable; stderr: Readable } {
  if (!child.stdout || !child.stderr) {
    throw createInternalError('Spawned process has no output pipes', { pid: child.pid });
  }
  return { stdout: child.stdout, stderr: child.stderr };
}

function writeStdin(child: ChildProcess, stdin: string | undefined, logger: Logger): void {
  if (!stdin || !child.stdin) return;

  // EPIPE when the process exits without reading its input
  child.stdin.on('error', (error) => {
    logger.debug({ pid: child.pid, error: error.message }, 'stdin closed early');
  });
  child.stdin.end(stdin);
}

function drain(
  stream: Readable,
  buffer: OutputBuffer,
  onChunk: (chunk: string) => void
): void {
  stream.setEncoding('utf8');
  stream.on('data', (chunk: string) => {
    buffer.append(chunk);
    onChunk(chunk);
  });
}

/**
 * Run a command to completion and capture both streams.
 * No timeout: the wait lasts as long as the process does.
 */
export async function runCommand(
  command: string,
  stdin: string | undefined,
  options: ExecOptions,
  logger: Logger
): Promise<BlockingResult> {
  const child = spawnShell(command, Boolean(stdin), options, false);

  try {
    await waitForSpawn(child);
  } catch (error) {
    logger.error({ command, error }, 'Failed to spawn command');
    throw createExecError(command, error);
  }

  const { stdout, stderr } = requireStreams(child);
  // Blocking runs return everything in one response; only tracked records are bounded
  const stdoutBuffer = new OutputBuffer(Number.POSITIVE_INFINITY);
  const stderrBuffer = new OutputBuffer(Number.POSITIVE_INFINITY);

  const closed = new Promise<number>((resolve, reject) => {
    child.once('close', (code, signal) => resolve(resolveExitCode(code, signal)));
    child.on('error', reject);
    stdout.on('error', reject);
    stderr.on('error', reject);
  });

  drain(stdout, stdoutBuffer, (chunk) => logger.debug({ pid: child.pid, stream: 'stdout', chunk }, 'output'));
  drain(stderr, stderrBuffer, (chunk) => logger.debug({ pid: child.pid, stream: 'stderr', chunk }, 'output'));
  writeStdin(child, stdin, logger);

  let exitCode: number;
  try {
    exitCode = await closed;
  } catch (error) {
    child.kill('SIGKILL');
    throw createInternalError(
      `Lost output of "${command}": ${error instanceof Error ? error.message : String(error)}`,
      { pid: child.pid }
    );
  }

  logger.info({ mode: 'blocking', pid: child.pid, command, exitCode }, 'Command finished');

  return {
    stdout: renderDelta(stdoutBuffer.drain()),
    stderr: renderDelta(stderrBuffer.drain()),
    exitCode,
  };
}

function childHandle(child: ChildProcess): ProcessHandle {
  return {
    pid: child.pid,
    write: (data) => {
      if (!child.stdin || child.stdin.writableEnded) {
        throw createInternalError('stdin of this process is not open', { pid: child.pid });
      }
      child.stdin.write(data);
    },
    signal: (signal) => signalProcessTree(child.pid, signal, () => {
      child.kill(signal);
    }),
    release: () => {
      child.stdin?.destroy();
      child.stdout?.destroy();
      child.stderr?.destroy();
    },
  };
}

/**
 * Spawn a command in the background and register it in the table.
 * Output is drained into the record's buffers until the streams close.
 */
export async function startDetached(
  command: string,
  stdin: string | undefined,
  options: ExecOptions,
  table: SessionTable,
  logger: Logger
): Promise<DetachedRecord> {
  const child = spawnShell(command, Boolean(stdin), options, true);

  try {
    await waitForSpawn(child);
  } catch (error) {
    logger.error({ command, error }, 'Failed to spawn detached command');
    throw createExecError(command, error);
  }

  const streams = requireStreams(child);

  const record: DetachedRecord = {
    id: randomUUID(),
    mode: 'detached',
    command,
    pid: child.pid,
    status: 'running',
    exitCode: null,
    handle: childHandle(child),
    // 'close' waits for both pipes, which a backgrounded grandchild can hold open
    exited: new Promise<number>((resolve) => {
      child.once('close', (code, signal) => resolve(resolveExitCode(code, signal)));
      child.once('exit', (code, signal) => {
        setTimeout(() => resolve(resolveExitCode(code, signal)), EXIT_DRAIN_MS).unref();
      });
    }),
    killing: null,
    createdAt: new Date(),
    endedAt: null,
    stdout: new OutputBuffer(options.maxBufferSize),
    stderr: new OutputBuffer(options.maxBufferSize),
  };

  table.insert(record);

  drain(streams.stdout, record.stdout, (chunk) => {
    logger.debug({ id: record.id, stream: 'stdout', chunk }, 'output');
  });
  drain(streams.stderr, record.stderr, (chunk) => {
    logger.debug({ id: record.id, stream: 'stderr', chunk }, 'output');
  });

  const onFault = (error: unknown) => table.fail(record, error);
  child.on('error', onFault);
  streams.stdout.on('error', onFault);
  streams.stderr.on('error', onFault);

  record.exited.then(
    (exitCode) => table.settle(record, record.killing ? 'killed' : 'exited', exitCode),
    onFault
  );

  writeStdin(child, stdin, logger);

  logger.info({ id: record.id, mode: record.mode, pid: record.pid, command }, 'Process started');

  return record;
}
