import type { OutputBuffer } from '../tools/terminal/buffer.js';

export type ExecMode = 'blocking' | 'detached' | 'interactive';

export type SessionStatus = 'running' | 'exited' | 'killed';

/**
 * Live OS handle of a tracked process, plain child or PTY.
 */
export interface ProcessHandle {
  readonly pid: number | undefined;

  /** Write raw input to the process (stdin or PTY master) */
  write(data: string): void;

  /** Signal the process group, or the process alone where no group exists */
  signal(signal: NodeJS.Signals): void;

  /** Drop listeners and close the streams or descriptors held for the process */
  release(): void;
}

interface RecordBase {
  id: string;
  command: string;
  pid: number | undefined;
  status: SessionStatus;

  /** Set only once status leaves 'running' */
  exitCode: number | null;

  /** Non-null exactly while status is 'running' */
  handle: ProcessHandle | null;

  /** Resolves with the resolved exit code once the process is gone */
  exited: Promise<number>;

  /** In-flight kill, shared by concurrent kill requests */
  killing: Promise<KillResult> | null;

  createdAt: Date;
  endedAt: Date | null;
}

export interface DetachedRecord extends RecordBase {
  mode: 'detached';
  stdout: OutputBuffer;
  stderr: OutputBuffer;
}

/** A PTY multiplexes both streams, so interactive output is one buffer */
export interface InteractiveRecord extends RecordBase {
  mode: 'interactive';
  output: OutputBuffer;
}

export type ProcessRecord = DetachedRecord | InteractiveRecord;

export interface KillResult {
  message: string;
  exitCode: number;
}

export interface SessionInfo {
  id: string;
  mode: ProcessRecord['mode'];
  command: string;
  pid: number | undefined;
  status: SessionStatus;
  exitCode: number | null;
  uptime: number; // milliseconds
  bufferedChars: number;
}
