import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFileSync } from 'node:fs';
import { ExecutionEngine, type EngineOptions } from '../../src/tools/terminal/engine.js';
import { SessionTable } from '../../src/tools/terminal/session.js';
import { CommandValidator } from '../../src/security/validator.js';
import { AgentError } from '../../src/utils/errors.js';
import { FakePty, lastFakePty } from '../helpers/fake-pty.js';
import { flush, silentLogger, waitForExit, waitUntil } from '../helpers/wait.js';

vi.mock('node-pty', async () => (await import('../helpers/fake-pty.js')).createFakePtyModule());

const logger = silentLogger();

const baseOptions: EngineOptions = {
  shell: '/bin/sh',
  interactiveShell: '/bin/sh',
  killGracePeriod: 1000,
  maxBufferSize: 1_000_000,
  pty: { cols: 80, rows: 24 },
};

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch {
    return false;
  }
  // Zombies answer signal 0 until their parent reaps them
  try {
    return !/^\d+ \(.*\) Z/.test(readFileSync(`/proc/${pid}/stat`, 'utf8'));
  } catch {
    return true;
  }
}

async function codeOf(action: () => unknown): Promise<string | undefined> {
  try {
    await action();
  } catch (error) {
    return error instanceof AgentError ? error.code : undefined;
  }
  return undefined;
}

describe('ExecutionEngine', () => {
  let engine: ExecutionEngine;

  function createEngine(overrides: Partial<EngineOptions> = {}): ExecutionEngine {
    engine.dispose();
    engine = new ExecutionEngine(new SessionTable(logger), logger, { ...baseOptions, ...overrides });
    return engine;
  }

  beforeEach(() => {
    FakePty.instances = [];
    engine = new ExecutionEngine(new SessionTable(logger), logger, baseOptions);
  });

  afterEach(() => {
    engine.dispose();
  });

  describe('runBlocking', () => {
    it('should return the full output once the command exits', async () => {
      const result = await engine.runBlocking('echo hello; echo warn 1>&2');

      expect(result).toEqual({ stdout: 'hello\n', stderr: 'warn\n', exitCode: 0 });
      expect(engine.listSessions()).toEqual([]);
    });

    it('should pass stdin through', async () => {
      const result = await engine.runBlocking('tr a-z A-Z', 'shout\n');
      expect(result.stdout).toBe('SHOUT\n');
    });
  });

  describe('detached processes', () => {
    it('should report running with no output, then the output and exit code', async () => {
      const id = await engine.startDetached('sleep 0.3 && echo done');

      expect(engine.getOutput(id)).toEqual({
        stdout: '',
        stderr: '',
        running: true,
        exitCode: null,
        stdoutOffset: 0,
        stderrOffset: 0,
      });

      await waitForExit(engine, id);

      expect(engine.getOutput(id)).toEqual({
        stdout: 'done\n',
        stderr: '',
        running: false,
        exitCode: 0,
        stdoutOffset: 5,
        stderrOffset: 0,
      });
    });

    it('should return only new output on each poll', async () => {
      const id = await engine.startDetached('echo one; echo two 1>&2; exit 5');
      await waitForExit(engine, id);

      const first = engine.getOutput(id);
      expect(first.stdout).toBe('one\n');
      expect(first.stderr).toBe('two\n');
      expect(first.exitCode).toBe(5);

      const second = engine.getOutput(id);
      expect(second.stdout).toBe('');
      expect(second.stderr).toBe('');
      expect(second.running).toBe(false);
    });

    it('should read from an explicit cursor without consuming output', async () => {
      const id = await engine.startDetached('printf abc');
      await waitForExit(engine, id);

      const peek = engine.getOutput(id, { stdout: 1 });
      expect(peek.stdout).toBe('bc');
      expect(peek.stdoutOffset).toBe(3);

      expect(engine.getOutput(id).stdout).toBe('abc');
    });

    it('should feed stdin to a detached command', async () => {
      const id = await engine.startDetached('cat', 'piped\n');
      await waitForExit(engine, id);

      expect(engine.getOutput(id).stdout).toBe('piped\n');
    });

    it('should finish when the shell exits even if a background child holds the pipes', async () => {
      const id = await engine.startDetached('sleep 3 & echo hi');
      const started = Date.now();

      await waitForExit(engine, id, 2000);

      expect(Date.now() - started).toBeLessThan(2000);
      expect(engine.getOutput(id)).toMatchObject({ stdout: 'hi\n', running: false, exitCode: 0 });

      const pid = engine.listSessions()[0].pid;
      if (pid !== undefined) {
        process.kill(-pid, 'SIGKILL');
      }
    });

    it('should give concurrent starts distinct ids and separate buffers', async () => {
      const ids = await Promise.all([1, 2, 3, 4].map(n => engine.startDetached(`echo ${n}`)));

      expect(new Set(ids).size).toBe(4);

      for (const [index, id] of ids.entries()) {
        await waitForExit(engine, id);
        expect(engine.getOutput(id).stdout).toBe(`${index + 1}\n`);
      }
    });
  });

  describe('kill', () => {
    it('should terminate a running process with SIGTERM', async () => {
      const id = await engine.startDetached('sleep 10');

      const result = await engine.kill(id);

      expect(result).toEqual({ message: `Process ${id} terminated.`, exitCode: 143 });
      expect(engine.listSessions()[0]).toMatchObject({ id, status: 'killed', exitCode: 143 });
      expect(engine.getOutput(id).running).toBe(false);
    });

    it('should terminate the children of the command too', async () => {
      const id = await engine.startDetached('sleep 31 & echo $!; wait');
      await waitUntil(() => /^\d+\n$/.test(engine.getOutput(id, { stdout: 0 }).stdout));
      const childPid = Number(engine.getOutput(id).stdout.trim());
      expect(isAlive(childPid)).toBe(true);

      const result = await engine.kill(id);

      expect(result.exitCode).toBe(143);
      await waitUntil(() => !isAlive(childPid), 2000);
    });

    it('should report the recorded exit code for a finished process', async () => {
      const id = await engine.startDetached('exit 4');
      await waitForExit(engine, id);

      await expect(engine.kill(id)).resolves.toEqual({
        message: `Process ${id} already exited.`,
        exitCode: 4,
      });
    });

    it('should escalate to SIGKILL after the grace period', async () => {
      createEngine({ killGracePeriod: 200 });
      const id = await engine.startDetached("trap '' TERM; echo ready; sleep 5");
      await waitUntil(() => engine.getOutput(id, { stdout: 0 }).stdout === 'ready\n');

      const result = await engine.kill(id);

      expect(result.exitCode).toBe(137);
      expect(engine.listSessions()[0].status).toBe('killed');
    });

    it('should share one termination between concurrent kills', async () => {
      const id = await engine.startDetached('sleep 10');

      const [first, second] = await Promise.all([engine.kill(id), engine.kill(id)]);

      expect(first).toBe(second);
      expect(first.exitCode).toBe(143);
    });
  });

  describe('unknown ids', () => {
    it('should fail every operation with NOT_FOUND', async () => {
      const id = 'no-such-session';

      expect(await codeOf(() => engine.getOutput(id))).toBe('NOT_FOUND');
      expect(await codeOf(() => engine.kill(id))).toBe('NOT_FOUND');
      expect(await codeOf(() => engine.interactiveOutput(id))).toBe('NOT_FOUND');
      expect(await codeOf(() => engine.interactiveInput(id, 'ls\n'))).toBe('NOT_FOUND');
      expect(await codeOf(() => engine.interactiveKill(id))).toBe('NOT_FOUND');
    });

    it('should not serve a record through the other mode', async () => {
      const detached = await engine.startDetached('sleep 10');
      const interactive = await engine.interactiveStart();

      expect(await codeOf(() => engine.interactiveOutput(detached))).toBe('NOT_FOUND');
      expect(await codeOf(() => engine.interactiveKill(detached))).toBe('NOT_FOUND');
      expect(await codeOf(() => engine.getOutput(interactive))).toBe('NOT_FOUND');
    });
  });

  describe('authorization', () => {
    it('should spawn nothing when the operator declines', async () => {
      const approve = vi.fn(async () => false);
      createEngine({ approval: { approve } });

      expect(await codeOf(() => engine.runBlocking('echo hi'))).toBe('COMMAND_REJECTED');
      expect(await codeOf(() => engine.startDetached('sleep 1'))).toBe('COMMAND_REJECTED');
      expect(await codeOf(() => engine.interactiveStart('top'))).toBe('COMMAND_REJECTED');

      expect(approve).toHaveBeenNthCalledWith(1, 'echo hi', 'blocking');
      expect(approve).toHaveBeenNthCalledWith(2, 'sleep 1', 'detached');
      expect(approve).toHaveBeenNthCalledWith(3, 'top', 'interactive');
      expect(engine.listSessions()).toEqual([]);
      expect(FakePty.instances).toHaveLength(0);
    });

    it('should reject blocked commands before asking for approval', async () => {
      const approve = vi.fn(async () => true);
      createEngine({
        approval: { approve },
        validator: new CommandValidator(['shutdown'], logger),
      });

      await expect(engine.startDetached('echo bye; shutdown')).rejects.toThrow(
        'Blocked command detected in: shutdown'
      );
      expect(approve).not.toHaveBeenCalled();
    });
  });

  describe('interactive sessions', () => {
    it('should start the shell on a PTY and echo input', async () => {
      const id = await engine.interactiveStart();
      const pty = lastFakePty();

      expect(pty.file).toBe('/bin/sh');
      expect(pty.args).toEqual([]);
      expect(pty.options).toMatchObject({ cols: 80, rows: 24, name: 'xterm-256color' });

      engine.interactiveInput(id, 'echo hi\n');

      expect(pty.written).toEqual(['echo hi\n']);
      expect(engine.interactiveOutput(id)).toEqual({
        output: 'echo hi\r\nhi\r\n$ ',
        running: true,
        exitCode: null,
        offset: 15,
      });
      expect(engine.interactiveOutput(id).output).toBe('');
    });

    it('should run a given command through the shell', async () => {
      await engine.interactiveStart('top');

      expect(lastFakePty().args).toEqual(['-c', 'top']);
      expect(engine.listSessions()[0]).toMatchObject({ mode: 'interactive', command: 'top' });
    });

    it('should hang up the session and refuse further input', async () => {
      const id = await engine.interactiveStart();

      const result = await engine.interactiveKill(id);

      expect(result).toEqual({ message: `Process ${id} terminated.`, exitCode: 129 });
      expect(lastFakePty().signals).toEqual(['SIGHUP']);
      expect(engine.interactiveOutput(id)).toMatchObject({ running: false, exitCode: 129 });
      expect(await codeOf(() => engine.interactiveInput(id, 'echo late\n'))).toBe('SESSION_CLOSED');
    });

    it('should accept the generic kill for interactive sessions', async () => {
      const id = await engine.interactiveStart();

      await expect(engine.kill(id)).resolves.toEqual({
        message: `Process ${id} terminated.`,
        exitCode: 129,
      });
    });

    it('should force-kill a session that ignores the hangup', async () => {
      createEngine({ killGracePeriod: 50 });
      const id = await engine.interactiveStart();
      lastFakePty().ignoreSignals = true;

      const result = await engine.interactiveKill(id);

      expect(result.exitCode).toBe(137);
      expect(lastFakePty().signals).toEqual(['SIGHUP', 'SIGKILL']);
    });

    it('should give up on a session that survives SIGKILL', async () => {
      const watched = silentLogger();
      const warn = vi.spyOn(watched, 'warn');
      engine.dispose();
      engine = new ExecutionEngine(new SessionTable(watched), watched, { ...baseOptions, killGracePeriod: 50 });
      const id = await engine.interactiveStart();
      lastFakePty().hung = true;

      const result = await engine.interactiveKill(id);

      expect(result).toEqual({ message: `Process ${id} terminated.`, exitCode: -1 });
      expect(engine.listSessions()[0]).toMatchObject({ status: 'killed', exitCode: -1 });
      expect(warn).toHaveBeenCalledWith(
        { id, mode: 'interactive', pid: lastFakePty().pid },
        'Process survived SIGKILL, releasing its handle without an exit status'
      );
    });

    it('should record a natural exit as exited', async () => {
      const id = await engine.interactiveStart();

      engine.interactiveInput(id, 'exit\n');
      await flush();

      expect(engine.interactiveOutput(id)).toMatchObject({ running: false, exitCode: 0 });
      expect(engine.listSessions()[0].status).toBe('exited');
      await expect(engine.interactiveKill(id)).resolves.toEqual({
        message: `Process ${id} already exited.`,
        exitCode: 0,
      });
    });

    it('should read from an explicit offset', async () => {
      const id = await engine.interactiveStart();
      lastFakePty().emitData('abcdef');

      expect(engine.interactiveOutput(id, 4)).toMatchObject({ output: 'ef', offset: 6 });
      expect(engine.interactiveOutput(id).output).toBe('abcdef');
    });
  });
});
