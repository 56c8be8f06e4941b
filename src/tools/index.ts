import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ExecutionEngine } from './terminal/engine.js';
import type { ToolResult } from '../types/config.js';
import { wrapError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

const CommandSchema = z.object({
  command: z.string().trim().min(1).describe('Shell command line'),
  stdin: z.string().optional().describe('Text written to the process input, then closed'),
});

const IdSchema = z.object({
  id: z.string().min(1).describe('Process id returned by start_command'),
});

const SessionSchema = z.object({
  session_id: z.string().min(1).describe('Session id returned by interactive_start'),
});

export const toolSchemas = {
  run_command: CommandSchema,
  start_command: CommandSchema,
  get_output: IdSchema,
  kill_command: IdSchema,
  interactive_start: z.object({
    cmd: z.string().trim().min(1).optional().describe('Command to run on the PTY; defaults to an interactive shell'),
  }),
  interactive_output: SessionSchema,
  interactive_input: SessionSchema.extend({
    input: z.string().describe('Sent verbatim; include "\\n" to submit a line'),
  }),
  interactive_kill: SessionSchema,
  list_sessions: z.object({}),
};

export type ToolName = keyof typeof toolSchemas;

const descriptions: Record<ToolName, string> = {
  run_command: 'Run a shell command to completion and return stdout, stderr and exit code.',
  start_command: 'Start a long-running shell command in the background. Returns an id for get_output and kill_command.',
  get_output: 'Read output produced by a background command since the last call, plus whether it is still running.',
  kill_command: 'Terminate a background command (and its children). Idempotent once the command has finished.',
  interactive_start: 'Open an interactive PTY session running a shell or the given command.',
  interactive_output: 'Read PTY output produced since the last call.',
  interactive_input: 'Send keystrokes to a PTY session verbatim. Add "\\n" to submit a line.',
  interactive_kill: 'Close a PTY session and terminate its process.',
  list_sessions: 'List tracked background and interactive sessions with their status.',
};

const ObjectJsonSchema = z.object({
  properties: z.record(z.unknown()).default({}),
  required: z.array(z.string()).optional(),
});

export function isToolName(name: string): name is ToolName {
  return Object.hasOwn(toolSchemas, name);
}

export function getToolDefinitions() {
  return Object.entries(toolSchemas).map(([name, schema]) => {
    const json = ObjectJsonSchema.parse(zodToJsonSchema(schema, { $refStrategy: 'none' }));
    return {
      name,
      description: isToolName(name) ? descriptions[name] : name,
      inputSchema: {
        type: 'object' as const,
        properties: json.properties,
        ...(json.required ? { required: json.required } : {}),
      },
    };
  });
}

async function dispatch(name: ToolName, args: unknown, engine: ExecutionEngine): Promise<unknown> {
  switch (name) {
    case 'run_command': {
      const { command, stdin } = toolSchemas.run_command.parse(args);
      const result = await engine.runBlocking(command, stdin || undefined);
      return { stdout: result.stdout, stderr: result.stderr, exit_code: result.exitCode };
    }

    case 'start_command': {
      const { command, stdin } = toolSchemas.start_command.parse(args);
      return { id: await engine.startDetached(command, stdin || undefined) };
    }

    case 'get_output': {
      const { id } = toolSchemas.get_output.parse(args);
      const snapshot = engine.getOutput(id);
      return {
        stdout: snapshot.stdout,
        stderr: snapshot.stderr,
        running: snapshot.running,
        exit_code: snapshot.exitCode,
      };
    }

    case 'kill_command': {
      const { id } = toolSchemas.kill_command.parse(args);
      const result = await engine.kill(id);
      return { message: result.message, exit_code: result.exitCode };
    }

    case 'interactive_start': {
      const { cmd } = toolSchemas.interactive_start.parse(args);
      return { session_id: await engine.interactiveStart(cmd) };
    }

    case 'interactive_output': {
      const { session_id } = toolSchemas.interactive_output.parse(args);
      const snapshot = engine.interactiveOutput(session_id);
      return { output: snapshot.output, running: snapshot.running, exit_code: snapshot.exitCode };
    }

    case 'interactive_input': {
      const { session_id, input } = toolSchemas.interactive_input.parse(args);
      engine.interactiveInput(session_id, input);
      return { ack: true };
    }

    case 'interactive_kill': {
      const { session_id } = toolSchemas.interactive_kill.parse(args);
      const result = await engine.interactiveKill(session_id);
      return { ack: true, message: result.message, exit_code: result.exitCode };
    }

    case 'list_sessions':
      return { sessions: engine.listSessions() };
  }
}

/**
 * Execute a tool call against the engine. Failures become error results, never throws.
 */
export async function callTool(
  name: string,
  args: unknown,
  engine: ExecutionEngine,
  logger: Logger
): Promise<ToolResult> {
  logger.info({ tool: name }, 'Tool called');

  try {
    if (!isToolName(name)) {
      throw new Error(`Unknown tool: ${name}`);
    }

    const result = await dispatch(name, args ?? {}, engine);

    return {
      content: [{
        type: 'text',
        text: JSON.stringify(result, null, 2),
      }],
    };
  } catch (error) {
    const mcpError = wrapError(error, `Tool ${name}`);
    logger.error({ error: mcpError, tool: name }, 'Tool execution failed');

    return {
      content: [{
        type: 'text',
        text: `Error: ${mcpError.message}`,
      }],
      isError: true,
    };
  }
}
