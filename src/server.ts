import fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { serializerCompiler, validatorCompiler, type ZodTypeProvider } from 'fastify-type-provider-zod';
import { createApprovalHook, type ApprovalHook } from './security/approval.js';
import { CommandValidator } from './security/validator.js';
import { ExecutionEngine, engineOptionsFromConfig } from './tools/terminal/engine.js';
import { SessionTable } from './tools/terminal/session.js';
import type { Config } from './types/config.js';
import { AgentError, httpStatusFor } from './utils/errors.js';
import { createLogger, type Logger } from './utils/logger.js';
import { SERVER_VERSION } from './version.js';

export interface AgentDeps {
  logger?: Logger;
  approval?: ApprovalHook;
}

export interface Agent {
  engine: ExecutionEngine;
  logger: Logger;
}

/**
 * Wire logger, session table, command policy and approval hook into an engine
 */
export function createAgent(config: Config, deps: AgentDeps = {}): Agent {
  const logger = deps.logger ?? createLogger(config);
  const table = new SessionTable(logger, config.sessionTtl);
  const validator = new CommandValidator(config.blockedCommands, logger);
  const approval = deps.approval ?? createApprovalHook(config, logger);

  const engine = new ExecutionEngine(
    table,
    logger,
    engineOptionsFromConfig(config, { approval, validator })
  );

  logger.info({
    version: SERVER_VERSION,
    shell: config.shell,
    blockedCommands: validator.size,
    autoApprove: config.autoApprove,
    logLevel: config.logLevel,
  }, 'Agent initialized');

  return { engine, logger };
}

const CommandBody = z.object({
  command: z.string().trim().min(1).describe('Shell command line'),
  stdin: z.string().optional().describe('Text written to the process input, then closed'),
});

const IdParams = z.object({ id: z.string().min(1) });
const SessionParams = z.object({ session_id: z.string().min(1) });

const Offset = z.coerce.number().int().min(0).optional();

const ErrorBody = z.object({
  error: z.string(),
  message: z.string(),
});

const KillBody = z.object({
  message: z.string(),
  exit_code: z.number().int(),
});

const errorResponses = {
  400: ErrorBody,
  403: ErrorBody,
  404: ErrorBody,
  409: ErrorBody,
  500: ErrorBody,
};

/**
 * Build the HTTP control surface. Routes live under config.basePath.
 */
export function createHttpServer(engine: ExecutionEngine, config: Pick<Config, 'basePath'>, logger: Logger): FastifyInstance {
  const app = fastify({
    logger: false, // We use our own logger
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof AgentError) {
      logger.warn({ code: error.code, url: request.url, message: error.message }, 'Request failed');
      return reply.code(httpStatusFor(error.code)).send({ error: error.code, message: error.message });
    }

    if (error.validation) {
      return reply.code(400).send({ error: 'VALIDATION', message: error.message });
    }

    logger.error({ error, url: request.url }, 'Unexpected request failure');
    return reply.code(500).send({ error: 'INTERNAL', message: error.message });
  });

  app.register(async (scope) => {
    const typed = scope.withTypeProvider<ZodTypeProvider>();

    typed.post('/run', {
      schema: {
        body: CommandBody,
        response: {
          200: z.object({
            stdout: z.string(),
            stderr: z.string(),
            exit_code: z.number().int(),
          }),
          ...errorResponses,
        },
      },
    }, async (request) => {
      const { command, stdin } = request.body;
      const result = await engine.runBlocking(command, stdin || undefined);
      return { stdout: result.stdout, stderr: result.stderr, exit_code: result.exitCode };
    });

    typed.post('/start', {
      schema: {
        body: CommandBody,
        response: {
          200: z.object({ id: z.string() }),
          ...errorResponses,
        },
      },
    }, async (request) => {
      const { command, stdin } = request.body;
      return { id: await engine.startDetached(command, stdin || undefined) };
    });

    typed.get('/output/:id', {
      schema: {
        params: IdParams,
        querystring: z.object({
          stdout_offset: Offset,
          stderr_offset: Offset,
        }),
        response: {
          200: z.object({
            stdout: z.string(),
            stderr: z.string(),
            running: z.boolean(),
            exit_code: z.number().int().nullable(),
            stdout_offset: z.number().int(),
            stderr_offset: z.number().int(),
          }),
          ...errorResponses,
        },
      },
    }, async (request) => {
      const snapshot = engine.getOutput(request.params.id, {
        stdout: request.query.stdout_offset,
        stderr: request.query.stderr_offset,
      });
      return {
        stdout: snapshot.stdout,
        stderr: snapshot.stderr,
        running: snapshot.running,
        exit_code: snapshot.exitCode,
        stdout_offset: snapshot.stdoutOffset,
        stderr_offset: snapshot.stderrOffset,
      };
    });

    typed.post('/kill/:id', {
      schema: {
        params: IdParams,
        response: { 200: KillBody, ...errorResponses },
      },
    }, async (request) => {
      const result = await engine.kill(request.params.id);
      return { message: result.message, exit_code: result.exitCode };
    });

    typed.post('/interactive/start', {
      schema: {
        body: z.object({
          cmd: z.string().trim().min(1).optional().describe('Command to run on the PTY; defaults to an interactive shell'),
        }).default({}),
        response: {
          200: z.object({ session_id: z.string() }),
          ...errorResponses,
        },
      },
    }, async (request) => {
      return { session_id: await engine.interactiveStart(request.body.cmd) };
    });

    typed.get('/interactive/output/:session_id', {
      schema: {
        params: SessionParams,
        querystring: z.object({ offset: Offset }),
        response: {
          200: z.object({
            output: z.string(),
            running: z.boolean(),
            exit_code: z.number().int().nullable(),
            offset: z.number().int(),
          }),
          ...errorResponses,
        },
      },
    }, async (request) => {
      const snapshot = engine.interactiveOutput(request.params.session_id, request.query.offset);
      return {
        output: snapshot.output,
        running: snapshot.running,
        exit_code: snapshot.exitCode,
        offset: snapshot.offset,
      };
    });

    typed.post('/interactive/input/:session_id', {
      schema: {
        params: SessionParams,
        body: z.object({
          input: z.string().describe('Sent verbatim; include "\\n" to submit a line'),
        }),
        response: {
          200: z.object({ ack: z.literal(true) }),
          ...errorResponses,
        },
      },
    }, async (request) => {
      engine.interactiveInput(request.params.session_id, request.body.input);
      return { ack: true as const };
    });

    typed.post('/interactive/kill/:session_id', {
      schema: {
        params: SessionParams,
        response: {
          200: KillBody.extend({ ack: z.literal(true) }),
          ...errorResponses,
        },
      },
    }, async (request) => {
      const result = await engine.interactiveKill(request.params.session_id);
      return { ack: true as const, message: result.message, exit_code: result.exitCode };
    });

    typed.get('/sessions', {
      schema: {
        response: {
          200: z.object({
            count: z.number().int(),
            sessions: z.array(z.object({
              id: z.string(),
              mode: z.enum(['detached', 'interactive']),
              command: z.string(),
              pid: z.number().int().nullable(),
              status: z.enum(['running', 'exited', 'killed']),
              exit_code: z.number().int().nullable(),
              uptime: z.number(),
              buffered_chars: z.number().int(),
            })),
          }),
        },
      },
    }, async () => {
      const sessions = engine.listSessions();
      return {
        count: sessions.length,
        sessions: sessions.map(s => ({
          id: s.id,
          mode: s.mode,
          command: s.command,
          pid: s.pid ?? null,
          status: s.status,
          exit_code: s.exitCode,
          uptime: s.uptime,
          buffered_chars: s.bufferedChars,
        })),
      };
    });
  }, { prefix: config.basePath });

  return app;
}
