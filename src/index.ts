#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Command, InvalidArgumentError } from 'commander';
import { createMcpServer } from './mcp.js';
import { applyOverrides, loadConfig } from './security/config.js';
import { createAgent, createHttpServer } from './server.js';
import type { Config } from './types/config.js';
import { SERVER_VERSION } from './version.js';

type CliOptions = {
  config?: string;
  port?: number;
  host?: string;
  yes?: boolean;
  stdio?: boolean;
  logLevel?: Config['logLevel'];
};

const LOG_LEVELS: ReadonlyArray<Config['logLevel']> = ['debug', 'info', 'warn', 'error'];

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

function parseLogLevel(value: string): Config['logLevel'] {
  const level = LOG_LEVELS.find(candidate => candidate === value);
  if (!level) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(', ')}.`);
  }
  return level;
}

async function main() {
  const program = new Command()
    .name('shell-agent')
    .description('Execute shell commands on this machine on behalf of a remote controller')
    .version(SERVER_VERSION)
    .option('-c, --config <path>', 'config file (default: ./shell-agent.json or $SHELL_AGENT_CONFIG)')
    .option('-p, --port <port>', 'HTTP port', parsePort)
    .option('-H, --host <host>', 'HTTP bind address')
    .option('-y, --yes', 'run commands without asking for confirmation')
    .option('--stdio', 'serve MCP over stdio instead of HTTP')
    .option('--log-level <level>', 'debug | info | warn | error', parseLogLevel)
    .parse();

  const options = program.opts<CliOptions>();

  const config = applyOverrides(loadConfig(options.config), {
    port: options.port,
    host: options.host,
    logLevel: options.logLevel,
    autoApprove: options.yes ? true : undefined,
  });

  if (options.stdio && !config.autoApprove) {
    throw new Error('--stdio needs --yes (or autoApprove): the confirmation prompt cannot share stdin with the protocol');
  }

  const { engine, logger } = createAgent(config);

  let close: () => Promise<void>;

  if (options.stdio) {
    const server = createMcpServer(engine, logger);
    await server.connect(new StdioServerTransport());
    logger.info('Shell agent serving MCP on stdio');
    close = () => server.close();
  } else {
    const app = createHttpServer(engine, config, logger);
    const address = await app.listen({ port: config.port, host: config.host });
    logger.info({ address, basePath: config.basePath }, 'Shell agent listening');
    close = () => app.close();
  }

  // Handle graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down agent...');

    engine.dispose();
    await close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
