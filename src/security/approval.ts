import { createInterface } from 'node:readline/promises';
import type { Config } from '../types/config.js';
import type { ExecMode } from '../types/session.js';
import type { Logger } from '../utils/logger.js';

/**
 * Pre-execution hook consulted before any process is spawned.
 */
export interface ApprovalHook {
  approve(command: string, mode: ExecMode): Promise<boolean>;
}

export type AskFn = (question: string) => Promise<string>;

/** Approves everything; used when confirmation is bypassed */
export const autoApprove: ApprovalHook = {
  approve: async () => true,
};

/**
 * Ask a question on the local terminal and return the raw answer.
 * Prompts go to stderr so stdout stays clean.
 */
export async function askOnTerminal(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });

  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

/**
 * Y/n confirmation by a local operator. An empty answer approves.
 * Concurrent requests are asked one at a time, in arrival order.
 */
export class ConfirmationPrompt implements ApprovalHook {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private ask: AskFn,
    private logger: Logger
  ) {}

  approve(command: string, mode: ExecMode): Promise<boolean> {
    const decision = this.queue.then(() => this.prompt(command, mode));
    // A failed prompt rejects `decision` for its caller only; the queue moves on
    this.queue = decision.then(
      () => undefined,
      () => undefined
    );
    return decision;
  }

  private async prompt(command: string, mode: ExecMode): Promise<boolean> {
    const answer = await this.ask(`\n[${mode}] ${command}\nExecute? (Y/n): `);
    const normalized = answer.trim().toLowerCase();
    const approved = normalized === '' || normalized === 'y' || normalized === 'yes';

    this.logger.info({ command, mode, approved }, 'Operator decision');
    return approved;
  }
}

export function createApprovalHook(
  config: Pick<Config, 'autoApprove'>,
  logger: Logger,
  ask: AskFn = askOnTerminal
): ApprovalHook {
  if (config.autoApprove) {
    logger.warn('Command confirmation bypassed: every command runs without approval');
    return autoApprove;
  }
  return new ConfirmationPrompt(ask, logger);
}
