import type { Logger } from 'pino';

export type CommandValidation =
  | { valid: true }
  | { valid: false; error: string };

export class CommandValidator {
  private blockedCommands: Set<string>;

  constructor(
    blockedCommands: string[],
    private logger: Logger
  ) {
    this.blockedCommands = new Set(blockedCommands.map(cmd => cmd.trim().toLowerCase()));
  }

  /**
   * Check a command against the blocked list.
   * Matches the whole command and every part separated by pipes or command separators.
   */
  validateCommand(command: string): CommandValidation {
    const normalizedCmd = command.trim().toLowerCase();

    if (this.blockedCommands.has(normalizedCmd)) {
      this.logger.warn({ command }, 'Blocked command rejected');
      return {
        valid: false,
        error: `Command blocked: ${command}`,
      };
    }

    // Check command parts (for complex commands with pipes, etc)
    const parts = normalizedCmd.split(/[|;&]/).map(p => p.trim());
    for (const part of parts) {
      if (this.blockedCommands.has(part)) {
        this.logger.warn({ command, part }, 'Blocked command rejected');
        return {
          valid: false,
          error: `Blocked command detected in: ${part}`,
        };
      }
    }

    return { valid: true };
  }

  get size(): number {
    return this.blockedCommands.size;
  }
}
