import { z } from 'zod';

export const ConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(8000),
  basePath: z.string().default(''), // e.g. '/gpt-shell'
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  shell: z.string().default('/bin/sh'),
  interactiveShell: z.string().optional(),
  cwd: z.string().optional(),
  killGracePeriod: z.number().int().positive().default(3000),
  maxBufferSize: z.number().int().positive().default(1_000_000), // characters per buffer
  sessionTtl: z.number().positive().default(30 * 60 * 1000), // 30 min
  blockedCommands: z.array(z.string()).default([]),
  autoApprove: z.boolean().default(false),
  pty: z.object({
    cols: z.number().int().positive().default(120),
    rows: z.number().int().positive().default(30),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// Content types for MCP tool results
const TextContentSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const ToolResultSchema = z.object({
  content: z.array(TextContentSchema),
  isError: z.boolean().optional(),
});

export type ToolResult = z.infer<typeof ToolResultSchema>;
