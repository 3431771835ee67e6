import { z } from 'zod';

export const SessionEntrySchema = z.object({
  name: z.string().min(1).regex(/^[\w.-]+$/, 'Session names may only contain letters, digits, _, . and -'),
  launchSpec: z.string(),
  viewTag: z.string().min(1).optional(),
  cwd: z.string().optional(),
  recordExitOutput: z.boolean().default(true),
});

export type SessionEntry = z.infer<typeof SessionEntrySchema>;

export const TerminalOptionsSchema = z.object({
  cols: z.number().int().positive().default(120),
  rows: z.number().int().positive().default(30),
  scrollback: z.number().int().positive().default(5000),
});

export type TerminalOptions = z.infer<typeof TerminalOptionsSchema>;

export const ConfigSchema = z.object({
  allowedDirectories: z.array(z.string()).default([]),
  blockedCommands: z.array(z.string()).default([]),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  terminal: TerminalOptionsSchema.default({}),
  sessions: z.array(SessionEntrySchema).default([]),
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
