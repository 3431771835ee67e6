import { z } from 'zod';
import type { SessionController } from '../../session/controller.js';
import type { ExitTranscriptStore } from '../../session/transcripts.js';
import type { InteractiveViewHost } from '../../host/adapter.js';
import { createValidationError, errorText, wrapError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import type { ToolResult } from '../../types/config.js';

function failure(error: unknown, tool: string, logger: Logger, args?: unknown): ToolResult {
  const mcpError = wrapError(error, tool);
  logger.error({ error: mcpError, args }, `${tool} failed`);

  return {
    content: [{
      type: 'text',
      text: errorText(mcpError),
    }],
    isError: true,
  };
}

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown, tool: string): z.infer<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw createValidationError(`Invalid ${tool} arguments`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

// ============================================================================
// LIST_SESSIONS
// ============================================================================

export async function listSessionsTool(
  controller: SessionController,
  logger: Logger
): Promise<ToolResult> {
  try {
    const sessions = controller.list();

    if (sessions.length === 0) {
      return {
        content: [{
          type: 'text',
          text: 'No sessions configured',
        }],
      };
    }

    const sessionList = sessions.map(s => {
      const view = s.viewHandle === null ? '-' : String(s.viewHandle);
      return `[${s.name}] ${s.state}
  Command: ${s.launchSpec || '(none)'}
  View: ${view} | Tag: ${s.viewTag}${s.exited ? ' | last close: process exit' : ''}`;
    }).join('\n\n');

    logger.info({
      tool: 'list_sessions',
      count: sessions.length,
    }, 'Sessions listed');

    return {
      content: [{
        type: 'text',
        text: `Sessions (${sessions.length}):

${sessionList}`,
      }],
    };
  } catch (error) {
    return failure(error, 'list_sessions', logger);
  }
}

export const listSessionsToolDefinition = {
  name: 'list_sessions',
  description: 'List every configured terminal session with its state (idle, hidden or visible).',
  inputSchema: {
    type: 'object' as const,
    properties: {},
  },
};

// ============================================================================
// READ_SESSION_OUTPUT
// ============================================================================

export const ReadSessionOutputSchema = z.object({
  name: z.string().min(1).describe('Configured session name'),
  lines: z.number().int().positive().default(50).describe('Number of trailing lines to return'),
});

export type ReadSessionOutputArgs = z.infer<typeof ReadSessionOutputSchema>;

export async function readSessionOutputTool(
  args: unknown,
  controller: SessionController,
  transcripts: ExitTranscriptStore,
  logger: Logger
): Promise<ToolResult> {
  try {
    const { name, lines } = parseArgs(ReadSessionOutputSchema, args, 'read_session_output');

    const live = controller.readOutput(name);
    const transcript = live === null ? transcripts.get(name) : undefined;
    const all = live ?? transcript?.lines ?? null;

    if (all === null) {
      return {
        content: [{
          type: 'text',
          text: `Session "${name}" has no output yet`,
        }],
      };
    }

    const tail = all.slice(Math.max(0, all.length - lines));
    const header = transcript
      ? `Session "${name}" | exited at ${transcript.recordedAt.toISOString()}`
      : `Session "${name}" | State: ${controller.state(name)}`;

    logger.info({
      tool: 'read_session_output',
      session: name,
      returned: tail.length,
      fromTranscript: transcript !== undefined,
    }, 'Session output read');

    return {
      content: [{
        type: 'text',
        text: `${header}

${tail.join('\n') || '[No output]'}`,
      }],
    };
  } catch (error) {
    return failure(error, 'read_session_output', logger, args);
  }
}

export const readSessionOutputToolDefinition = {
  name: 'read_session_output',
  description: 'Read the last lines of a session\'s terminal. For a session whose program has exited, returns the output captured at exit.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      name: { type: 'string', description: 'Configured session name' },
      lines: { type: 'number', description: 'Number of trailing lines to return (default 50)' },
    },
    required: ['name'],
  },
};

// ============================================================================
// SEND_SESSION_INPUT
// ============================================================================

/** Where typed input goes: the view of the window holding input focus */
export type InputSink = Pick<InteractiveViewHost, 'focusedView' | 'writeInput'>;

export const SendSessionInputSchema = z.object({
  name: z.string().min(1).describe('Configured session name'),
  input: z.string().describe('Text to type into the terminal'),
  newline: z.boolean().default(true).describe('Append a newline after the input'),
});

export type SendSessionInputArgs = z.infer<typeof SendSessionInputSchema>;

export async function sendSessionInputTool(
  args: unknown,
  controller: SessionController,
  sink: InputSink,
  logger: Logger
): Promise<ToolResult> {
  try {
    const { name, input, newline } = parseArgs(SendSessionInputSchema, args, 'send_session_input');
    const info = controller.sessionInfo(name);

    if (info.state !== 'visible' || sink.focusedView !== info.viewHandle) {
      return {
        content: [{
          type: 'text',
          text: `Error: Session "${name}" is ${info.state}; toggle it visible before sending input`,
        }],
        isError: true,
      };
    }

    sink.writeInput(newline ? `${input}\r` : input);

    logger.info({
      tool: 'send_session_input',
      session: name,
      length: input.length,
    }, 'Input sent');

    return {
      content: [{
        type: 'text',
        text: `Sent ${input.length} characters to "${name}"`,
      }],
    };
  } catch (error) {
    return failure(error, 'send_session_input', logger, args);
  }
}

export const sendSessionInputToolDefinition = {
  name: 'send_session_input',
  description: 'Type text into the visible session\'s terminal. The session must be the visible one (toggle it first).',
  inputSchema: {
    type: 'object' as const,
    properties: {
      name: { type: 'string', description: 'Configured session name' },
      input: { type: 'string', description: 'Text to type into the terminal' },
      newline: { type: 'boolean', description: 'Append Enter after the input (default true)' },
    },
    required: ['name', 'input'],
  },
};
