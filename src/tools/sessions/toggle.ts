import { z } from 'zod';
import type { SessionController } from '../../session/controller.js';
import type { ToggleOutcome, SessionInfo } from '../../types/session.js';
import { createValidationError, errorText, wrapError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import type { ToolResult } from '../../types/config.js';

export const ToggleSessionSchema = z.object({
  name: z.string().min(1).describe('Configured session name'),
});

export type ToggleSessionArgs = z.infer<typeof ToggleSessionSchema>;

function describeOutcome(outcome: ToggleOutcome, info: SessionInfo): string {
  switch (outcome) {
    case 'launched':
      return `Session "${info.name}" launched: ${info.launchSpec}`;
    case 'shown':
      return `Session "${info.name}" shown (existing process)`;
    case 'hidden':
      return `Session "${info.name}" hidden (process kept alive)`;
    case 'aborted':
      return `Session "${info.name}": nothing to launch`;
  }
}

export async function toggleSessionTool(
  args: unknown,
  controller: SessionController,
  logger: Logger
): Promise<ToolResult> {
  try {
    const parsed = ToggleSessionSchema.safeParse(args);
    if (!parsed.success) {
      throw createValidationError('Invalid toggle_session arguments', { issues: parsed.error.issues });
    }

    const { name } = parsed.data;
    const outcome = controller.toggle(name);
    const info = controller.sessionInfo(name);

    logger.info({
      tool: 'toggle_session',
      session: name,
      outcome,
      state: info.state,
    }, 'Session toggled');

    return {
      content: [{
        type: 'text',
        text: `${describeOutcome(outcome, info)}
State: ${info.state}`,
      }],
    };
  } catch (error) {
    const mcpError = wrapError(error, 'toggle_session');
    logger.error({ error: mcpError, args }, 'toggle_session failed');

    return {
      content: [{
        type: 'text',
        text: errorText(mcpError),
      }],
      isError: true,
    };
  }
}

export const toggleSessionToolDefinition = {
  name: 'toggle_session',
  description: 'Show or hide a configured terminal session. The first toggle launches the program; later toggles hide and re-show the same running process. Showing one session hides the others.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      name: { type: 'string', description: 'Configured session name' },
    },
    required: ['name'],
  },
};
