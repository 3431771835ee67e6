import type { Config, ToolResult } from '../../types/config.js';
import { defaultViewTag } from '../../session/setup.js';
import { SERVER_VERSION } from '../../version.js';

export const getConfigToolDefinition = {
  name: 'get_config',
  description: 'Get the server configuration as JSON (read-only): configured sessions, terminal size, blocked commands and directory restrictions.',
  inputSchema: {
    type: 'object' as const,
    properties: {},
  },
};

/**
 * Configuration as the server resolved it, with default view tags filled in
 */
export function describeConfig(config: Config) {
  return {
    sessions: config.sessions.map(s => ({
      name: s.name,
      launchSpec: s.launchSpec,
      viewTag: s.viewTag ?? defaultViewTag(s.name),
      cwd: s.cwd ?? null,
      recordExitOutput: s.recordExitOutput,
    })),
    terminal: config.terminal,
    allowedDirectories: config.allowedDirectories,
    blockedCommands: config.blockedCommands,
    logLevel: config.logLevel,
  };
}

export async function getConfigTool(config: Config): Promise<ToolResult> {
  const configData = {
    ...describeConfig(config),
    version: SERVER_VERSION,
    platform: process.platform,
    nodeVersion: process.version,
    restrictedDirectories: config.allowedDirectories.length > 0,
  };

  return {
    content: [
      {
        type: 'text',
        text:
          '=== permterm Configuration ===\n\n' +
          JSON.stringify(configData, null, 2) +
          '\n\nConfiguration is read-only. To modify, update the config file and restart the server.',
      },
    ],
  };
}
