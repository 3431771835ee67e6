import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { SecurityValidator } from './security/validator.js';
import { loadConfig } from './security/config.js';
import { createLogger, type Logger } from './utils/logger.js';
import { wrapError } from './utils/errors.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';
import type { Config, ToolResult } from './types/config.js';

import type { InteractiveViewHost } from './host/adapter.js';
import { PtyViewHost } from './host/pty-host.js';
import { SessionRegistry } from './session/registry.js';
import { SessionController } from './session/controller.js';
import { ExitTranscriptStore } from './session/transcripts.js';
import { buildSessionConfigs } from './session/setup.js';

import { getResourceDefinitions, getResourceContent } from './resources/index.js';

// Meta tools
import { getConfigTool, getConfigToolDefinition } from './tools/meta/get-config.js';

// Session tools
import { toggleSessionTool, toggleSessionToolDefinition } from './tools/sessions/toggle.js';
import {
  listSessionsTool,
  listSessionsToolDefinition,
  readSessionOutputTool,
  readSessionOutputToolDefinition,
  sendSessionInputTool,
  sendSessionInputToolDefinition,
} from './tools/sessions/management.js';

export interface ServerOptions {
  /** Path of the JSON configuration file (ignored when `config` is given) */
  configPath?: string;
  config?: Config;
  /** View host to drive; a PtyViewHost is created when omitted */
  host?: InteractiveViewHost;
  logger?: Logger;
}

export function createServer(options: ServerOptions = {}) {
  const config = options.config ?? loadConfig(options.configPath);
  const logger = options.logger ?? createLogger(config);

  // FAIL FAST: a server without sessions has nothing to toggle
  if (config.sessions.length === 0) {
    logger.error('FATAL: no sessions configured');
    throw new Error('Invalid configuration: "sessions" is empty');
  }

  const validator = new SecurityValidator(config, logger);
  const transcripts = new ExitTranscriptStore();

  const registry = new SessionRegistry();
  registry.register(buildSessionConfigs(config.sessions, { validator, transcripts, logger }));

  const host = options.host ?? new PtyViewHost(logger, config.terminal);
  const controller = new SessionController(registry, host, logger);

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    logger.debug('ListTools requested');

    return {
      tools: [
        // Session tools
        toggleSessionToolDefinition,
        listSessionsToolDefinition,
        readSessionOutputToolDefinition,
        sendSessionInputToolDefinition,
        // Meta tools
        getConfigToolDefinition,
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    logger.info({ tool: name, args }, 'Tool called');

    try {
      let result: ToolResult;

      switch (name) {
        case 'toggle_session':
          result = await toggleSessionTool(args, controller, logger);
          break;

        case 'list_sessions':
          result = await listSessionsTool(controller, logger);
          break;

        case 'read_session_output':
          result = await readSessionOutputTool(args, controller, transcripts, logger);
          break;

        case 'send_session_input':
          result = await sendSessionInputTool(args, controller, host, logger);
          break;

        case 'get_config':
          result = await getConfigTool(config);
          break;

        default:
          throw new Error(`Unknown tool: ${name}`);
      }

      return result;
    } catch (error) {
      const mcpError = wrapError(error, `Tool ${name}`);
      logger.error({ error: mcpError, tool: name, args }, 'Tool execution failed');

      return {
        content: [{
          type: 'text' as const,
          text: `Error: ${mcpError.message}`,
        }],
        isError: true,
      };
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    logger.debug('ListResources requested');
    return {
      resources: getResourceDefinitions(),
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    logger.info({ uri }, 'ReadResource requested');

    const content = getResourceContent(uri, config, controller);
    if (!content) {
      throw new Error(`Resource not found: ${uri}`);
    }

    return {
      contents: [{
        uri,
        mimeType: content.mimeType,
        text: content.text,
      }],
    };
  });

  logger.info({
    sessions: registry.names(),
    logLevel: config.logLevel,
  }, 'Server initialized');

  const dispose = () => {
    controller.dispose();
    host.dispose();
  };

  return { server, logger, controller, host, transcripts, dispose };
}
