import type { Config } from '../types/config.js';
import type { SessionController } from '../session/controller.js';
import { describeConfig } from '../tools/meta/get-config.js';

/**
 * MCP Resources - Expose server state and configuration
 */

export const CONFIG_RESOURCE_URI = 'config://permterm/server';
export const SESSIONS_RESOURCE_URI = 'state://permterm/sessions';

export interface ResourceDefinition {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export function getResourceDefinitions(): ResourceDefinition[] {
  return [
    {
      uri: CONFIG_RESOURCE_URI,
      name: 'Server Configuration',
      description: 'Configured sessions and terminal settings',
      mimeType: 'application/json',
    },
    {
      uri: SESSIONS_RESOURCE_URI,
      name: 'Sessions',
      description: 'State of every configured terminal session',
      mimeType: 'application/json',
    },
  ];
}

export function getResourceContent(
  uri: string,
  config: Config,
  controller: SessionController
): { mimeType: string; text: string } | null {
  switch (uri) {
    case CONFIG_RESOURCE_URI:
      return {
        mimeType: 'application/json',
        text: JSON.stringify(describeConfig(config), null, 2),
      };

    case SESSIONS_RESOURCE_URI: {
      const sessions = controller.list();
      return {
        mimeType: 'application/json',
        text: JSON.stringify({ count: sessions.length, sessions }, null, 2),
      };
    }

    default:
      return null;
  }
}
