import { describe, it, expect } from 'vitest';
import { describeConfig, getConfigTool } from '../../src/tools/meta/get-config.js';
import { SERVER_VERSION } from '../../src/version.js';
import { ConfigSchema } from '../../src/types/config.js';

const PREFIX = '=== permterm Configuration ===\n\n';
const SUFFIX = '\n\nConfiguration is read-only. To modify, update the config file and restart the server.';

describe('get_config tool', () => {
  const baseConfig = ConfigSchema.parse({
    allowedDirectories: ['/test/path1', '/test/path2'],
    blockedCommands: ['rm -rf /', 'shutdown'],
    sessions: [
      { name: 'shell', launchSpec: 'bash' },
      { name: 'logs', launchSpec: 'tail -f app.log', viewTag: 'custom://logs', cwd: '/test/path1', recordExitOutput: false },
    ],
  });

  function payload(text: string): unknown {
    expect(text.startsWith(PREFIX)).toBe(true);
    expect(text.endsWith(SUFFIX)).toBe(true);
    return JSON.parse(text.slice(PREFIX.length, text.length - SUFFIX.length));
  }

  it('fills in defaults for each session', () => {
    expect(describeConfig(baseConfig).sessions).toEqual([
      { name: 'shell', launchSpec: 'bash', viewTag: 'permterm://shell', cwd: null, recordExitOutput: true },
      { name: 'logs', launchSpec: 'tail -f app.log', viewTag: 'custom://logs', cwd: '/test/path1', recordExitOutput: false },
    ]);
  });

  it('returns the resolved configuration with server metadata', async () => {
    const result = await getConfigTool(baseConfig);

    expect(result.content).toHaveLength(1);
    expect(payload(result.content[0].text)).toEqual({
      ...describeConfig(baseConfig),
      version: SERVER_VERSION,
      platform: process.platform,
      nodeVersion: process.version,
      restrictedDirectories: true,
    });
  });

  it('reports terminal defaults', () => {
    expect(describeConfig(baseConfig).terminal).toEqual({ cols: 120, rows: 30, scrollback: 5000 });
  });

  it('flags unrestricted directories', async () => {
    const result = await getConfigTool({ ...baseConfig, allowedDirectories: [] });

    expect(payload(result.content[0].text)).toMatchObject({
      allowedDirectories: [],
      restrictedDirectories: false,
    });
  });
});
