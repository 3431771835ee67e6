import { describe, it, expect, beforeEach } from 'vitest';
import { SessionController } from '../../src/session/controller.js';
import { SessionRegistry } from '../../src/session/registry.js';
import { ExitTranscriptStore } from '../../src/session/transcripts.js';
import { toggleSessionTool } from '../../src/tools/sessions/toggle.js';
import {
  listSessionsTool,
  readSessionOutputTool,
  sendSessionInputTool,
} from '../../src/tools/sessions/management.js';
import type { ToolResult } from '../../src/types/config.js';
import { FakeViewHost, silentLogger } from '../helpers/fake-host.js';

function text(result: ToolResult): string {
  return result.content.map(c => c.text).join('\n');
}

describe('session tools', () => {
  let host: FakeViewHost;
  let controller: SessionController;
  let transcripts: ExitTranscriptStore;
  const logger = silentLogger();

  beforeEach(() => {
    host = new FakeViewHost();
    transcripts = new ExitTranscriptStore();
    const registry = new SessionRegistry();
    registry.register([
      { name: 'shell', launchSpec: 'bash', viewTag: 'permterm://shell', onExit: lines => transcripts.record('shell', lines) },
      { name: 'git', launchSpec: '', viewTag: 'permterm://git' },
    ]);
    controller = new SessionController(registry, host, logger);
  });

  describe('toggle_session', () => {
    it('reports each outcome with the resulting state', async () => {
      const launched = await toggleSessionTool({ name: 'shell' }, controller, logger);
      const hidden = await toggleSessionTool({ name: 'shell' }, controller, logger);
      const shown = await toggleSessionTool({ name: 'shell' }, controller, logger);

      expect(text(launched)).toBe('Session "shell" launched: bash\nState: visible');
      expect(text(hidden)).toBe('Session "shell" hidden (process kept alive)\nState: hidden');
      expect(text(shown)).toBe('Session "shell" shown (existing process)\nState: visible');
      expect(launched.isError).toBeUndefined();
    });

    it('reports a launch with nothing to run', async () => {
      const result = await toggleSessionTool({ name: 'git' }, controller, logger);

      expect(text(result)).toBe('Session "git": nothing to launch\nState: idle');
      expect(host.spawned).toEqual([]);
    });

    it('fails for an unknown session', async () => {
      const result = await toggleSessionTool({ name: 'nope' }, controller, logger);

      expect(result.isError).toBe(true);
      expect(text(result)).toBe('Error: MCP error -32602: Unknown session: nope');
    });

    it('fails for missing arguments', async () => {
      const result = await toggleSessionTool({}, controller, logger);

      expect(result.isError).toBe(true);
      expect(text(result)).toBe('Error: MCP error -32602: Invalid toggle_session arguments');
    });
  });

  describe('list_sessions', () => {
    it('lists every session with its state', async () => {
      controller.toggle('shell');

      const result = await listSessionsTool(controller, logger);

      expect(text(result)).toBe([
        'Sessions (2):',
        '',
        '[shell] visible',
        '  Command: bash',
        '  View: 1 | Tag: permterm://shell',
        '',
        '[git] idle',
        '  Command: (none)',
        '  View: - | Tag: permterm://git',
      ].join('\n'));
    });

    it('marks a session whose last close was a process exit', async () => {
      controller.toggle('shell');
      host.simulateExit(1);

      const result = await listSessionsTool(controller, logger);

      expect(text(result)).toContain('[shell] idle\n  Command: bash\n  View: - | Tag: permterm://shell | last close: process exit');
    });

    it('says so when nothing is configured', async () => {
      const empty = new SessionController(new SessionRegistry(), host, logger);

      const result = await listSessionsTool(empty, logger);

      expect(text(result)).toBe('No sessions configured');
    });
  });

  describe('read_session_output', () => {
    it('returns the trailing lines of a running session', async () => {
      controller.toggle('shell');
      host.emit(1, 'one', 'two', 'three');

      const result = await readSessionOutputTool({ name: 'shell', lines: 2 }, controller, transcripts, logger);

      expect(text(result)).toBe('Session "shell" | State: visible\n\ntwo\nthree');
    });

    it('marks a running session without output', async () => {
      controller.toggle('shell');
      controller.toggle('shell');

      const result = await readSessionOutputTool({ name: 'shell' }, controller, transcripts, logger);

      expect(text(result)).toBe('Session "shell" | State: hidden\n\n[No output]');
    });

    it('falls back to the output captured at exit', async () => {
      controller.toggle('shell');
      host.emit(1, 'build ok');
      host.simulateExit(1);

      const result = await readSessionOutputTool({ name: 'shell' }, controller, transcripts, logger);
      const recordedAt = transcripts.get('shell')?.recordedAt.toISOString();

      expect(text(result)).toBe(`Session "shell" | exited at ${recordedAt}\n\nbuild ok`);
    });

    it('says so when a session never produced output', async () => {
      const result = await readSessionOutputTool({ name: 'git' }, controller, transcripts, logger);

      expect(text(result)).toBe('Session "git" has no output yet');
      expect(result.isError).toBeUndefined();
    });

    it('rejects a non-positive line count', async () => {
      const result = await readSessionOutputTool({ name: 'shell', lines: 0 }, controller, transcripts, logger);

      expect(result.isError).toBe(true);
      expect(text(result)).toBe('Error: MCP error -32602: Invalid read_session_output arguments');
    });
  });

  describe('send_session_input', () => {
    it('types into the visible session and presses enter', async () => {
      controller.toggle('shell');

      const result = await sendSessionInputTool({ name: 'shell', input: 'git status' }, controller, host, logger);

      expect(text(result)).toBe('Sent 10 characters to "shell"');
      expect(host.written).toEqual(['git status\r']);
    });

    it('sends raw input when newline is off', async () => {
      controller.toggle('shell');

      await sendSessionInputTool({ name: 'shell', input: 'q', newline: false }, controller, host, logger);

      expect(host.written).toEqual(['q']);
    });

    it('refuses a session that is not visible', async () => {
      controller.toggle('shell');
      controller.toggle('shell');

      const result = await sendSessionInputTool({ name: 'shell', input: 'ls' }, controller, host, logger);

      expect(result.isError).toBe(true);
      expect(text(result)).toBe('Error: Session "shell" is hidden; toggle it visible before sending input');
      expect(host.written).toEqual([]);
    });

    it('refuses when input focus moved elsewhere', async () => {
      controller.toggle('shell');
      host.focusedWindow = null;

      const result = await sendSessionInputTool({ name: 'shell', input: 'ls' }, controller, host, logger);

      expect(result.isError).toBe(true);
      expect(host.written).toEqual([]);
    });
  });
});
