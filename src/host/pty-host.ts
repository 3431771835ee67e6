import { spawn as spawnPty } from 'node-pty';
import type { IDisposable, IPty } from 'node-pty';
import { z } from 'zod';
import { TerminalLineBuffer } from './line-buffer.js';
import type { InteractiveViewHost } from './adapter.js';
import type { LayoutToken, ViewHandle, WindowHandle } from '../types/session.js';
import type { TerminalOptions } from '../types/config.js';
import type { Logger } from '../utils/logger.js';

/** The editor's own window; always present, never closed */
export const BASE_WINDOW: WindowHandle = 1;

const LayoutSchema = z.object({
  order: z.array(z.number().int()),
  current: z.number().int(),
});

type Layout = z.infer<typeof LayoutSchema>;

interface PtyView {
  readonly id: ViewHandle;
  readonly pty: IPty;
  readonly buffer: TerminalLineBuffer;
  name: string;
  running: boolean;
  exitHandlers: Array<() => void>;
  disposables: IDisposable[];
}

interface HostWindow {
  readonly id: WindowHandle;
  readonly view: ViewHandle | null;
}

export interface PtyViewHostOptions extends TerminalOptions {
  /** Shell used to run launch commands (defaults to $SHELL, then /bin/sh) */
  shell?: string;
  /** Working directory for new views (defaults to the server's cwd) */
  cwd?: string;
}

/**
 * Headless view host: views are node-pty processes whose output is kept as
 * display lines, windows are an ordered list of frames with one current
 * window, and a layout token is the serialised order plus current window.
 */
export class PtyViewHost implements InteractiveViewHost {
  private views: Map<ViewHandle, PtyView> = new Map();
  private windows: HostWindow[] = [{ id: BASE_WINDOW, view: null }];
  private currentWindow: WindowHandle = BASE_WINDOW;
  private inputWindow: WindowHandle | null = null;
  private nextViewId = 1;
  private nextWindowId = BASE_WINDOW + 1;

  constructor(
    private logger: Logger,
    private options: PtyViewHostOptions
  ) {}

  /**
   * View names are stored verbatim, so the tag has to match the whole name
   */
  findView(tagPattern: string): ViewHandle | null {
    for (const view of this.views.values()) {
      if (view.name === tagPattern) {
        return view.id;
      }
    }
    return null;
  }

  createProcessView(command: string): ViewHandle {
    const shell = this.options.shell || process.env.SHELL || '/bin/sh';
    const cwd = this.options.cwd || process.cwd();

    const pty = spawnPty(shell, ['-c', command], {
      name: 'xterm-256color',
      cols: this.options.cols,
      rows: this.options.rows,
      cwd,
      env: ptyEnv(),
    });

    const view: PtyView = {
      id: this.nextViewId++,
      pty,
      buffer: new TerminalLineBuffer(this.options.scrollback),
      name: `term://${pty.pid}:${command}`,
      running: true,
      exitHandlers: [],
      disposables: [],
    };

    view.disposables.push(
      pty.onData((data) => {
        view.buffer.write(data);
      }),
      pty.onExit(({ exitCode, signal }) => {
        this.handleExit(view, exitCode, signal);
      })
    );

    this.views.set(view.id, view);

    this.logger.info({
      view: view.id,
      pid: pty.pid,
      command,
      cwd,
    }, 'Process view created');

    return view.id;
  }

  bindWindow(view: ViewHandle): WindowHandle {
    if (!this.views.has(view)) {
      throw new Error(`Cannot bind window: view ${view} does not exist`);
    }

    const window: HostWindow = { id: this.nextWindowId++, view };
    this.windows.push(window);
    this.currentWindow = window.id;

    this.logger.debug({ window: window.id, view }, 'Window opened');
    return window.id;
  }

  closeWindow(window: WindowHandle): void {
    if (window === BASE_WINDOW) {
      this.logger.warn('Refusing to close the base window');
      return;
    }

    const index = this.windows.findIndex(w => w.id === window);
    if (index === -1) {
      return;
    }

    this.windows.splice(index, 1);
    this.afterWindowsRemoved();
    this.logger.debug({ window }, 'Window closed');
  }

  isWindowValid(window: WindowHandle): boolean {
    return this.windows.some(w => w.id === window);
  }

  isViewValid(view: ViewHandle): boolean {
    return this.views.has(view);
  }

  setViewName(view: ViewHandle, name: string): void {
    const entry = this.views.get(view);
    if (entry) {
      entry.name = name;
    }
  }

  /**
   * There is no buffer browser to hide views from; views are only reachable
   * through their handle or findView
   */
  markUnlisted(_view: ViewHandle): void {}

  focusInputMode(window: WindowHandle): void {
    if (!this.isWindowValid(window)) {
      return;
    }
    this.currentWindow = window;
    this.inputWindow = window;
  }

  captureLayout(): LayoutToken {
    const layout: Layout = {
      order: this.windows.map(w => w.id),
      current: this.currentWindow,
    };
    return JSON.stringify(layout);
  }

  applyLayout(token: LayoutToken): void {
    let layout: Layout;
    try {
      layout = LayoutSchema.parse(JSON.parse(token));
    } catch (error) {
      this.logger.warn({ error }, 'Ignoring unreadable layout token');
      return;
    }

    // Windows named by the token first (in its order), then any opened since
    const rank = new Map(layout.order.map((id, i) => [id, i]));
    const known = this.windows.filter(w => rank.has(w.id));
    const added = this.windows.filter(w => !rank.has(w.id));
    known.sort((a, b) => (rank.get(a.id) ?? 0) - (rank.get(b.id) ?? 0));
    this.windows = [...known, ...added];

    if (this.isWindowValid(layout.current)) {
      this.currentWindow = layout.current;
    }
  }

  readAllLines(view: ViewHandle): string[] {
    return this.views.get(view)?.buffer.getLines() ?? [];
  }

  deleteView(view: ViewHandle): void {
    const entry = this.views.get(view);
    if (!entry) {
      return;
    }

    this.views.delete(view);
    entry.exitHandlers = [];
    for (const disposable of entry.disposables) {
      disposable.dispose();
    }

    if (entry.running) {
      try {
        entry.pty.kill();
      } catch (error) {
        this.logger.error({ error, view, pid: entry.pty.pid }, 'Failed to kill view process');
      }
      entry.running = false;
    }

    // Deleting a view closes every window showing it
    const before = this.windows.length;
    this.windows = this.windows.filter(w => w.view !== view);
    if (this.windows.length !== before) {
      this.afterWindowsRemoved();
    }

    this.logger.info({ view, pid: entry.pty.pid }, 'View deleted');
  }

  onProcessExit(view: ViewHandle, handler: () => void): void {
    const entry = this.views.get(view);
    if (!entry) {
      return;
    }
    if (!entry.running) {
      queueMicrotask(handler);
      return;
    }
    entry.exitHandlers.push(handler);
  }

  /**
   * Send input to the view of the window holding input focus
   */
  writeInput(data: string): void {
    const focused = this.focusedView;
    const view = focused === null ? undefined : this.views.get(focused);

    if (!view || !view.running) {
      throw new Error('No running view has input focus');
    }

    view.pty.write(data);
  }

  /**
   * View shown in the window holding input focus, if any
   */
  get focusedView(): ViewHandle | null {
    const window = this.windows.find(w => w.id === this.inputWindow);
    return window?.view ?? null;
  }

  /**
   * Kill every view without running exit handlers
   */
  dispose(): void {
    for (const view of Array.from(this.views.keys())) {
      this.deleteView(view);
    }
    this.logger.info('View host shut down');
  }

  private handleExit(view: PtyView, exitCode: number, signal?: number): void {
    view.running = false;

    if (!this.views.has(view.id)) {
      return;
    }

    this.logger.info({
      view: view.id,
      pid: view.pty.pid,
      exitCode,
      signal,
    }, 'Process exited');

    const handlers = view.exitHandlers;
    view.exitHandlers = [];
    for (const handler of handlers) {
      try {
        handler();
      } catch (error) {
        this.logger.error({ error, view: view.id }, 'Process exit handler failed');
      }
    }
  }

  private afterWindowsRemoved(): void {
    if (!this.isWindowValid(this.currentWindow)) {
      this.currentWindow = this.windows[this.windows.length - 1]?.id ?? BASE_WINDOW;
    }
    if (this.inputWindow !== null && !this.isWindowValid(this.inputWindow)) {
      this.inputWindow = null;
    }
  }
}

function ptyEnv(): Record<string, string> {
  const env: Record<string, string> = { TERM: 'xterm-256color' };
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && key !== 'TERM') {
      env[key] = value;
    }
  }
  return env;
}
