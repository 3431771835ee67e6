import pino from 'pino';
import type { InteractiveViewHost } from '../../src/host/adapter.js';
import type { LayoutToken, ViewHandle, WindowHandle } from '../../src/types/session.js';
import type { Logger } from '../../src/utils/logger.js';

interface FakeView {
  name: string;
  command: string;
  listed: boolean;
  lines: string[];
  exitHandlers: Array<() => void>;
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * In-memory view host: records every call the controller makes and lets a
 * test fire process exits by hand.
 */
export class FakeViewHost implements InteractiveViewHost {
  readonly views = new Map<ViewHandle, FakeView>();
  readonly windows = new Map<WindowHandle, ViewHandle>();
  readonly spawned: string[] = [];
  readonly appliedLayouts: LayoutToken[] = [];
  readonly deleted: ViewHandle[] = [];
  readonly written: string[] = [];
  focusedWindow: WindowHandle | null = null;

  private nextView = 1;
  private nextWindow = 100;
  private layoutCount = 0;

  findView(tagPattern: string): ViewHandle | null {
    for (const [id, view] of this.views) {
      if (view.name === tagPattern) return id;
    }
    return null;
  }

  createProcessView(command: string): ViewHandle {
    const id = this.nextView++;
    this.views.set(id, { name: '', command, listed: true, lines: [], exitHandlers: [] });
    this.spawned.push(command);
    return id;
  }

  bindWindow(view: ViewHandle): WindowHandle {
    const id = this.nextWindow++;
    this.windows.set(id, view);
    return id;
  }

  closeWindow(window: WindowHandle): void {
    this.windows.delete(window);
    if (this.focusedWindow === window) this.focusedWindow = null;
  }

  isWindowValid(window: WindowHandle): boolean {
    return this.windows.has(window);
  }

  isViewValid(view: ViewHandle): boolean {
    return this.views.has(view);
  }

  setViewName(view: ViewHandle, name: string): void {
    const entry = this.views.get(view);
    if (entry) entry.name = name;
  }

  markUnlisted(view: ViewHandle): void {
    const entry = this.views.get(view);
    if (entry) entry.listed = false;
  }

  focusInputMode(window: WindowHandle): void {
    this.focusedWindow = window;
  }

  captureLayout(): LayoutToken {
    this.layoutCount++;
    return `layout-${this.layoutCount}`;
  }

  applyLayout(token: LayoutToken): void {
    this.appliedLayouts.push(token);
  }

  readAllLines(view: ViewHandle): string[] {
    return [...(this.views.get(view)?.lines ?? [])];
  }

  deleteView(view: ViewHandle): void {
    this.views.delete(view);
    this.deleted.push(view);
    for (const [window, shown] of this.windows) {
      if (shown === view) this.windows.delete(window);
    }
  }

  onProcessExit(view: ViewHandle, handler: () => void): void {
    this.views.get(view)?.exitHandlers.push(handler);
  }

  get focusedView(): ViewHandle | null {
    if (this.focusedWindow === null) return null;
    return this.windows.get(this.focusedWindow) ?? null;
  }

  writeInput(data: string): void {
    this.written.push(data);
  }

  dispose(): void {
    for (const view of Array.from(this.views.keys())) {
      this.deleteView(view);
    }
  }

  /** Append output lines to a view */
  emit(view: ViewHandle, ...lines: string[]): void {
    this.views.get(view)?.lines.push(...lines);
  }

  /** Fire the view's exit handlers, as the host does when the process ends */
  simulateExit(view: ViewHandle): void {
    const entry = this.views.get(view);
    if (!entry) return;
    const handlers = entry.exitHandlers;
    entry.exitHandlers = [];
    for (const handler of handlers) handler();
  }

  /** Drop a window behind the controller's back */
  dropWindow(window: WindowHandle): void {
    this.windows.delete(window);
  }
}
