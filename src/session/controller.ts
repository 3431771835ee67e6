import type { ViewHostAdapter } from '../host/adapter.js';
import type {
  SessionInfo,
  SessionRecord,
  SessionState,
  ToggleOutcome,
  ViewHandle,
} from '../types/session.js';
import type { Logger } from '../utils/logger.js';
import { ExitCallbackDispatcher } from './dispatcher.js';
import { LayoutManager } from './layout.js';
import type { SessionRegistry } from './registry.js';

/**
 * Session lifecycle state machine.
 *
 *   idle    --toggle-->  visible   (launch)
 *   hidden  --toggle-->  visible   (reuse view)
 *   visible --toggle-->  hidden    (process kept alive)
 *   visible/hidden --process exit--> idle (onExit, view deleted)
 *
 * Showing one session hides every other one first, so at most one session
 * holds a window. All transitions are synchronous; the event loop serialises
 * toggles and exit notifications.
 */
export class SessionController {
  private layout: LayoutManager;
  private dispatcher: ExitCallbackDispatcher;
  /** Views whose exit transition is running; never reused by a toggle */
  private exitingViews: Set<ViewHandle> = new Set();

  constructor(
    private registry: SessionRegistry,
    private adapter: ViewHostAdapter,
    private logger: Logger
  ) {
    this.layout = new LayoutManager(adapter);
    this.dispatcher = new ExitCallbackDispatcher(logger);
  }

  /**
   * Show the session's view, launching its process on first use, or hide it
   * if it is the visible one. Throws UnknownSessionError for unknown names.
   */
  toggle(name: string): ToggleOutcome {
    const session = this.registry.get(name);

    if (this.isVisible(session)) {
      this.closeWindow(session, false);
      this.logger.debug({ session: name }, 'Session hidden');
      return 'hidden';
    }

    this.closeOthers(name);

    const previousLayout = session.savedLayout;
    this.layout.capture(session);

    const found = this.adapter.findView(session.viewTag);
    if (found !== null && !this.exitingViews.has(found)) {
      if (session.viewHandle !== found) {
        // Adopted a view this session did not launch
        session.viewHandle = found;
        this.watchExit(session, found);
      }
      this.showView(session, found);
      this.logger.debug({ session: name, viewHandle: found }, 'Session shown');
      return 'shown';
    }

    if (session.viewHandle !== null) {
      if (this.adapter.isViewValid(session.viewHandle)) {
        this.showView(session, session.viewHandle);
        return 'shown';
      }

      this.logger.warn({ session: name, viewHandle: session.viewHandle }, 'Dropping stale view handle');
      session.viewHandle = null;
    }

    const command = this.resolveCommand(session);
    if (command === null) {
      // Sessions hidden by closeOthers above stay hidden
      session.savedLayout = previousLayout;
      this.logger.warn({ session: name }, 'Nothing to launch');
      return 'aborted';
    }

    try {
      this.launch(session, command);
    } catch (error) {
      session.savedLayout = previousLayout;
      throw error;
    }

    // The resolved command is kept only once a process is running
    session.launchSpec = command;
    session.onBeforeLaunch = undefined;
    return 'launched';
  }

  /**
   * Hide every visible session except `except`. Never stops a process.
   */
  closeOthers(except: string): void {
    this.registry.forEach(session => {
      if (session.name !== except && session.windowHandle !== null) {
        this.closeWindow(session, false);
        this.logger.debug({ session: session.name, raised: except }, 'Session hidden for another session');
      }
    });
  }

  /**
   * Process-exit transition. Runs whether or not the session is visible:
   * closes the window if open, hands the captured output to onExit, then
   * deletes the view.
   */
  handleProcessExit(name: string, view: ViewHandle): void {
    const session = this.registry.get(name);

    if (session.viewHandle !== view) {
      this.logger.warn({ session: name, viewHandle: view }, 'Ignoring exit of a view the session no longer owns');
      return;
    }

    if (session.windowHandle !== null) {
      this.closeWindow(session, true);
    }
    session.exited = true;

    const lines = this.adapter.readAllLines(view);
    // Cleared before onExit runs, so a toggle from the callback starts a new view
    session.viewHandle = null;

    this.exitingViews.add(view);
    try {
      this.dispatcher.dispatch(session, lines);
    } finally {
      this.exitingViews.delete(view);
    }

    if (this.adapter.isViewValid(view)) {
      this.adapter.deleteView(view);
    }

    this.logger.info({ session: name, lines: lines.length }, 'Session process exited');
  }

  state(name: string): SessionState {
    return this.stateOf(this.registry.get(name));
  }

  sessionInfo(name: string): SessionInfo {
    return this.describe(this.registry.get(name));
  }

  list(): SessionInfo[] {
    const sessions: SessionInfo[] = [];
    this.registry.forEach(session => sessions.push(this.describe(session)));
    return sessions;
  }

  /**
   * Lines currently held by the session's view, or null when it has none
   */
  readOutput(name: string): string[] | null {
    const session = this.registry.get(name);
    if (session.viewHandle === null || !this.adapter.isViewValid(session.viewHandle)) {
      return null;
    }
    return this.adapter.readAllLines(session.viewHandle);
  }

  /**
   * Delete every remaining view without firing exit callbacks
   */
  dispose(): void {
    this.registry.forEach(session => {
      if (session.viewHandle !== null && this.adapter.isViewValid(session.viewHandle)) {
        this.adapter.deleteView(session.viewHandle);
      }
      session.viewHandle = null;
      session.windowHandle = null;
      session.savedLayout = null;
    });
  }

  private launch(session: SessionRecord, command: string): void {
    const view = this.adapter.createProcessView(command);
    this.adapter.setViewName(view, session.viewTag);
    this.adapter.markUnlisted(view);
    session.viewHandle = view;
    this.watchExit(session, view);

    this.showView(session, view);
    this.logger.info({ session: session.name, viewHandle: view, command }, 'Session launched');
  }

  private watchExit(session: SessionRecord, view: ViewHandle): void {
    const name = session.name;
    this.adapter.onProcessExit(view, () => this.handleProcessExit(name, view));
  }

  /**
   * Apply onBeforeLaunch to launchSpec. toggle() stores the result as the new
   * launchSpec and drops the transform once a launch with it succeeds.
   */
  private resolveCommand(session: SessionRecord): string | null {
    let command = session.launchSpec;

    if (session.onBeforeLaunch) {
      try {
        command = session.onBeforeLaunch(command);
      } catch (error) {
        this.logger.error({ error, session: session.name }, 'Launch transform failed');
        return null;
      }
    }

    if (command.trim() === '') {
      return null;
    }

    return command;
  }

  private showView(session: SessionRecord, view: ViewHandle): void {
    const window = this.adapter.bindWindow(view);
    session.windowHandle = window;
    this.adapter.focusInputMode(window);
  }

  /**
   * Close the session's window and restore the layout saved before it opened.
   * A window the host already dropped is only forgotten.
   */
  private closeWindow(session: SessionRecord, programExited: boolean): void {
    const window = session.windowHandle;
    if (window === null) {
      return;
    }

    session.windowHandle = null;
    if (!this.adapter.isWindowValid(window)) {
      return;
    }

    this.adapter.closeWindow(window);
    this.layout.restore(session);
    session.exited = programExited;
  }

  private isVisible(session: SessionRecord): boolean {
    return session.windowHandle !== null && this.adapter.isWindowValid(session.windowHandle);
  }

  private stateOf(session: SessionRecord): SessionState {
    if (session.viewHandle === null) return 'idle';
    return this.isVisible(session) ? 'visible' : 'hidden';
  }

  private describe(session: SessionRecord): SessionInfo {
    return {
      name: session.name,
      viewTag: session.viewTag,
      state: this.stateOf(session),
      launchSpec: session.launchSpec,
      viewHandle: session.viewHandle,
      windowHandle: session.windowHandle,
      exited: session.exited,
    };
  }
}
