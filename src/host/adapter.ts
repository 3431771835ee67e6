import type { LayoutToken, ViewHandle, WindowHandle } from '../types/session.js';

/**
 * Host primitives the session controller needs: process-backed views,
 * windows that display them, and the window arrangement.
 *
 * Every handle may go stale through means outside the controller's control,
 * so callers gate mutations on isViewValid/isWindowValid.
 */
export interface ViewHostAdapter {
  /** Find a live view whose name matches `tagPattern` */
  findView(tagPattern: string): ViewHandle | null;

  /** Spawn `command` in a new view */
  createProcessView(command: string): ViewHandle;

  /** Open a full-screen window showing `view` and make it current */
  bindWindow(view: ViewHandle): WindowHandle;

  closeWindow(window: WindowHandle): void;
  isWindowValid(window: WindowHandle): boolean;
  isViewValid(view: ViewHandle): boolean;

  setViewName(view: ViewHandle, name: string): void;

  /** Hide the view from buffer listings */
  markUnlisted(view: ViewHandle): void;

  /** Route user input to the view shown in `window` */
  focusInputMode(window: WindowHandle): void;

  captureLayout(): LayoutToken;
  applyLayout(token: LayoutToken): void;

  readAllLines(view: ViewHandle): string[];
  deleteView(view: ViewHandle): void;

  /** Register a one-shot handler fired when the view's process terminates */
  onProcessExit(view: ViewHandle, handler: () => void): void;
}

/**
 * A view host that also takes typed input and can shut down its views
 */
export interface InteractiveViewHost extends ViewHostAdapter {
  /** View shown in the window holding input focus */
  readonly focusedView: ViewHandle | null;

  /** Write to the focused view's process */
  writeInput(data: string): void;

  /** Kill every view without running exit handlers */
  dispose(): void;
}
