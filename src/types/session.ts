/** Handle of a process-backed view in the host. */
export type ViewHandle = number;

/** Handle of an on-screen window displaying a view. */
export type WindowHandle = number;

/** Opaque snapshot of the window arrangement, restorable verbatim. */
export type LayoutToken = string;

export type ExitCallback = (lines: string[]) => void;
export type LaunchTransform = (command: string) => string;

export type SessionState = 'idle' | 'hidden' | 'visible';

/**
 * What a toggle did:
 * - `launched`: a new process view was created and shown
 * - `shown`: an existing view was shown again
 * - `hidden`: the visible view was hidden, process kept alive
 * - `aborted`: nothing to launch, no state change
 */
export type ToggleOutcome = 'launched' | 'shown' | 'hidden' | 'aborted';

export interface SessionConfig {
  name: string;
  launchSpec: string;
  viewTag: string;
  onExit?: ExitCallback;
  onBeforeLaunch?: LaunchTransform;
}

export interface SessionRecord {
  /** Unique key into the registry */
  readonly name: string;

  /** Command to run; replaced by the resolved command after the first launch */
  launchSpec: string;

  /** Name used to tag and locate the session's view */
  readonly viewTag: string;

  /** Set while a view bound to this session's process exists */
  viewHandle: ViewHandle | null;

  /** Set only while the view is shown in a window */
  windowHandle: WindowHandle | null;

  /** Window arrangement to restore when this session's window closes */
  savedLayout: LayoutToken | null;

  /** True only when the most recent close was caused by the process exiting */
  exited: boolean;

  onExit?: ExitCallback;

  /** Applied to launchSpec until a launch resolves to a command */
  onBeforeLaunch?: LaunchTransform;
}

export interface SessionInfo {
  name: string;
  viewTag: string;
  state: SessionState;
  launchSpec: string;
  viewHandle: ViewHandle | null;
  windowHandle: WindowHandle | null;
  exited: boolean;
}
