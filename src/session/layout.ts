import type { ViewHostAdapter } from '../host/adapter.js';
import type { SessionRecord } from '../types/session.js';

/**
 * Saves the window arrangement before a session's view goes full-screen and
 * puts it back once that view is hidden.
 */
export class LayoutManager {
  constructor(private adapter: ViewHostAdapter) {}

  capture(session: SessionRecord): void {
    session.savedLayout = this.adapter.captureLayout();
  }

  restore(session: SessionRecord): void {
    if (session.savedLayout === null) {
      return;
    }
    this.adapter.applyLayout(session.savedLayout);
    session.savedLayout = null;
  }
}
