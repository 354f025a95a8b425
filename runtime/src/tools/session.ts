/**
 * Session state machine for adapters that hold a live handle
 * (browser page, opened macOS app, VNC connection).
 *
 *   unopened --open--> open --close--> closed
 *   unopened --close-------------------> closed
 *
 * There is no edge out of `closed`; a new adapter instance is required.
 *
 * @module
 */

import type { ToolResult } from './types.js';
import { errorResult } from './types.js';
import { ToolErrorCodes } from '../types/errors.js';

export type SessionState = 'unopened' | 'open' | 'closed';

export class SessionGuard {
  private current: SessionState = 'unopened';

  /**
   * @param label - Shown in the closed-session message (e.g. "Browser")
   * @param notOpenMessage - Returned when an action needs an open session
   */
  constructor(
    private readonly label: string,
    private readonly notOpenMessage: string,
  ) {}

  get state(): SessionState {
    return this.current;
  }

  get isOpen(): boolean {
    return this.current === 'open';
  }

  get isClosed(): boolean {
    return this.current === 'closed';
  }

  /** No-op once closed; callers check {@link gate} first. */
  markOpen(): void {
    if (this.current === 'unopened') this.current = 'open';
  }

  markClosed(): void {
    this.current = 'closed';
  }

  /** The failure every action gets once the session is closed. */
  closedResult(): ToolResult {
    return errorResult(
      `${this.label} session is closed. Create a new tool instance to continue.`,
      ToolErrorCodes.SESSION_CLOSED,
    );
  }

  /**
   * Failure to return instead of running the action, or `undefined` when the
   * action may proceed.
   */
  gate(requiresOpen: boolean): ToolResult | undefined {
    if (this.current === 'closed') return this.closedResult();
    if (requiresOpen && this.current !== 'open') {
      return errorResult(this.notOpenMessage, ToolErrorCodes.NOT_OPEN);
    }
    return undefined;
  }
}
