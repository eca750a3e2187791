/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every fatal throw site uses one of these.
 * The `code` property is what shows up in CommandError.code and what
 * the CLI prints next to the message.
 *
 * Per-window failures are NOT errors; see ApplyOutcome in core/types.ts.
 */

export class PresentationError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Permission errors
// ---------------------------------------------------------------------------

/** Privacy & Security pane that holds the missing grant. */
export type PermissionPane = 'Accessibility' | 'Automation';

/**
 * The process lacks accessibility (UI automation) access, or may not send
 * Apple events to System Events.
 */
export class PermissionDeniedError extends PresentationError {
  constructor(host: string, pane: PermissionPane = 'Accessibility') {
    super(
      pane === 'Accessibility'
        ? `Accessibility access is required to move and resize windows. ` +
          `Open System Settings → Privacy & Security → Accessibility, enable "${host}", ` +
          `then run the command again.`
        : `Automation access to System Events is required to list windows. ` +
          `Open System Settings → Privacy & Security → Automation, enable "System Events" under "${host}", ` +
          `then run the command again.`,
      'PERMISSION_DENIED',
      { host, pane }
    );
  }
}

// ---------------------------------------------------------------------------
// Display errors
// ---------------------------------------------------------------------------

/** No display mode survived the selector's filters. */
export class ModeNotFoundError extends PresentationError {
  constructor(displayId: string, target: { width: number; height?: number }, filter: string) {
    const size = target.height ? `${target.width}x${target.height}` : `width ${target.width}`;
    super(
      `No display mode near ${size} (filter: ${filter}) on display ${displayId}. ` +
      `Run "presentation-mode modes" to see what the display offers and adjust the target in your config.`,
      'MODE_NOT_FOUND',
      { displayId, target, filter }
    );
  }
}

/** The main display (or the display recorded in saved state) is not connected. */
export class DisplayNotFoundError extends PresentationError {
  constructor(displayId?: string) {
    super(
      displayId ? `Display not found: "${displayId}"` : 'Could not detect the main display',
      'DISPLAY_NOT_FOUND',
      displayId ? { displayId } : undefined
    );
  }
}

/** displayplacer failed, or printed something we cannot interpret. */
export class DisplayError extends PresentationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DISPLAY_ERROR', details);
  }
}

// ---------------------------------------------------------------------------
// State errors
// ---------------------------------------------------------------------------

/** exit was called while not in presentation mode. */
export class StateAbsentError extends PresentationError {
  constructor(path: string) {
    super(
      `Not in presentation mode: no saved state at ${path}. Nothing to restore.`,
      'STATE_ABSENT',
      { path }
    );
  }
}

/** The state file exists but cannot be trusted as a restore target. */
export class StateCorruptError extends PresentationError {
  constructor(path: string, reason: string) {
    super(
      `Saved state at ${path} is unreadable (${reason}). ` +
      `Restore the resolution in System Settings → Displays, then delete the file by hand.`,
      'STATE_CORRUPT',
      { path, reason }
    );
  }
}

/** enter was called while a saved state is still present. */
export class StateExistsError extends PresentationError {
  constructor(path: string, savedAt: string) {
    super(
      `Already in presentation mode (state saved ${savedAt}). ` +
      `Run "presentation-mode exit" first, or delete ${path} if the display was restored by hand.`,
      'STATE_EXISTS',
      { path, savedAt }
    );
  }
}

// ---------------------------------------------------------------------------
// Configuration / dispatch errors
// ---------------------------------------------------------------------------

/** The configuration file failed schema validation or is not JSON. */
export class ConfigError extends PresentationError {
  constructor(path: string, violations: unknown[]) {
    super(`Invalid configuration file: "${path}"`, 'CONFIG_ERROR', { path, violations });
  }
}

/** The CLI was given a command name that doesn't exist in the registry. */
export class UnknownCommandError extends PresentationError {
  constructor(command: string) {
    super(`Unknown command: "${command}"`, 'UNKNOWN_COMMAND', { command });
  }
}

// ---------------------------------------------------------------------------
// Execution errors (external command layer)
// ---------------------------------------------------------------------------

/** An external command (osascript, displayplacer) exited non-zero or timed out. */
export class ExecutionError extends PresentationError {
  constructor(source: string, message: string, details?: Record<string, unknown>) {
    super(message, 'EXECUTION_ERROR', { source, ...details });
  }
}
