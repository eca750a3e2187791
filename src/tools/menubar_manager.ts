/**
 * tools/menubar_manager.ts
 *
 * Menu bar auto-hide via System Events dock preferences. Best-effort:
 * a failure is logged and reported as `false`, never thrown.
 */

import { MenuBarService } from '../core/types';
import { appleScript } from '../core/exec';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('tools/menubar_manager');

export function menuBarScript(autoHide: boolean): string {
  return `
    tell application "System Events"
      tell dock preferences
        set autohide menu bar to ${autoHide ? 'true' : 'false'}
      end tell
    end tell
  `;
}

export function setMenuBarAutoHide(autoHide: boolean, timeoutMs?: number): boolean {
  try {
    appleScript('menubar_manager', menuBarScript(autoHide), timeoutMs);
    log.debug({ autoHide }, 'Menu bar auto-hide set');
    return true;
  } catch (e) {
    log.warn({ autoHide, error: e instanceof Error ? e.message : String(e) }, 'Failed to set menu bar auto-hide');
    return false;
  }
}

export class SystemEventsMenuBar implements MenuBarService {
  constructor(private readonly timeoutMs: number) {}

  async setAutoHide(enabled: boolean): Promise<boolean> {
    return setMenuBarAutoHide(enabled, this.timeoutMs);
  }
}
