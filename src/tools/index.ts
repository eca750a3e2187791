/**
 * tools/index.ts
 *
 * Wires the macOS-backed tool modules into the PresentationServices
 * the workflows run against. Tests build their own services instead.
 */

import { PresentationConfig, PresentationServices } from '../core/types';
import { DisplayplacerService } from './display_manager';
import { AccessibilityWindowService } from './window_manager';
import { SystemEventsMenuBar } from './menubar_manager';
import { FileStateStore } from './state_store';

/** The process macOS asks the user to trust: whatever launched us. */
export function permissionHost(env: NodeJS.ProcessEnv = process.env): string {
  switch (env.TERM_PROGRAM) {
    case 'Apple_Terminal': return 'Terminal';
    case 'iTerm.app':      return 'iTerm';
    case 'vscode':         return 'Visual Studio Code';
    case undefined:
    case '':               return 'the app that runs presentation-mode';
    default:               return env.TERM_PROGRAM;
  }
}

export function createDesktopServices(config: PresentationConfig): PresentationServices {
  return {
    display: new DisplayplacerService(config.displayplacerPath, config.commandTimeoutMs),
    windows: new AccessibilityWindowService(
      { skipApps: config.skipApps, minWindowSize: config.minWindowSize },
      config.commandTimeoutMs,
      permissionHost()
    ),
    menuBar: new SystemEventsMenuBar(config.commandTimeoutMs),
    state: new FileStateStore(config.stateFile),
    sleep: (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms)),
    now: () => Date.now()
  };
}
