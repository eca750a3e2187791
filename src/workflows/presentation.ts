/**
 * workflows/presentation.ts
 *
 * The two workflows. There is no in-memory state machine: whether we are
 * in presentation mode is decided by the state file alone, so a crash at
 * any step leaves something `exit` can recover from.
 *
 *   enter:  permission → snapshot → select mode → save state → switch mode
 *           → settle → tile windows → hide menu bar
 *   exit:   load state → restore mode → settle → restore windows
 *           → show menu bar → clear state
 *
 * Window moves are best-effort and counted; everything else that fails
 * is fatal and thrown as a PresentationError.
 */

import {
  ApplyOutcome,
  PresentationConfig,
  PresentationServices,
  PresentationState,
  Rect,
  SkippedWindow,
  StepTiming,
  WindowRecord,
  WindowSummary,
  WorkflowReport
} from '../core/types';
import {
  PermissionDeniedError,
  StateAbsentError,
  StateCorruptError,
  StateExistsError
} from '../core/errors';
import { presentationTarget } from '../core/config';
import { currentMode, findDisplay, findMainDisplay } from '../tools/display_manager';
import { describeMode, selectMode } from '../tools/mode_selector';
import { layoutWindows } from '../tools/window_layout';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('workflows/presentation');

// ---------------------------------------------------------------------------
// Step timing
// ---------------------------------------------------------------------------

class StepClock {
  readonly steps: StepTiming[] = [];
  private readonly startedAt: number;

  constructor(private readonly now: () => number) {
    this.startedAt = now();
  }

  async step<T>(label: string, fn: () => Promise<T> | T): Promise<T> {
    const start = this.now();
    const step = this.steps.length + 1;
    log.debug({ step, label }, 'Step started');
    try {
      return await fn();
    } finally {
      this.steps.push({ step, label, durationMs: this.now() - start });
    }
  }

  elapsed(): number {
    return this.now() - this.startedAt;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function toSavedState(
  displayId: string,
  originalMode: { modeId: string; label: string },
  windows: WindowRecord[],
  savedAt: Date
): PresentationState {
  return {
    version: 1,
    displayId,
    originalMode: originalMode.modeId,
    originalModeLabel: originalMode.label,
    savedAt: savedAt.toISOString(),
    windows: windows.map(w => ({
      app: w.app,
      pid: w.pid,
      windowId: w.windowId,
      axIndex: w.axIndex,
      title: w.title,
      x: Math.round(w.frame.x),
      y: Math.round(w.frame.y),
      width: Math.max(1, Math.round(w.frame.width)),
      height: Math.max(1, Math.round(w.frame.height))
    }))
  };
}

export function fromSavedState(state: PresentationState): WindowRecord[] {
  return state.windows.map(w => ({
    app: w.app,
    pid: w.pid,
    windowId: w.windowId,
    axIndex: w.axIndex,
    title: w.title,
    frame: { x: w.x, y: w.y, width: w.width, height: w.height }
  }));
}

/** Pair each window with its frame from a computed layout. */
function tiled(windows: WindowRecord[], frames: Map<number, Rect>): Array<{ window: WindowRecord; frame: Rect }> {
  return windows.flatMap(window => {
    const frame = frames.get(window.windowId);
    return frame ? [{ window, frame }] : [];
  });
}

/** Apply a frame to each window; one failure never stops the batch. */
async function applyAll(
  services: PresentationServices,
  targets: Array<{ window: WindowRecord; frame: Rect }>
): Promise<WindowSummary> {
  const summary: WindowSummary = { total: targets.length, succeeded: 0, skipped: 0, skippedWindows: [] };

  for (const { window, frame } of targets) {
    let outcome: ApplyOutcome;
    try {
      outcome = await services.windows.apply(window, frame);
    } catch (e) {
      outcome = { status: 'skipped', reason: 'rejected', message: e instanceof Error ? e.message : String(e) };
    }

    if (outcome.status === 'applied') {
      summary.succeeded++;
    } else {
      summary.skipped++;
      summary.skippedWindows.push({
        app: window.app,
        windowId: window.windowId,
        title: window.title,
        reason: outcome.reason,
        message: outcome.message
      });
    }
  }

  log.info({ succeeded: summary.succeeded, skipped: summary.skipped }, 'Window batch applied');
  return summary;
}

function readState(services: PresentationServices): PresentationState | undefined {
  const result = services.state.read();
  switch (result.kind) {
    case 'absent':  return undefined;
    case 'corrupt': throw new StateCorruptError(services.state.path, result.reason);
    case 'present': return result.state;
  }
}

// ---------------------------------------------------------------------------
// Enter
// ---------------------------------------------------------------------------

export async function enterPresentation(
  services: PresentationServices,
  config: PresentationConfig
): Promise<WorkflowReport> {
  const clock = new StepClock(services.now);
  const warnings: string[] = [];

  await clock.step('Checking accessibility permission', async () => {
    if (!(await services.windows.hasPermission())) {
      throw new PermissionDeniedError(services.windows.permissionHost);
    }
  });

  await clock.step('Checking for saved state', () => {
    const existing = readState(services);
    if (existing) throw new StateExistsError(services.state.path, existing.savedAt);
  });

  const { display, original, windows } = await clock.step('Reading display mode and windows', async () => {
    const display = findMainDisplay(await services.display.listDisplays());
    const original = currentMode(display);
    const windows = await services.windows.snapshot();
    return { display, original, windows };
  });
  if (windows.length === 0) {
    warnings.push('No windows to tile on the main display');
  }

  const profile = presentationTarget(config, display.id);
  const target = await clock.step('Selecting presentation mode', () =>
    selectMode(display.modes, profile.target, { filter: config.modeFilter, maxWidthDelta: config.maxWidthDelta })
  );
  log.info({ display: display.id, profile: profile.name, from: describeMode(original), to: describeMode(target) }, 'Mode selected');

  await clock.step('Saving original mode and window frames', () => {
    services.state.write(
      toSavedState(display.id, { modeId: original.modeId, label: describeMode(original) }, windows, new Date(services.now()))
    );
  });

  await clock.step('Switching display mode', async () => {
    if (target.modeId === original.modeId) {
      warnings.push(`Display is already at ${describeMode(target)}`);
      return;
    }
    try {
      await services.display.setMode(display.id, target.modeId);
    } catch (e) {
      // The display never left its original mode, so there is nothing to restore.
      services.state.clear();
      throw e;
    }
  });

  await clock.step(`Waiting ${config.settleDelayMs}ms for the display to settle`, () =>
    services.sleep(config.settleDelayMs)
  );

  const { region, summary } = await clock.step('Tiling windows', async () => {
    const region = await services.windows.visibleRegion();
    const layout = layoutWindows(region, windows, config.padding);
    warnings.push(...layout.warnings);
    const summary = await applyAll(services, tiled(windows, layout.frames));
    return { region, summary };
  });

  await clock.step('Hiding menu bar', async () => {
    if (!(await services.menuBar.setAutoHide(true))) {
      warnings.push('Failed to hide the menu bar');
    }
  });

  return {
    workflow: 'enter',
    displayId: display.id,
    fromMode: describeMode(original),
    toMode: describeMode(target),
    region,
    windows: summary,
    warnings,
    steps: clock.steps,
    elapsedMs: clock.elapsed()
  };
}

// ---------------------------------------------------------------------------
// Exit
// ---------------------------------------------------------------------------

export async function exitPresentation(
  services: PresentationServices,
  config: PresentationConfig
): Promise<WorkflowReport> {
  const clock = new StepClock(services.now);
  const warnings: string[] = [];

  const state = await clock.step('Loading saved state', () => {
    const state = readState(services);
    if (!state) throw new StateAbsentError(services.state.path);
    return state;
  });

  const fromMode = await clock.step('Restoring display mode', async () => {
    const display = findDisplay(await services.display.listDisplays(), state.displayId);
    const before = currentMode(display);
    if (before.modeId === state.originalMode) {
      warnings.push(`Display is already at ${state.originalModeLabel}`);
    } else {
      await services.display.setMode(display.id, state.originalMode);
    }
    return describeMode(before);
  });

  await clock.step(`Waiting ${config.settleDelayMs}ms for the display to settle`, () =>
    services.sleep(config.settleDelayMs)
  );

  const saved = fromSavedState(state);
  const { region, summary } = await clock.step('Restoring windows', async () => {
    if (saved.length > 0 && !(await services.windows.hasPermission())) {
      warnings.push(`Accessibility access missing for "${services.windows.permissionHost}"; windows were left in place`);
      const summary: WindowSummary = {
        total: saved.length,
        succeeded: 0,
        skipped: saved.length,
        skippedWindows: saved.map((w): SkippedWindow => ({ app: w.app, windowId: w.windowId, title: w.title, reason: 'permission-denied' }))
      };
      return { region: undefined, summary };
    }

    if (config.exitLayout === 'tile') {
      const region = await services.windows.visibleRegion();
      const layout = layoutWindows(region, saved, config.padding);
      warnings.push(...layout.warnings);
      return { region, summary: await applyAll(services, tiled(saved, layout.frames)) };
    }
    return { region: undefined, summary: await applyAll(services, saved.map(window => ({ window, frame: window.frame }))) };
  });

  await clock.step('Showing menu bar', async () => {
    if (!(await services.menuBar.setAutoHide(false))) {
      warnings.push('Failed to show the menu bar');
    }
  });

  await clock.step('Clearing saved state', () => services.state.clear());

  return {
    workflow: 'exit',
    displayId: state.displayId,
    fromMode,
    toMode: state.originalModeLabel,
    region,
    windows: summary,
    warnings,
    steps: clock.steps,
    elapsedMs: clock.elapsed()
  };
}
