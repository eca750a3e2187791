/**
 * tools/mode_selector.ts
 *
 * Picks the display mode `enter` switches to. Pure: takes the catalog
 * read by display_manager and returns one of its entries.
 */

import { DisplayMode, ModeFilter, ModeTarget } from '../core/types';
import { ModeNotFoundError } from '../core/errors';

export interface SelectOptions {
  filter: ModeFilter;
  maxWidthDelta?: number;
}

function passesFilter(mode: DisplayMode, target: ModeTarget, filter: ModeFilter): boolean {
  switch (filter) {
    case 'scaled':      return mode.scaled;
    case 'exact-width': return mode.width === target.width;
  }
}

/**
 * Exact width wins; otherwise the nearest width. Ties go to the nearer
 * height (when the target names one), then the higher refresh rate, then
 * catalog order.
 */
export function selectMode(modes: DisplayMode[], target: ModeTarget, options: SelectOptions): DisplayMode {
  const candidates = modes
    .map((mode, index) => ({ mode, index, widthDelta: Math.abs(mode.width - target.width) }))
    .filter(c => passesFilter(c.mode, target, options.filter))
    .filter(c => options.maxWidthDelta === undefined || c.widthDelta <= options.maxWidthDelta);

  const heightDelta = (mode: DisplayMode): number =>
    target.height === undefined ? 0 : Math.abs(mode.height - target.height);

  candidates.sort((a, b) =>
    a.widthDelta - b.widthDelta ||
    heightDelta(a.mode) - heightDelta(b.mode) ||
    b.mode.refreshRate - a.mode.refreshRate ||
    a.index - b.index
  );

  const best = candidates[0];
  if (!best) {
    throw new ModeNotFoundError(modes[0]?.displayId ?? 'unknown', target, options.filter);
  }
  return best.mode;
}

/** "1280x720 @60Hz scaled", as modes appear in reports and saved state. */
export function describeMode(mode: DisplayMode): string {
  return `${mode.width}x${mode.height} @${mode.refreshRate}Hz${mode.scaled ? ' scaled' : ''}`;
}
