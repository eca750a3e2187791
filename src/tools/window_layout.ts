/**
 * tools/window_layout.ts
 *
 * Full-bleed tiling: every window gets the same frame, the visible
 * region inset by the configured padding. Used on enter, and on exit
 * when exitLayout is "tile". Callers pass a freshly queried region.
 */

import { PaddingConfig, Rect, WindowRecord } from '../core/types';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('tools/window_layout');

const MIN_SIDE = 1;

export interface TileFrame {
  frame: Rect;
  warnings: string[];
}

export function computeTileFrame(region: Rect, padding: PaddingConfig): TileFrame {
  const warnings: string[] = [];

  let width = region.width - padding.left - padding.right;
  let height = region.height - padding.top - padding.bottom;

  if (width < MIN_SIDE) {
    warnings.push(
      `Horizontal padding (${padding.left}+${padding.right}) leaves no room in a ${region.width}px wide region; width clamped to ${MIN_SIDE}px`
    );
    width = MIN_SIDE;
  }
  if (height < MIN_SIDE) {
    warnings.push(
      `Vertical padding (${padding.top}+${padding.bottom}) leaves no room in a ${region.height}px tall region; height clamped to ${MIN_SIDE}px`
    );
    height = MIN_SIDE;
  }

  for (const warning of warnings) log.warn({ region, padding }, warning);

  return {
    frame: {
      x: region.x + padding.left,
      y: region.y + padding.top,
      width,
      height
    },
    warnings
  };
}

export interface WindowLayout {
  frames: Map<number, Rect>;               // windowId → target frame
  warnings: string[];
}

export function layoutWindows(region: Rect, windows: WindowRecord[], padding: PaddingConfig): WindowLayout {
  const { frame, warnings } = computeTileFrame(region, padding);
  const frames = new Map<number, Rect>();
  for (const w of windows) {
    frames.set(w.windowId, { ...frame });
  }
  return { frames, warnings };
}
