/**
 * tools/window_manager.ts
 *
 * Enumerates and moves application windows on the main display.
 * All macOS calls go through JavaScript for Automation (osascript -l JavaScript):
 *   - CoreGraphics CGWindowListCopyWindowInfo for the on-screen window list
 *     (front-to-back, with owner pid, layer, alpha and bounds);
 *   - System Events (the accessibility API) for per-window position/size,
 *     which is what actually moves another application's window;
 *   - AXIsProcessTrusted for the permission check;
 *   - NSScreen for the visible region (menu bar and dock excluded).
 *
 * Filtering lives in selectTileableWindows() so it can be tested without a Mac.
 */

import Ajv from 'ajv';
import type { SchemaObject } from 'ajv';
import { ApplyOutcome, Rect, SkipReason, WindowRecord, WindowService } from '../core/types';
import { ExecutionError, PermissionDeniedError } from '../core/errors';
import { jxa, parseJson } from '../core/exec';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('tools/window_manager');
const ajv = new Ajv({ allErrors: true });

// ---------------------------------------------------------------------------
// JXA scripts
// ---------------------------------------------------------------------------

export const PERMISSION_SCRIPT = `
  ObjC.import('ApplicationServices');
  JSON.stringify({ trusted: $.AXIsProcessTrusted() === true });
`;

// NSScreen uses a bottom-left origin; convert to the top-left origin windows use.
export const VISIBLE_REGION_SCRIPT = `
  ObjC.import('AppKit');
  const screen = $.NSScreen.screens.objectAtIndex(0);
  const full = screen.frame;
  const visible = screen.visibleFrame;
  JSON.stringify({
    x: visible.origin.x,
    y: full.size.height - (visible.origin.y + visible.size.height),
    width: visible.size.width,
    height: visible.size.height
  });
`;

export const SNAPSHOT_SCRIPT = `
  ObjC.import('CoreGraphics');
  ObjC.import('AppKit');
  function run(argv) {
    const options = $.kCGWindowListOptionOnScreenOnly | $.kCGWindowListExcludeDesktopElements;
    const list = ObjC.deepUnwrap(ObjC.castRefToObject($.CGWindowListCopyWindowInfo(options, $.kCGNullWindowID))) || [];
    const frame = $.NSScreen.screens.objectAtIndex(0).frame;
    const skip = new Set(JSON.parse(argv[0] || '[]'));

    const windows = list.map(w => ({
      pid: w.kCGWindowOwnerPID,
      owner: w.kCGWindowOwnerName || '',
      windowNumber: w.kCGWindowNumber,
      layer: w.kCGWindowLayer,
      alpha: w.kCGWindowAlpha === undefined ? 1 : w.kCGWindowAlpha,
      x: w.kCGWindowBounds.X,
      y: w.kCGWindowBounds.Y,
      width: w.kCGWindowBounds.Width,
      height: w.kCGWindowBounds.Height
    }));

    const se = Application('System Events');
    const ax = {};
    for (const w of windows) {
      if (w.layer !== 0 || skip.has(w.owner) || ax[w.pid] !== undefined) continue;
      ax[w.pid] = [];
      try {
        const procs = se.processes.whose({ unixId: w.pid });
        if (procs.length === 0) continue;
        const axWindows = procs[0].windows();
        axWindows.forEach((win, index) => {
          let minimized = false;
          try { minimized = win.attributes.byName('AXMinimized').value() === true; } catch (e) {}
          const position = win.position();
          const size = win.size();
          ax[w.pid].push({
            index: index,
            title: win.name() || '',
            x: position[0], y: position[1], width: size[0], height: size[1],
            minimized: minimized
          });
        });
      } catch (e) {
        // A denied grant fails every process the same way; surface it instead of an empty list.
        if (/-1743|-1719|-25211|not authori[sz]ed|assistive access/i.test(String(e))) throw e;
        ax[w.pid] = [];
      }
    }

    return JSON.stringify({
      screen: { width: frame.size.width, height: frame.size.height },
      windows: windows,
      ax: ax
    });
  }
`;

// argv: pid, axIndex, title, x, y, width, height
export const APPLY_SCRIPT = `
  function run(argv) {
    const pid = Number(argv[0]);
    const index = Number(argv[1]);
    const title = argv[2];
    const frame = argv.slice(3, 7).map(Number);
    const se = Application('System Events');
    const procs = se.processes.whose({ unixId: pid });
    if (procs.length === 0) return JSON.stringify({ status: 'skipped', reason: 'app-missing' });

    const windows = procs[0].windows();
    let target = null;
    if (index < windows.length && (title === '' || windows[index].name() === title)) {
      target = windows[index];
    } else if (title !== '') {
      target = windows.find(w => w.name() === title) || null;
    }
    // The title changed since the snapshot (a browser tab switch, say); trust the index.
    if (target === null && index < windows.length) target = windows[index];
    if (target === null) return JSON.stringify({ status: 'skipped', reason: 'window-missing' });

    try {
      target.position = [frame[0], frame[1]];
      target.size = [frame[2], frame[3]];
    } catch (e) {
      return JSON.stringify({ status: 'skipped', reason: 'rejected', message: String(e) });
    }
    return JSON.stringify({ status: 'applied' });
  }
`;

// ---------------------------------------------------------------------------
// Script output schemas
// ---------------------------------------------------------------------------

export interface RawCgWindow {
  pid: number;
  owner: string;
  windowNumber: number;
  layer: number;
  alpha: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RawAxWindow {
  index: number;
  title: string;
  x: number;
  y: number;
  width: number;
  height: number;
  minimized: boolean;
}

export interface RawSnapshot {
  screen: { width: number; height: number };
  windows: RawCgWindow[];
  ax: Record<string, RawAxWindow[]>;
}

const num = { type: 'number' };

const snapshotSchema: SchemaObject = {
  type: 'object',
  properties: {
    screen: {
      type: 'object',
      properties: { width: num, height: num },
      required: ['width', 'height']
    },
    windows: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          pid: num, owner: { type: 'string' }, windowNumber: num, layer: num, alpha: num,
          x: num, y: num, width: num, height: num
        },
        required: ['pid', 'owner', 'windowNumber', 'layer', 'alpha', 'x', 'y', 'width', 'height']
      }
    },
    ax: {
      type: 'object',
      additionalProperties: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            index: num, title: { type: 'string' }, x: num, y: num, width: num, height: num,
            minimized: { type: 'boolean' }
          },
          required: ['index', 'title', 'x', 'y', 'width', 'height', 'minimized']
        }
      }
    }
  },
  required: ['screen', 'windows', 'ax']
};

const rectSchema: SchemaObject = {
  type: 'object',
  properties: { x: num, y: num, width: num, height: num },
  required: ['x', 'y', 'width', 'height']
};

const applySchema: SchemaObject = {
  type: 'object',
  properties: {
    status: { enum: ['applied', 'skipped'] },
    reason: { enum: ['app-missing', 'window-missing', 'rejected', 'permission-denied'] },
    message: { type: 'string' }
  },
  required: ['status'],
  if: { properties: { status: { const: 'skipped' } } },
  then: { required: ['reason'] }
};

const validateSnapshot = ajv.compile<RawSnapshot>(snapshotSchema);
const validateRect = ajv.compile<Rect>(rectSchema);
const validatePermission = ajv.compile<{ trusted: boolean }>({
  type: 'object',
  properties: { trusted: { type: 'boolean' } },
  required: ['trusted']
});
const validateApply = ajv.compile<ApplyOutcome>(applySchema);

// ---------------------------------------------------------------------------
// Filtering (pure)
// ---------------------------------------------------------------------------

export interface SnapshotOptions {
  skipApps: string[];
  minWindowSize: number;
}

const FRAME_TOLERANCE = 1;

function sameFrame(a: Rect, b: Rect): boolean {
  return Math.abs(a.x - b.x) <= FRAME_TOLERANCE &&
    Math.abs(a.y - b.y) <= FRAME_TOLERANCE &&
    Math.abs(a.width - b.width) <= FRAME_TOLERANCE &&
    Math.abs(a.height - b.height) <= FRAME_TOLERANCE;
}

/**
 * Keep the windows a user could tile: normal layer, visible, not a system
 * surface, big enough, centred on the main display, and backed by an
 * accessibility window we can address later. Front-to-back order is kept.
 */
export function selectTileableWindows(raw: RawSnapshot, options: SnapshotOptions): WindowRecord[] {
  const skip = new Set(options.skipApps);
  const claimed = new Set<string>();
  const records: WindowRecord[] = [];

  for (const w of raw.windows) {
    if (w.layer !== 0 || w.alpha <= 0) continue;
    if (skip.has(w.owner)) continue;
    if (w.width < options.minWindowSize || w.height < options.minWindowSize) continue;

    const centreX = w.x + w.width / 2;
    const centreY = w.y + w.height / 2;
    if (centreX < 0 || centreX >= raw.screen.width || centreY < 0 || centreY >= raw.screen.height) continue;

    const frame: Rect = { x: w.x, y: w.y, width: w.width, height: w.height };
    const match = (raw.ax[String(w.pid)] ?? []).find(a =>
      !a.minimized && !claimed.has(`${w.pid}:${a.index}`) && sameFrame(a, frame)
    );
    if (!match) {
      log.debug({ owner: w.owner, windowNumber: w.windowNumber }, 'No accessibility window matches, skipped');
      continue;
    }
    claimed.add(`${w.pid}:${match.index}`);

    records.push({
      app: w.owner,
      pid: w.pid,
      windowId: w.windowNumber,
      axIndex: match.index,
      title: match.title,
      frame
    });
  }

  return records;
}

const PERMISSION_PATTERNS = ['-1743', '-1719', '-25211', 'assistive access', 'not allowed to send keystrokes', 'not authorized'];

export function classifyFailure(message: string): SkipReason {
  const lower = message.toLowerCase();
  return PERMISSION_PATTERNS.some(p => lower.includes(p)) ? 'permission-denied' : 'rejected';
}

// ---------------------------------------------------------------------------
// osascript-backed WindowService
// ---------------------------------------------------------------------------

export class AccessibilityWindowService implements WindowService {
  constructor(
    private readonly options: SnapshotOptions,
    private readonly timeoutMs: number,
    readonly permissionHost: string
  ) {}

  async hasPermission(): Promise<boolean> {
    const parsed = parseJson('window_manager', jxa('window_manager', PERMISSION_SCRIPT, [], this.timeoutMs));
    if (!validatePermission(parsed)) {
      throw new ExecutionError('window_manager', 'Unexpected permission check output', { errors: validatePermission.errors });
    }
    log.debug({ trusted: parsed.trusted }, 'Accessibility permission checked');
    return parsed.trusted;
  }

  async visibleRegion(): Promise<Rect> {
    const parsed = parseJson('window_manager', jxa('window_manager', VISIBLE_REGION_SCRIPT, [], this.timeoutMs));
    if (!validateRect(parsed)) {
      throw new ExecutionError('window_manager', 'Unexpected visible region output', { errors: validateRect.errors });
    }
    const region: Rect = {
      x: Math.round(parsed.x),
      y: Math.round(parsed.y),
      width: Math.round(parsed.width),
      height: Math.round(parsed.height)
    };
    log.debug({ region }, 'Visible region read');
    return region;
  }

  async snapshot(): Promise<WindowRecord[]> {
    let raw: string;
    try {
      raw = jxa('window_manager', SNAPSHOT_SCRIPT, [JSON.stringify(this.options.skipApps)], this.timeoutMs);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      if (classifyFailure(message) === 'permission-denied') {
        log.warn({ message }, 'System Events refused the window listing');
        throw new PermissionDeniedError(this.permissionHost, 'Automation');
      }
      throw e;
    }
    const parsed = parseJson('window_manager', raw);
    if (!validateSnapshot(parsed)) {
      throw new ExecutionError('window_manager', 'Unexpected window snapshot output', { errors: validateSnapshot.errors });
    }
    const records = selectTileableWindows(parsed, this.options);
    log.info({ onScreen: parsed.windows.length, tileable: records.length }, 'Window snapshot taken');
    return records;
  }

  async apply(window: WindowRecord, frame: Rect): Promise<ApplyOutcome> {
    const argv = [
      String(window.pid),
      String(window.axIndex),
      window.title,
      ...[frame.x, frame.y, frame.width, frame.height].map(v => String(Math.round(v)))
    ];

    let raw: string;
    try {
      raw = jxa('window_manager', APPLY_SCRIPT, argv, this.timeoutMs);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      log.debug({ app: window.app, windowId: window.windowId, message }, 'Window move failed');
      return { status: 'skipped', reason: classifyFailure(message), message };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return { status: 'skipped', reason: 'rejected', message: `unexpected output: ${raw.slice(0, 200)}` };
    }
    if (!validateApply(parsed)) {
      return { status: 'skipped', reason: 'rejected', message: `unexpected output: ${raw.slice(0, 200)}` };
    }
    if (parsed.status === 'skipped') {
      // System Events reports a missing grant as an ordinary setter error
      const reason = parsed.reason === 'rejected' && parsed.message
        ? classifyFailure(parsed.message)
        : parsed.reason;
      log.debug({ app: window.app, windowId: window.windowId, reason }, 'Window skipped');
      return { ...parsed, reason };
    }
    return parsed;
  }
}
