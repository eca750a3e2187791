import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { enterPresentation, exitPresentation } from '../workflows/presentation';
import { DEFAULT_CONFIG } from '../core/config';
import { FileStateStore } from '../tools/state_store';
import { formatWindowCounts } from '../commands/report';
import { PresentationConfig } from '../core/types';
import {
  DisplayError,
  ModeNotFoundError,
  PermissionDeniedError,
  StateAbsentError,
  StateCorruptError,
  StateExistsError
} from '../core/errors';
import { DISPLAY_ID, FakeDesktop, MemoryStateStore, fakeWindow } from './helpers/fakeDesktop';

const config: PresentationConfig = { ...DEFAULT_CONFIG, stateFile: '/unused' };

const TILE = { x: 12, y: 37, width: 1256, height: 751 };   // mode 2 region inset by 12px

function threeWindows() {
  return [
    fakeWindow(1, 'Safari', { x: 100, y: 60, width: 900, height: 700 }),
    fakeWindow(2, 'Terminal', { x: 40, y: 300, width: 640, height: 420 }),
    fakeWindow(3, 'Notes', { x: 820, y: 120, width: 500, height: 600 })
  ];
}

describe('Presentation workflows', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'presentation-mode-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('enter', () => {
    it('should save state, switch to the profile mode, tile every window and hide the menu bar', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      const store = new MemoryStateStore();

      const report = await enterPresentation(desktop.services(store), config);

      expect(desktop.modeSwitches).toEqual([{ displayId: DISPLAY_ID, modeId: '2' }]);
      expect(desktop.sleeps).toEqual([2000]);
      expect(desktop.frameOf(1)).toEqual(TILE);
      expect(desktop.frameOf(2)).toEqual(TILE);
      expect(desktop.frameOf(3)).toEqual(TILE);
      expect(desktop.menuBarAutoHide).toBe(true);

      expect(store.saved?.displayId).toBe(DISPLAY_ID);
      expect(store.saved?.originalMode).toBe('1');
      expect(store.saved?.originalModeLabel).toBe('1728x1117 @120Hz scaled');
      expect(store.saved?.windows.map(w => w.windowId)).toEqual([1, 2, 3]);
      expect(store.saved?.windows[0]).toEqual({
        app: 'Safari', pid: 1001, windowId: 1, axIndex: 0, title: 'Safari 1',
        x: 100, y: 60, width: 900, height: 700
      });

      expect(report.fromMode).toBe('1728x1117 @120Hz scaled');
      expect(report.toMode).toBe('1280x800 @60Hz scaled');
      expect(report.region).toEqual({ x: 0, y: 25, width: 1280, height: 775 });
      expect(report.windows.succeeded).toBe(3);
      expect(report.warnings).toEqual([]);
      expect(report.steps.map(s => s.label)).toEqual([
        'Checking accessibility permission',
        'Checking for saved state',
        'Reading display mode and windows',
        'Selecting presentation mode',
        'Saving original mode and window frames',
        'Switching display mode',
        'Waiting 2000ms for the display to settle',
        'Tiling windows',
        'Hiding menu bar'
      ]);
    });

    it('should fail fast without accessibility permission and leave no state behind', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      desktop.permission = false;
      const store = new MemoryStateStore();

      await expect(enterPresentation(desktop.services(store), config)).rejects.toBeInstanceOf(PermissionDeniedError);
      expect(store.writes).toBe(0);
      expect(desktop.modeSwitches).toEqual([]);
      expect(desktop.menuBarAutoHide).toBe(false);
    });

    it('should stop before saving state when System Events refuses the window listing', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      desktop.automationDenied = true;
      const store = new MemoryStateStore();

      await expect(enterPresentation(desktop.services(store), config)).rejects.toThrow(
        'Privacy & Security → Automation, enable "System Events" under "Terminal"'
      );
      expect(store.writes).toBe(0);
      expect(desktop.modeSwitches).toEqual([]);
    });

    it('should name the remediation steps in the permission error', async () => {
      const desktop = FakeDesktop.retina([]);
      desktop.permission = false;

      await expect(enterPresentation(desktop.services(new MemoryStateStore()), config)).rejects.toThrow(
        'Privacy & Security → Accessibility, enable "Terminal"'
      );
    });

    it('should refuse to overwrite an existing saved state', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      const store = new MemoryStateStore();
      await enterPresentation(desktop.services(store), config);
      const firstState = store.saved;

      await expect(enterPresentation(desktop.services(store), config)).rejects.toBeInstanceOf(StateExistsError);
      expect(store.saved).toEqual(firstState);
      expect(store.writes).toBe(1);
      expect(desktop.modeSwitches).toHaveLength(1);
    });

    it('should report a corrupt state file instead of entering', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      const store = new MemoryStateStore();
      store.corruptReason = 'not valid JSON';

      await expect(enterPresentation(desktop.services(store), config)).rejects.toBeInstanceOf(StateCorruptError);
      expect(desktop.modeSwitches).toEqual([]);
    });

    it('should abort before writing state when no mode matches', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      for (const m of desktop.display.modes) m.scaled = false;
      const store = new MemoryStateStore();

      await expect(enterPresentation(desktop.services(store), config)).rejects.toBeInstanceOf(ModeNotFoundError);
      expect(store.writes).toBe(0);
      expect(desktop.modeSwitches).toEqual([]);
    });

    it('should clear the saved state again when the mode switch fails', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      desktop.setModeFails = true;
      const store = new MemoryStateStore();

      await expect(enterPresentation(desktop.services(store), config)).rejects.toBeInstanceOf(DisplayError);
      expect(store.writes).toBe(1);
      expect(store.read()).toEqual({ kind: 'absent' });
      expect(desktop.frameOf(1)).toEqual({ x: 100, y: 60, width: 900, height: 700 });
    });

    it('should finish with 3 succeeded, 2 skipped when two windows refuse to move', async () => {
      const windows = [
        ...threeWindows(),
        fakeWindow(4, 'Preview', { x: 10, y: 40, width: 300, height: 300 }),
        fakeWindow(5, 'Mail', { x: 60, y: 80, width: 700, height: 500 })
      ];
      windows[1].failWith = 'rejected';
      windows[3].failWith = 'permission-denied';
      const desktop = FakeDesktop.retina(windows);
      const store = new MemoryStateStore();

      const report = await enterPresentation(desktop.services(store), config);

      expect(formatWindowCounts(report.windows)).toBe('3 succeeded, 2 skipped');
      expect(report.windows.skippedWindows.map(w => [w.windowId, w.reason])).toEqual([
        [2, 'rejected'],
        [4, 'permission-denied']
      ]);
      expect(desktop.menuBarAutoHide).toBe(true);
      expect(store.saved?.windows).toHaveLength(5);
    });

    it('should warn, not fail, when there are no windows or the menu bar cannot be hidden', async () => {
      const desktop = FakeDesktop.retina([]);
      desktop.menuBarFails = true;

      const report = await enterPresentation(desktop.services(new MemoryStateStore()), config);

      expect(report.windows).toEqual({ total: 0, succeeded: 0, skipped: 0, skippedWindows: [] });
      expect(report.warnings).toEqual([
        'No windows to tile on the main display',
        'Failed to hide the menu bar'
      ]);
    });

    it('should not switch when the display is already at the presentation mode', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      for (const m of desktop.display.modes) m.current = m.modeId === '2';

      const report = await enterPresentation(desktop.services(new MemoryStateStore()), config);

      expect(desktop.modeSwitches).toEqual([]);
      expect(report.warnings).toEqual(['Display is already at 1280x800 @60Hz scaled']);
    });

    it('should fall back to the default target for displays without a profile', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      const store = new MemoryStateStore();
      const noProfiles: PresentationConfig = { ...config, displays: {}, target: { width: 1000 } };

      await enterPresentation(desktop.services(store), noProfiles);

      // 1024 is the nearest scaled width to 1000
      expect(desktop.modeSwitches).toEqual([{ displayId: DISPLAY_ID, modeId: '4' }]);
    });
  });

  describe('exit', () => {
    it('should restore the original mode and every window frame exactly, then delete the state file', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      const store = new FileStateStore(path.join(tmpDir, 'state.json'));

      await enterPresentation(desktop.services(store), config);
      expect(fs.existsSync(store.path)).toBe(true);

      const report = await exitPresentation(desktop.services(store), config);

      expect(desktop.currentModeId()).toBe('1');
      expect(desktop.frameOf(1)).toEqual({ x: 100, y: 60, width: 900, height: 700 });
      expect(desktop.frameOf(2)).toEqual({ x: 40, y: 300, width: 640, height: 420 });
      expect(desktop.frameOf(3)).toEqual({ x: 820, y: 120, width: 500, height: 600 });
      expect(desktop.menuBarAutoHide).toBe(false);
      expect(fs.existsSync(store.path)).toBe(false);

      expect(report.fromMode).toBe('1280x800 @60Hz scaled');
      expect(report.toMode).toBe('1728x1117 @120Hz scaled');
      expect(report.windows.succeeded).toBe(3);
      expect(desktop.modeSwitches).toEqual([
        { displayId: DISPLAY_ID, modeId: '2' },
        { displayId: DISPLAY_ID, modeId: '1' }
      ]);
    });

    it('should return StateAbsent and touch nothing when there is no saved state', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      desktop.menuBarAutoHide = true;

      await expect(exitPresentation(desktop.services(new MemoryStateStore()), config)).rejects.toBeInstanceOf(StateAbsentError);
      expect(desktop.modeSwitches).toEqual([]);
      expect(desktop.applyCalls).toEqual([]);
      expect(desktop.menuBarAutoHide).toBe(true);
    });

    it('should refuse to guess a restore target from a corrupt state file', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      const store = new MemoryStateStore();
      store.corruptReason = 'must have required property \'originalMode\'';

      await expect(exitPresentation(desktop.services(store), config)).rejects.toThrow(
        'delete the file by hand'
      );
      expect(desktop.modeSwitches).toEqual([]);
    });

    it('should skip windows that closed while presenting and still clear the state', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      const store = new MemoryStateStore();
      await enterPresentation(desktop.services(store), config);
      desktop.windows[0].gone = true;
      desktop.windows[2].failWith = 'rejected';

      const report = await exitPresentation(desktop.services(store), config);

      expect(formatWindowCounts(report.windows)).toBe('1 succeeded, 2 skipped');
      expect(report.windows.skippedWindows.map(w => w.reason)).toEqual(['window-missing', 'rejected']);
      expect(desktop.frameOf(2)).toEqual({ x: 40, y: 300, width: 640, height: 420 });
      expect(desktop.menuBarAutoHide).toBe(false);
      expect(store.read()).toEqual({ kind: 'absent' });
    });

    it('should re-tile against the restored region when exitLayout is "tile"', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      const store = new MemoryStateStore();
      const tileConfig: PresentationConfig = { ...config, exitLayout: 'tile' };
      await enterPresentation(desktop.services(store), tileConfig);

      const report = await exitPresentation(desktop.services(store), tileConfig);

      const restoredTile = { x: 12, y: 50, width: 1704, height: 1055 };
      expect(report.region).toEqual({ x: 0, y: 38, width: 1728, height: 1079 });
      expect(desktop.frameOf(1)).toEqual(restoredTile);
      expect(desktop.frameOf(3)).toEqual(restoredTile);
    });

    it('should still restore the display when accessibility access was revoked', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      const store = new MemoryStateStore();
      await enterPresentation(desktop.services(store), config);
      desktop.permission = false;
      const callsBefore = desktop.applyCalls.length;

      const report = await exitPresentation(desktop.services(store), config);

      expect(desktop.currentModeId()).toBe('1');
      expect(desktop.applyCalls).toHaveLength(callsBefore);
      expect(formatWindowCounts(report.windows)).toBe('0 succeeded, 3 skipped');
      expect(report.warnings).toEqual([
        'Accessibility access missing for "Terminal"; windows were left in place'
      ]);
      expect(store.read()).toEqual({ kind: 'absent' });
    });

    it('should keep the saved state when the original mode cannot be restored', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      const store = new MemoryStateStore();
      await enterPresentation(desktop.services(store), config);
      desktop.setModeFails = true;

      await expect(exitPresentation(desktop.services(store), config)).rejects.toBeInstanceOf(DisplayError);
      expect(store.read().kind).toBe('present');
    });

    it('should not switch modes when the display was already restored by hand', async () => {
      const desktop = FakeDesktop.retina(threeWindows());
      const store = new MemoryStateStore();
      await enterPresentation(desktop.services(store), config);
      for (const m of desktop.display.modes) m.current = m.modeId === '1';

      const report = await exitPresentation(desktop.services(store), config);

      expect(desktop.modeSwitches).toHaveLength(1);
      expect(report.warnings).toEqual(['Display is already at 1728x1117 @120Hz scaled']);
    });
  });
});
