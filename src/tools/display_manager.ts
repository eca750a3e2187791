/**
 * tools/display_manager.ts
 *
 * Reads the display-mode catalog and switches modes through displayplacer
 * (https://github.com/jakehilborn/displayplacer, installed via Homebrew).
 *
 * `displayplacer list` prints one block per display:
 *
 *   Persistent screen id: 37D8832A-2D66-02CA-B9F7-8F30A301B230
 *   Contextual screen id: 1
 *   Serial screen id: s4251086178
 *   Type: MacBook built in screen
 *   Resolution: 1728x1117
 *   Hertz: 120
 *   Color Depth: 8
 *   Scaling: on
 *   Origin: (0,0) - main display
 *   Rotation: 0
 *   Enabled: true
 *   Resolutions for rotation 0:
 *     mode 0: res:3456x2234 hz:120 color_depth:8
 *     mode 1: res:1728x1117 hz:120 color_depth:8 scaling:on <-- current mode
 *
 * followed by an "Execute the command below…" footer that we ignore.
 */

import { DisplayInfo, DisplayMode, DisplayService } from '../core/types';
import { DisplayError, DisplayNotFoundError } from '../core/errors';
import { run } from '../core/exec';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('tools/display_manager');

const MODE_LINE = /^\s*mode (\d+): res:(\d+)x(\d+)(?: hz:(\d+))?(?: color_depth:\d+)?(?: scaling:(on|off))?(.*)$/;
const HEADER_LINE = /^([A-Za-z ]+):\s*(.*)$/;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

interface DisplayDraft {
  fields: Map<string, string>;
  modes: Array<Omit<DisplayMode, 'displayId'>>;
}

function finishDisplay(draft: DisplayDraft): DisplayInfo | undefined {
  const persistentId = draft.fields.get('Persistent screen id');
  if (!persistentId) return undefined;

  const serialId = draft.fields.get('Serial screen id');
  const id = serialId || persistentId;
  const origin = draft.fields.get('Origin') ?? '';

  return {
    id,
    persistentId,
    serialId,
    type: draft.fields.get('Type'),
    isMain: origin.toLowerCase().includes('main display'),
    modes: draft.modes.map(m => ({ displayId: id, ...m }))
  };
}

/** Parse the full output of `displayplacer list`. */
export function parseDisplayList(output: string): DisplayInfo[] {
  const displays: DisplayInfo[] = [];
  let draft: DisplayDraft | undefined;

  const flush = (): void => {
    if (draft) {
      const display = finishDisplay(draft);
      if (display) displays.push(display);
    }
    draft = undefined;
  };

  for (const line of output.split('\n')) {
    if (line.startsWith('Persistent screen id:')) {
      flush();
      draft = { fields: new Map(), modes: [] };
    }
    if (line.startsWith('Execute the command below')) break;
    if (!draft) continue;

    const mode = MODE_LINE.exec(line);
    if (mode) {
      draft.modes.push({
        modeId: mode[1],
        width: Number(mode[2]),
        height: Number(mode[3]),
        refreshRate: mode[4] ? Number(mode[4]) : 0,
        scaled: mode[5] === 'on',
        current: (mode[6] ?? '').includes('current mode')
      });
      continue;
    }

    const header = HEADER_LINE.exec(line);
    if (header && !line.startsWith(' ')) {
      draft.fields.set(header[1].trim(), header[2].trim());
    }
  }
  flush();

  return displays;
}

// ---------------------------------------------------------------------------
// Catalog queries
// ---------------------------------------------------------------------------

export function findMainDisplay(displays: DisplayInfo[]): DisplayInfo {
  const main = displays.find(d => d.isMain);
  if (!main) throw new DisplayNotFoundError();
  return main;
}

export function findDisplay(displays: DisplayInfo[], displayId: string): DisplayInfo {
  const display = displays.find(d =>
    d.id === displayId || d.serialId === displayId || d.persistentId === displayId
  );
  if (!display) throw new DisplayNotFoundError(displayId);
  return display;
}

export function listModes(display: DisplayInfo): DisplayMode[] {
  return display.modes;
}

export function currentMode(display: DisplayInfo): DisplayMode {
  const current = display.modes.find(m => m.current);
  if (!current) {
    throw new DisplayError(`displayplacer did not mark a current mode for display ${display.id}`, {
      displayId: display.id
    });
  }
  return current;
}

// ---------------------------------------------------------------------------
// displayplacer-backed DisplayService
// ---------------------------------------------------------------------------

export class DisplayplacerService implements DisplayService {
  constructor(
    private readonly binaryPath: string,
    private readonly timeoutMs: number
  ) {}

  async listDisplays(): Promise<DisplayInfo[]> {
    const output = this.exec(['list']);
    const displays = parseDisplayList(output);
    if (displays.length === 0) {
      throw new DisplayError('displayplacer listed no displays', { output: output.slice(0, 500) });
    }
    log.debug({ displays: displays.map(d => ({ id: d.id, main: d.isMain, modes: d.modes.length })) }, 'Display catalog read');
    return displays;
  }

  async setMode(displayId: string, modeId: string): Promise<void> {
    log.info({ displayId, modeId }, 'Switching display mode');
    this.exec([`id:${displayId} mode:${modeId}`]);
  }

  private exec(args: string[]): string {
    try {
      return run('display_manager', this.binaryPath, args, this.timeoutMs);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new DisplayError(`displayplacer ${args.join(' ')} failed: ${message}`, { binary: this.binaryPath });
    }
  }
}
