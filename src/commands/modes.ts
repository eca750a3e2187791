/**
 * commands/modes.ts
 *
 * `presentation-mode modes` — the main display's mode catalog, with the
 * current mode and the one `enter` would pick marked. Useful when tuning
 * the target resolution in the config file.
 */

import { CommandContext, CommandModule, CommandResult, DisplayMode } from '../core/types';
import { registry } from '../core/registry';
import { presentationTarget } from '../core/config';
import { PresentationError } from '../core/errors';
import { findMainDisplay, listModes } from '../tools/display_manager';
import { describeMode, selectMode } from '../tools/mode_selector';

const modesCommand: CommandModule = {
  name: 'modes',
  description: 'List the main display\'s modes and the one enter would select',

  async execute(ctx: CommandContext): Promise<CommandResult> {
    const display = findMainDisplay(await ctx.services.display.listDisplays());
    const profile = presentationTarget(ctx.config, display.id);
    const size = profile.target.height ? `${profile.target.width}x${profile.target.height}` : `width ${profile.target.width}`;

    let selected: DisplayMode | undefined;
    const lines = [
      `Display ${display.id} (${display.type ?? 'unknown type'}), profile "${profile.name}", target ${size}:`
    ];
    try {
      selected = selectMode(listModes(display), profile.target, {
        filter: ctx.config.modeFilter,
        maxWidthDelta: ctx.config.maxWidthDelta
      });
    } catch (e) {
      if (!(e instanceof PresentationError)) throw e;
      lines.push(`   Warning: ${e.message}`);
    }

    for (const mode of listModes(display)) {
      const marks = [mode.current ? 'current' : '', mode === selected ? 'selected' : ''].filter(Boolean);
      const suffix = marks.length > 0 ? `  <- ${marks.join(', ')}` : '';
      lines.push(`   mode ${mode.modeId}: ${describeMode(mode)}${suffix}`);
    }

    return { success: true, lines, data: { display: display.id, modes: display.modes, selected }, durationMs: 0 };
  }
};

// Self-register
registry.register(modesCommand);

export default modesCommand;
