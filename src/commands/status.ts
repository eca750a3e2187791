/**
 * commands/status.ts
 *
 * `presentation-mode status` — read-only look at the saved state.
 */

import { CommandContext, CommandModule, CommandResult } from '../core/types';
import { registry } from '../core/registry';
import { StateCorruptError } from '../core/errors';

const statusCommand: CommandModule = {
  name: 'status',
  description: 'Show whether presentation mode is active and what will be restored',

  async execute(ctx: CommandContext): Promise<CommandResult> {
    const store = ctx.services.state;
    const result = store.read();

    switch (result.kind) {
      case 'absent':
        return {
          success: true,
          lines: ['Not in presentation mode.'],
          data: { active: false },
          durationMs: 0
        };

      case 'corrupt':
        throw new StateCorruptError(store.path, result.reason);

      case 'present': {
        const { state } = result;
        const lines = [
          `In presentation mode since ${state.savedAt}.`,
          `   Display ${state.displayId} will be restored to ${state.originalModeLabel} (mode ${state.originalMode})`,
          `   ${state.windows.length} window(s) saved in ${store.path}`
        ];
        if (ctx.flags.verbose) {
          for (const w of state.windows) {
            const title = w.title ? ` "${w.title}"` : '';
            lines.push(`     - ${w.app}${title} #${w.windowId}: ${w.width}x${w.height} at (${w.x}, ${w.y})`);
          }
        }
        return { success: true, lines, data: { active: true, state }, durationMs: 0 };
      }
    }
  }
};

// Self-register
registry.register(statusCommand);

export default statusCommand;
