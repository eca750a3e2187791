/**
 * commands/exit.ts
 *
 * `presentation-mode exit` — restore the saved resolution and windows.
 */

import { CommandContext, CommandModule, CommandResult } from '../core/types';
import { registry } from '../core/registry';
import { exitPresentation } from '../workflows/presentation';
import { formatReport } from './report';

const exitCommand: CommandModule = {
  name: 'exit',
  description: 'Restore the original resolution, windows and menu bar',

  async execute(ctx: CommandContext): Promise<CommandResult> {
    const report = await exitPresentation(ctx.services, ctx.config);
    return {
      success: true,
      lines: ['Exiting presentation mode...', ...formatReport(report, ctx.flags.verbose)],
      data: report,
      durationMs: 0
    };
  }
};

// Self-register
registry.register(exitCommand);

export default exitCommand;
