/**
 * commands/enter.ts
 *
 * `presentation-mode enter` — switch to the presentation resolution and tile windows.
 */

import { CommandContext, CommandModule, CommandResult } from '../core/types';
import { registry } from '../core/registry';
import { enterPresentation } from '../workflows/presentation';
import { formatReport } from './report';

const enterCommand: CommandModule = {
  name: 'enter',
  description: 'Lower the resolution, tile windows and hide the menu bar',

  async execute(ctx: CommandContext): Promise<CommandResult> {
    const report = await enterPresentation(ctx.services, ctx.config);
    return {
      success: true,
      lines: ['Entering presentation mode...', ...formatReport(report, ctx.flags.verbose)],
      data: report,
      durationMs: 0
    };
  }
};

// Self-register
registry.register(enterCommand);

export default enterCommand;
