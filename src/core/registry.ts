/**
 * core/registry.ts
 *
 * Central singleton. Responsibilities:
 *   - Holds every registered CommandModule.
 *   - Exposes list() for the CLI usage text.
 *   - Resolves a command name to its module.
 *   - Dispatches invocations, timing them and turning thrown errors
 *     into a failed CommandResult.
 *
 * Command modules register themselves by calling registry.register().
 * The CLI imports commands/index at startup, which triggers registration.
 */

import {
  CommandInvocation,
  CommandModule,
  CommandResult,
  PresentationConfig,
  PresentationServices
} from './types';
import { PresentationError, UnknownCommandError } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/registry');

export class CommandRegistry {
  /** The one and only instance. */
  private static instance: CommandRegistry | null = null;

  /** command name → CommandModule */
  private readonly modules = new Map<string, CommandModule>();

  private context: { config: PresentationConfig; services: PresentationServices } | null = null;

  private constructor() {}

  static getInstance(): CommandRegistry {
    if (!CommandRegistry.instance) {
      CommandRegistry.instance = new CommandRegistry();
    }
    return CommandRegistry.instance;
  }

  /** Must be called once after construction, before any dispatch. */
  init(config: PresentationConfig, services: PresentationServices): void {
    if (this.context) {
      log.warn('Registry already initialized, ignoring duplicate init call');
      return;
    }
    this.context = { config, services };
    log.debug('Registry initialized');
  }

  // -----------------------------------------------------------------------
  // Registration
  // -----------------------------------------------------------------------

  register(mod: CommandModule): void {
    if (this.modules.has(mod.name)) {
      log.warn({ command: mod.name }, 'Command already registered, overwriting');
    }
    this.modules.set(mod.name, mod);
    log.debug({ command: mod.name }, 'Command registered');
  }

  list(): CommandModule[] {
    return Array.from(this.modules.values());
  }

  /** Throws UnknownCommandError if not found. */
  resolve(name: string): CommandModule {
    const mod = this.modules.get(name);
    if (!mod) throw new UnknownCommandError(name);
    return mod;
  }

  // -----------------------------------------------------------------------
  // Dispatch
  // -----------------------------------------------------------------------

  async invoke(invocation: CommandInvocation): Promise<CommandResult> {
    if (!this.context) {
      throw new Error('CommandRegistry not initialized. Call init() before using the registry.');
    }
    const start = Date.now();

    try {
      const mod = this.resolve(invocation.command);
      log.info({ command: mod.name }, 'Dispatching command');
      const result = await mod.execute({
        config: this.context.config,
        services: this.context.services,
        flags: invocation.flags
      });
      result.durationMs = Date.now() - start;
      return result;
    } catch (e) {
      if (e instanceof PresentationError) {
        // An expected refusal; the CLI prints the message itself.
        const error = { code: e.code, message: e.message, details: e.details };
        log.info({ command: invocation.command, ...error }, 'Command failed');
        return { success: false, lines: [], error, durationMs: Date.now() - start };
      }
      const error = { code: 'UNKNOWN_ERROR', message: e instanceof Error ? e.message : String(e) };
      log.error({ command: invocation.command, ...error, stack: e instanceof Error ? e.stack : undefined }, 'Command failed');
      return { success: false, lines: [], error, durationMs: Date.now() - start };
    }
  }
}

// Convenience export so command modules can do:
//     import { registry } from '../core/registry';
//     registry.register(myCommand);
export const registry = CommandRegistry.getInstance();
