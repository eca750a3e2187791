#!/usr/bin/env node
/**
 * core/cli.ts
 *
 * The single entry point. Orchestrates startup in order:
 *   1. Load environment variables from .env
 *   2. Parse CLI args → command + flags
 *   3. Load config (defaults + config file + env overrides)
 *   4. Initialise the logger
 *   5. Import all command modules (triggers self-registration)
 *   6. Initialise the registry with the macOS-backed services
 *   7. Invoke the command, print its report, set the exit code
 *
 * Exit codes: 0 success (including partial window success),
 * 1 fatal error, 2 usage error.
 */

import * as path from 'path';
import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { loadConfig } from './config';
import { initLogger } from './logger';
import { PresentationError } from './errors';
import { CommandFlags, PresentationConfig } from './types';

// Try: 1) project root relative to dist/core/ or src/core/, 2) CWD
const possibleEnvPaths = [
  path.resolve(__dirname, '..', '..', '.env'),
  path.resolve(process.cwd(), '.env')
];

function loadEnv(): void {
  const envPath = possibleEnvPaths.find(p => fs.existsSync(p));
  if (envPath) dotenv.config({ path: envPath });
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

export type ParsedArgs =
  | { kind: 'run'; command: string; flags: CommandFlags }
  | { kind: 'help' }
  | { kind: 'usage-error'; message: string };

export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: CommandFlags = { verbose: false };

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') return { kind: 'help' };
    if (arg === '--verbose' || arg === '-v') {
      flags.verbose = true;
      continue;
    }
    if (arg.startsWith('-')) return { kind: 'usage-error', message: `Unknown option: ${arg}` };
    positional.push(arg);
  }

  const [command, ...extra] = positional;
  if (!command) return { kind: 'usage-error', message: 'No command given' };
  if (extra.length > 0) return { kind: 'usage-error', message: `Unexpected argument: ${extra[0]}` };
  return { kind: 'run', command, flags };
}

export function usage(commands: Array<{ name: string; description: string }>): string {
  const width = Math.max(...commands.map(c => c.name.length));
  return [
    'Usage: presentation-mode <command> [--verbose]',
    '',
    'Commands:',
    ...commands.map(c => `  ${c.name.padEnd(width)}  ${c.description}`),
    '',
    'Options:',
    '  -v, --verbose  list skipped windows and write debug logs to stderr',
    '  -h, --help     show this help'
  ].join('\n');
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

export async function main(argv: string[]): Promise<number> {
  loadEnv();
  const parsed = parseArgs(argv);

  let config: PresentationConfig;
  try {
    config = loadConfig();
  } catch (e) {
    if (!(e instanceof PresentationError)) throw e;
    process.stderr.write(`Error: ${e.message}\n${JSON.stringify(e.details, null, 2)}\n`);
    return 1;
  }

  initLogger(parsed.kind === 'run' && parsed.flags.verbose ? 'debug' : config.logLevel);

  // Loaded after initLogger so their module-scoped loggers use the configured level.
  const { registry } = await import('./registry');
  await import('../commands');
  const { createDesktopServices } = await import('../tools');

  if (parsed.kind === 'help') {
    process.stdout.write(usage(registry.list()) + '\n');
    return 0;
  }
  if (parsed.kind === 'usage-error') {
    process.stderr.write(`${parsed.message}\n\n${usage(registry.list())}\n`);
    return 2;
  }

  registry.init(config, createDesktopServices(config));
  const result = await registry.invoke({ command: parsed.command, flags: parsed.flags });

  if (result.lines.length > 0) {
    process.stdout.write(result.lines.join('\n') + '\n');
  }
  if (!result.success) {
    process.stderr.write(`Error: ${result.error?.message ?? 'unknown failure'}\n`);
    if (result.error?.code === 'UNKNOWN_COMMAND') {
      process.stderr.write(`\n${usage(registry.list())}\n`);
      return 2;
    }
    return 1;
  }
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      console.error('Fatal error:', e instanceof Error ? e.stack ?? e.message : String(e));
      process.exitCode = 1;
    });
}
