/**
 * core/exec.ts
 *
 * The only place that spawns child processes. Tool modules call
 * run() for plain executables (displayplacer) and jxa()/appleScript()
 * for anything that goes through osascript.
 *
 * Arguments are passed as an argv array, never interpolated into a
 * shell string, and scripts receive their inputs through `run(argv)`.
 */

import { execFileSync } from 'child_process';
import { ExecutionError } from './errors';

export const DEFAULT_TIMEOUT_MS = 15000;

/** stderr of a failed execFileSync call, falling back to the error message. */
export function describeFailure(e: unknown): string {
  if (e instanceof Error) {
    const stderr = 'stderr' in e && e.stderr ? String(e.stderr).trim() : '';
    return stderr || e.message;
  }
  return String(e);
}

export function run(source: string, file: string, args: string[], timeoutMs = DEFAULT_TIMEOUT_MS): string {
  try {
    return execFileSync(file, args, {
      encoding: 'utf-8',
      timeout: timeoutMs,
      stdio: ['pipe', 'pipe', 'pipe']
    }).trim();
  } catch (e) {
    throw new ExecutionError(source, describeFailure(e), { file, args });
  }
}

/** Run a JavaScript for Automation script. `argv` arrives in `function run(argv)`. */
export function jxa(source: string, script: string, argv: string[] = [], timeoutMs = DEFAULT_TIMEOUT_MS): string {
  try {
    return execFileSync('osascript', ['-l', 'JavaScript', '-e', script, ...argv], {
      encoding: 'utf-8',
      timeout: timeoutMs,
      stdio: ['pipe', 'pipe', 'pipe']
    }).trim();
  } catch (e) {
    throw new ExecutionError(source, describeFailure(e), { argv });
  }
}

export function appleScript(source: string, script: string, timeoutMs = DEFAULT_TIMEOUT_MS): string {
  try {
    return execFileSync('osascript', ['-e', script], {
      encoding: 'utf-8',
      timeout: timeoutMs,
      stdio: ['pipe', 'pipe', 'pipe']
    }).trim();
  } catch (e) {
    throw new ExecutionError(source, describeFailure(e));
  }
}

/** Parse a script's JSON stdout, reporting the raw text when it isn't JSON. */
export function parseJson(source: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new ExecutionError(source, 'Script printed malformed JSON', { raw: raw.slice(0, 500) });
  }
}
