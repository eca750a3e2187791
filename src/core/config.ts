/**
 * core/config.ts
 *
 * Builds the PresentationConfig for a run, in order:
 *   1. Built-in defaults (DEFAULT_CONFIG)
 *   2. JSON config file: $PRESENTATION_MODE_CONFIG, else
 *      ~/.config/presentation-mode/config.json (optional)
 *   3. Environment overrides (loaded from .env by the CLI first)
 *
 * The file is validated with ajv. A missing file is fine; a malformed one
 * is a ConfigError, never silently replaced by defaults.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Ajv from 'ajv';
import type { SchemaObject } from 'ajv';
import {
  DisplayProfile,
  ExitLayout,
  LogLevel,
  ModeFilter,
  ModeTarget,
  PaddingConfig,
  PresentationConfig
} from './types';
import { ConfigError } from './errors';

const ajv = new Ajv({ allErrors: true });

export const DEFAULT_STATE_FILE = path.join(os.homedir(), '.presentation-mode-state.json');
export const DEFAULT_CONFIG_FILE = path.join(os.homedir(), '.config', 'presentation-mode', 'config.json');

export const DEFAULT_SKIP_APPS = [
  'Dock',
  'Window Server',
  'WindowManager',
  'Control Center',
  'Notification Center',
  'Spotlight',
  'SystemUIServer',
  'Finder',                                // desktop windows
  'universalAccessAuthWarn',
  'AXVisualSupportAgent',
  'TextInputMenuAgent',
  'Raycast'
];

export const DEFAULT_CONFIG: PresentationConfig = {
  displayplacerPath: '/opt/homebrew/bin/displayplacer',
  stateFile: DEFAULT_STATE_FILE,
  logLevel: 'warn',
  settleDelayMs: 2000,
  padding: { top: 12, bottom: 12, left: 12, right: 12 },
  target: { width: 1280, height: 720 },
  displays: {
    // MacBook Pro built-in Retina display; 1280x800 is the closest to 720p it offers
    s4251086178: { name: 'Retina', presentation: { width: 1280, height: 800 } },
    s536870912: { name: 'ProArt External', presentation: { width: 1280, height: 720 } }
  },
  modeFilter: 'scaled',
  exitLayout: 'restore',
  skipApps: DEFAULT_SKIP_APPS,
  minWindowSize: 100,
  commandTimeoutMs: 15000
};

// ---------------------------------------------------------------------------
// File schema. Every key is optional and merged over the defaults
// ---------------------------------------------------------------------------

export interface ConfigFile {
  displayplacerPath?: string;
  stateFile?: string;
  logLevel?: LogLevel;
  settleDelayMs?: number;
  padding?: Partial<PaddingConfig>;
  target?: ModeTarget;
  displays?: Record<string, DisplayProfile>;
  modeFilter?: ModeFilter;
  maxWidthDelta?: number;
  exitLayout?: ExitLayout;
  skipApps?: string[];
  minWindowSize?: number;
  commandTimeoutMs?: number;
}

const targetSchema: SchemaObject = {
  type: 'object',
  properties: {
    width: { type: 'integer', minimum: 1 },
    height: { type: 'integer', minimum: 1 }
  },
  required: ['width'],
  additionalProperties: false
};

const marginSchema: SchemaObject = { type: 'integer', minimum: 0 };

export const configFileSchema: SchemaObject = {
  type: 'object',
  properties: {
    displayplacerPath: { type: 'string', minLength: 1 },
    stateFile: { type: 'string', minLength: 1 },
    logLevel: { enum: ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] },
    settleDelayMs: { type: 'integer', minimum: 0 },
    padding: {
      type: 'object',
      properties: { top: marginSchema, bottom: marginSchema, left: marginSchema, right: marginSchema },
      additionalProperties: false
    },
    target: targetSchema,
    displays: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          presentation: targetSchema
        },
        required: ['name', 'presentation'],
        additionalProperties: false
      }
    },
    modeFilter: { enum: ['scaled', 'exact-width'] },
    maxWidthDelta: { type: 'integer', minimum: 0 },
    exitLayout: { enum: ['restore', 'tile'] },
    skipApps: { type: 'array', items: { type: 'string' } },
    minWindowSize: { type: 'integer', minimum: 0 },
    commandTimeoutMs: { type: 'integer', minimum: 1 }
  },
  additionalProperties: false
};

const validateConfigFile = ajv.compile<ConfigFile>(configFileSchema);

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function readConfigFile(filePath: string): ConfigFile {
  if (!fs.existsSync(filePath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(filePath, [e instanceof Error ? e.message : String(e)]);
  }

  if (!validateConfigFile(parsed)) {
    throw new ConfigError(filePath, validateConfigFile.errors ?? []);
  }
  return parsed;
}

function envInteger(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`$${key}`, [`expected a non-negative integer, got "${raw}"`]);
  }
  return value;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function envLogLevel(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const raw = env.PRESENTATION_MODE_LOG_LEVEL;
  if (!raw) return undefined;
  const level = LOG_LEVELS.find(l => l === raw);
  if (!level) {
    throw new ConfigError('$PRESENTATION_MODE_LOG_LEVEL', [`unknown level "${raw}"`]);
  }
  return level;
}

export function mergeConfig(base: PresentationConfig, file: ConfigFile): PresentationConfig {
  return {
    ...base,
    ...file,
    padding: { ...base.padding, ...file.padding },
    target: file.target ?? base.target,
    displays: { ...base.displays, ...file.displays },
    skipApps: file.skipApps ?? base.skipApps
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PresentationConfig {
  const filePath = env.PRESENTATION_MODE_CONFIG || DEFAULT_CONFIG_FILE;
  const merged = mergeConfig(DEFAULT_CONFIG, readConfigFile(filePath));

  return {
    ...merged,
    displayplacerPath: env.DISPLAYPLACER_PATH || merged.displayplacerPath,
    stateFile: env.PRESENTATION_MODE_STATE_FILE || merged.stateFile,
    logLevel: envLogLevel(env) ?? merged.logLevel,
    settleDelayMs: envInteger(env, 'PRESENTATION_MODE_SETTLE_MS') ?? merged.settleDelayMs
  };
}

/** The profile for a display, or the configured default target. */
export function presentationTarget(config: PresentationConfig, displayId: string): { name: string; target: ModeTarget } {
  const profile = config.displays[displayId];
  if (profile) return { name: profile.name, target: profile.presentation };
  return { name: 'Unknown', target: config.target };
}
