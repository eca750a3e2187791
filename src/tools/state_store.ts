/**
 * tools/state_store.ts
 *
 * The saved PresentationState, one JSON file in the user's home directory.
 * Its presence is the "in presentation mode" flag: enter writes it before
 * touching the display, exit deletes it after restoring.
 *
 * Writes go to a temp file that is renamed into place, so a crash never
 * leaves a truncated file behind. A file that exists but doesn't validate
 * reads back as `corrupt`, never as `absent`.
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import type { SchemaObject } from 'ajv';
import { PresentationState, StateReadResult, StateStore } from '../core/types';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('tools/state_store');
const ajv = new Ajv({ allErrors: true });

const int = { type: 'integer' };

export const stateSchema: SchemaObject = {
  type: 'object',
  properties: {
    version: { const: 1 },
    displayId: { type: 'string', minLength: 1 },
    originalMode: { type: 'string', minLength: 1 },
    originalModeLabel: { type: 'string' },
    savedAt: { type: 'string' },
    windows: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          app: { type: 'string' },
          pid: int,
          windowId: int,
          axIndex: { type: 'integer', minimum: 0 },
          title: { type: 'string' },
          x: int,
          y: int,
          width: { type: 'integer', minimum: 1 },
          height: { type: 'integer', minimum: 1 }
        },
        required: ['app', 'pid', 'windowId', 'axIndex', 'title', 'x', 'y', 'width', 'height']
      }
    }
  },
  required: ['version', 'displayId', 'originalMode', 'originalModeLabel', 'savedAt', 'windows']
};

const validateState = ajv.compile<PresentationState>(stateSchema);

function isMissing(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

export class FileStateStore implements StateStore {
  constructor(readonly path: string) {}

  read(): StateReadResult {
    let raw: string;
    try {
      raw = fs.readFileSync(this.path, 'utf-8');
    } catch (e) {
      if (isMissing(e)) return { kind: 'absent' };
      return { kind: 'corrupt', reason: e instanceof Error ? e.message : String(e) };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return { kind: 'corrupt', reason: 'not valid JSON' };
    }

    if (!validateState(parsed)) {
      const reason = ajv.errorsText(validateState.errors);
      log.warn({ path: this.path, reason }, 'Saved state failed validation');
      return { kind: 'corrupt', reason };
    }
    return { kind: 'present', state: parsed };
  }

  write(state: PresentationState): void {
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tmpPath, JSON.stringify(state, null, 2) + '\n', 'utf-8');
      fs.renameSync(tmpPath, this.path);
    } catch (e) {
      fs.rmSync(tmpPath, { force: true });
      throw e;
    }
    log.info({ path: this.path, windows: state.windows.length }, 'Presentation state saved');
  }

  clear(): void {
    fs.rmSync(this.path, { force: true });
    log.info({ path: this.path }, 'Presentation state cleared');
  }
}
