import { registry } from '../core/registry';
import { scopedLogger } from '../core/logger';
import { DEFAULT_CONFIG } from '../core/config';
import { StateAbsentError } from '../core/errors';
import { CommandFlags } from '../core/types';
import { FakeDesktop, MemoryStateStore } from './helpers/fakeDesktop';

jest.mock('../core/logger', () => {
  const log = { trace: jest.fn(), debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  return { scopedLogger: () => log };
});

const flags: CommandFlags = { verbose: false };

describe('Command Registry', () => {
  // The mocked module hands every caller the same logger object.
  const log = scopedLogger('test');

  beforeAll(() => {
    registry.register({
      name: 'exit',
      description: 'test only',
      async execute() {
        throw new StateAbsentError('/tmp/presentation-mode-test-state.json');
      }
    });
    registry.register({
      name: 'crash',
      description: 'test only',
      async execute() {
        throw new RangeError('index out of range');
      }
    });
  });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should refuse to dispatch before init', async () => {
    await expect(registry.invoke({ command: 'exit', flags })).rejects.toThrow('CommandRegistry not initialized');
  });

  it('should pass config and services to the command and time it', async () => {
    const desktop = FakeDesktop.retina([]);
    registry.init({ ...DEFAULT_CONFIG, settleDelayMs: 0 }, desktop.services(new MemoryStateStore()));
    registry.register({
      name: 'echo',
      description: 'test only',
      async execute(ctx) {
        return { success: true, lines: [`settle ${ctx.config.settleDelayMs}`, `verbose ${ctx.flags.verbose}`], durationMs: 0 };
      }
    });

    const result = await registry.invoke({ command: 'echo', flags });

    expect(result.success).toBe(true);
    expect(result.lines).toEqual(['settle 0', 'verbose false']);
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('should log an expected refusal at info, never at error', async () => {
    const result = await registry.invoke({ command: 'exit', flags });

    expect(result.error?.code).toBe('STATE_ABSENT');
    expect(log.error).not.toHaveBeenCalled();
    expect(log.info).toHaveBeenCalledWith(
      expect.objectContaining({ command: 'exit', code: 'STATE_ABSENT' }),
      'Command failed'
    );
  });

  it('should log an unexpected failure at error', async () => {
    const result = await registry.invoke({ command: 'crash', flags });

    expect(result.error).toEqual({ code: 'UNKNOWN_ERROR', message: 'index out of range' });
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ command: 'crash', code: 'UNKNOWN_ERROR' }),
      'Command failed'
    );
  });

  it('should log an unknown command at info', async () => {
    const result = await registry.invoke({ command: 'bogus', flags });

    expect(result.error?.code).toBe('UNKNOWN_COMMAND');
    expect(log.error).not.toHaveBeenCalled();
  });
});
