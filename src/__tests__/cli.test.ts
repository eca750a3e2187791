import { parseArgs, usage } from '../core/cli';
import { permissionHost } from '../tools';

describe('CLI', () => {
  describe('parseArgs', () => {
    it('should read the command and the verbose flag in any order', () => {
      expect(parseArgs(['enter'])).toEqual({ kind: 'run', command: 'enter', flags: { verbose: false } });
      expect(parseArgs(['-v', 'exit'])).toEqual({ kind: 'run', command: 'exit', flags: { verbose: true } });
      expect(parseArgs(['status', '--verbose'])).toEqual({ kind: 'run', command: 'status', flags: { verbose: true } });
    });

    it('should ask for help before anything else', () => {
      expect(parseArgs(['enter', '--help'])).toEqual({ kind: 'help' });
      expect(parseArgs(['-h'])).toEqual({ kind: 'help' });
    });

    it('should reject unknown options and a missing command', () => {
      expect(parseArgs(['enter', '--force'])).toEqual({ kind: 'usage-error', message: 'Unknown option: --force' });
      expect(parseArgs([])).toEqual({ kind: 'usage-error', message: 'No command given' });
    });

    it('should reject arguments after the command', () => {
      expect(parseArgs(['enter', 'foo'])).toEqual({ kind: 'usage-error', message: 'Unexpected argument: foo' });
      expect(parseArgs(['-v', 'exit', 'now', 'please'])).toEqual({ kind: 'usage-error', message: 'Unexpected argument: now' });
    });
  });

  it('should align command descriptions in the usage text', () => {
    const text = usage([
      { name: 'enter', description: 'Start presenting' },
      { name: 'modes', description: 'List modes' },
      { name: 'status', description: 'Show state' }
    ]);

    expect(text.split('\n').slice(0, 6)).toEqual([
      'Usage: presentation-mode <command> [--verbose]',
      '',
      'Commands:',
      '  enter   Start presenting',
      '  modes   List modes',
      '  status  Show state'
    ]);
  });

  it('should name the terminal app macOS asks to trust', () => {
    expect(permissionHost({ TERM_PROGRAM: 'Apple_Terminal' })).toBe('Terminal');
    expect(permissionHost({ TERM_PROGRAM: 'iTerm.app' })).toBe('iTerm');
    expect(permissionHost({ TERM_PROGRAM: 'WezTerm' })).toBe('WezTerm');
    expect(permissionHost({})).toBe('the app that runs presentation-mode');
  });
});
