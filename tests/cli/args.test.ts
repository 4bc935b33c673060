import { describe, it, expect } from 'vitest';
import { parseArgs, flagString } from '../../src/cli/args';

describe('parseArgs', () => {
  it('separates positionals from --key=value flags', () => {
    expect(parseArgs(['screenshot', 'rom.ch8', '--out=a.png', '--scale=4'])).toEqual({
      positional: ['screenshot', 'rom.ch8'],
      flags: { out: 'a.png', scale: '4' },
    });
  });

  it('takes the next word as the value of a value flag', () => {
    const args = parseArgs(['run', '--refresh', '120', 'rom.ch8'], ['refresh']);
    expect(args.positional).toEqual(['run', 'rom.ch8']);
    expect(flagString(args, 'refresh')).toBe('120');
  });

  it('treats other flags as booleans', () => {
    const args = parseArgs(['run', '--verbose', 'rom.ch8', '--refresh'], ['refresh']);
    expect(args.flags).toEqual({ verbose: true, refresh: true });
    expect(args.positional).toEqual(['run', 'rom.ch8']);
    expect(flagString(args, 'refresh')).toBeUndefined();
  });
});
