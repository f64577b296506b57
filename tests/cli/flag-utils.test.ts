import { describe, expect, it } from 'vitest';
import { CliUsageError } from '../../src/cli/errors.js';
import { extractBooleanFlags, extractFlags } from '../../src/cli/flag-utils.js';

describe('extractFlags', () => {
  it('removes value flags from the argument list', () => {
    const args = ['--taskrc', '/tmp/rc', '--verbose', '--search', 'project:home'];
    expect(extractFlags(args, ['--taskrc', '--search'])).toEqual({ '--taskrc': '/tmp/rc', '--search': 'project:home' });
    expect(args).toEqual(['--verbose']);
  });

  it('requires a value after the flag', () => {
    expect(() => extractFlags(['--taskrc'], ['--taskrc'])).toThrow(
      new CliUsageError("Flag '--taskrc' requires a value.")
    );
  });
});

describe('extractBooleanFlags', () => {
  it('collects every occurrence', () => {
    const args = ['-h', 'x', '--version', '-h'];
    expect([...extractBooleanFlags(args, ['-h', '--version'])]).toEqual(['-h', '--version']);
    expect(args).toEqual(['x']);
  });
});
