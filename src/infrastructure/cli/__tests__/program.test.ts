import { CommanderError, InvalidArgumentError } from 'commander';
import { buildProgram, CliOptions, parsePositiveInt, parseThreshold } from '../program';

describe('option parsers', () => {
  test('parseThreshold accepts values between 0 and 1', () => {
    expect(parseThreshold('0')).toBe(0);
    expect(parseThreshold('0.75')).toBe(0.75);
    expect(parseThreshold('1')).toBe(1);
  });

  test('parseThreshold rejects anything else', () => {
    for (const value of ['', 'high', '-0.1', '1.01']) {
      expect(() => parseThreshold(value)).toThrow(InvalidArgumentError);
    }
  });

  test('parsePositiveInt rejects zero, fractions and text', () => {
    expect(parsePositiveInt('3')).toBe(3);
    for (const value of ['0', '2.5', 'ten', '-1']) {
      expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
    }
  });
});

describe('buildProgram', () => {
  const parse = async (args: string[]): Promise<CliOptions[]> => {
    const received: CliOptions[] = [];
    const program = buildProgram(async (options) => {
      received.push(options);
    });
    program.exitOverride().configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
    await program.parseAsync(args, { from: 'user' });
    return received;
  };

  test('passes parsed flags to the action', async () => {
    const [options] = await parse([
      '--source-dir', '/receipts', '--rename', '--write', '--confidence', '0.5', '--concurrency', '3', '--api-key', 'test-secret',
    ]);

    expect(options).toEqual({
      sourceDir: '/receipts',
      apiKey: 'test-secret',
      rename: true,
      write: true,
      confidence: 0.5,
      concurrency: 3,
    });
  });

  test('defaults rename and write to false', async () => {
    const [options] = await parse(['--source-dir', '/receipts']);
    expect(options).toEqual({ sourceDir: '/receipts', rename: false, write: false });
  });

  test('requires --source-dir', async () => {
    await expect(parse(['--write'])).rejects.toBeInstanceOf(CommanderError);
  });

  test('rejects an invalid confidence', async () => {
    await expect(parse(['--source-dir', '/receipts', '--confidence', '2'])).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
  });
});
