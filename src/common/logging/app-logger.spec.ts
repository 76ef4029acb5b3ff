import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createAppLogger, describeError, formatConsole, stringify } from './app-logger';

describe('app logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('formats console lines with level and context', () => {
    const at = new Date('2025-01-01T00:00:00.000Z');
    expect(formatConsole('warn', 'DatasetLoader', 'hi', at)).toBe(
      '2025-01-01T00:00:00.000Z WARN: [DatasetLoader] hi',
    );
    expect(formatConsole('log', undefined, 'hi', at)).toBe('2025-01-01T00:00:00.000Z LOG: hi');
  });

  it('includes the cause of an error', () => {
    const err = new Error('outer', { cause: new TypeError('inner') });
    expect(describeError(err)).toBe('Error: outer | cause: TypeError: inner');
    expect(describeError(new Error('failed', { cause: 'disk full' }))).toBe(
      'Error: failed | cause: disk full',
    );
  });

  it('falls back to String for values JSON cannot encode', () => {
    expect(stringify({ a: 1 })).toBe('{"a":1}');
    expect(stringify(BigInt(10))).toBe('10');
    expect(stringify(undefined)).toBe('undefined');
  });

  it('logs the stack of an error when no trace is given', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const err = new Error('boom');
    createAppLogger({}).error(err, undefined, 'Test');
    expect(spy).toHaveBeenCalledWith(expect.stringMatching(/ERROR: \[Test\] Error: boom$/), err.stack);
  });

  it('mirrors lines to the log file as JSON', () => {
    const dir = mkdtempSync(join(tmpdir(), 'app-logger-'));
    const file = join(dir, 'nested', 'app.log');
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      const logger = createAppLogger({ logFile: file });
      logger.log('hello', 'Test');

      const [line] = readFileSync(file, 'utf8').trim().split('\n');
      expect(JSON.parse(line)).toMatchObject({ level: 'log', context: 'Test', message: 'hello' });
      expect(console.log).toHaveBeenCalledTimes(1);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('drops debug output in production', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    createAppLogger({ production: true }).debug?.('quiet');
    expect(debug).not.toHaveBeenCalled();
  });
});
