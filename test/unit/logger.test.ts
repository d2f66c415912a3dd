import { ConsoleLogger, LogLevel, parseLogLevel, redactHeaders } from '../../src/logger';

describe('Logger', () => {
  let write: jest.SpyInstance;

  beforeEach(() => {
    write = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    write.mockRestore();
  });

  it('should drop messages below the configured level', () => {
    const log = new ConsoleLogger(LogLevel.WARN);

    log.debug('d');
    log.info('i');
    log.warn('w');

    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN: w$/);
  });

  it('should append the context as JSON with credential headers redacted', () => {
    new ConsoleLogger(LogLevel.DEBUG).info('sending', {
      headers: { Authorization: 'Bearer test-token', 'X-Api-Key': 'test-api-key', Accept: 'application/json' },
    });

    expect(write.mock.calls[0][0]).toMatch(
      / INFO: sending \{"headers":\{"Authorization":"\[REDACTED\]","X-Api-Key":"\[REDACTED\]","Accept":"application\/json"\}\}$/
    );
  });

  it('should include the message of an error', () => {
    new ConsoleLogger(LogLevel.ERROR).error('failed', 'boom', { tool: 'listPets' });

    expect(write.mock.calls[0][0]).toMatch(/ ERROR: failed \{"error":"boom","tool":"listPets"\}$/);
  });

  it('should write nothing when silenced', () => {
    const log = new ConsoleLogger(LogLevel.SILENT);
    log.error('failed', new Error('boom'));

    expect(write).not.toHaveBeenCalled();
  });

  it.each([
    ['debug', LogLevel.DEBUG],
    [' Warn ', LogLevel.WARN],
    ['ERROR', LogLevel.ERROR],
    ['silent', LogLevel.SILENT],
    ['verbose', LogLevel.INFO],
    [undefined, LogLevel.INFO],
  ])('should parse %j', (value, level) => {
    expect(parseLogLevel(value)).toBe(level);
  });

  it('should pass non-record headers through redaction untouched', () => {
    expect(redactHeaders(['a'])).toEqual(['a']);
    expect(redactHeaders(undefined)).toBeUndefined();
    expect(redactHeaders({ cookie: 'session=test' })).toEqual({ cookie: '[REDACTED]' });
  });
});
