import { loggerOptions, resolveLogLevel } from '@/logger';

describe('resolveLogLevel (unit)', () => {
  it('is silent under test', () => {
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('silent');
  });

  it('logs debug in development and info otherwise', () => {
    expect(resolveLogLevel({ NODE_ENV: 'development' })).toBe('debug');
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('info');
    expect(resolveLogLevel({})).toBe('info');
  });

  it('honours a valid LOG_LEVEL override', () => {
    expect(resolveLogLevel({ NODE_ENV: 'test', LOG_LEVEL: 'warn' })).toBe('warn');
  });

  it('ignores an unknown LOG_LEVEL', () => {
    expect(resolveLogLevel({ NODE_ENV: 'production', LOG_LEVEL: 'loud' })).toBe('info');
  });
});

describe('loggerOptions (unit)', () => {
  it('pretty-prints only in development', () => {
    expect(loggerOptions({ NODE_ENV: 'development' }).transport).toEqual({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
      },
    });
    expect(loggerOptions({ NODE_ENV: 'production' }).transport).toBeUndefined();
  });
});
