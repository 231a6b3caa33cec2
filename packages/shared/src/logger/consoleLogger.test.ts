import { ConsoleLogger } from './consoleLogger';
import type { ScanStarted } from '../types/events';

describe('ConsoleLogger', () => {
  const event: ScanStarted = {
    schemaVersion: 1,
    timestamp: '2026-02-18T00:00:00.000Z',
    runId: 'run-1',
    type: 'ScanStarted',
    payload: { fileCount: 3, strategy: 'baseline', workers: 2 },
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs events as JSON', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    new ConsoleLogger().log(event);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(event));
  });

  it('writes debug/info/warn and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'debug' });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('drops messages below the configured level', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'warn' });
    logger.debug('d');
    logger.info('i');
    logger.log(event);
    logger.warn('w');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('w');
  });

  it('is quiet at the silent level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    new ConsoleLogger({ level: 'silent' }).error(new Error('boom'));
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ a: 1 }).child({ b: 'x' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[a=1 b=x] hello');

    logger.child({ file: 'main.rs' }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[file=main.rs] warn');
  });
});
