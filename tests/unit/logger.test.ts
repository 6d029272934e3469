import { afterEach, describe, it, expect, vi } from 'vitest';
import { Logger, isLogLevel, resolveLogLevel } from '../../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes warnings and errors to stderr with the scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = new Logger({ scope: 'rst-bench', level: 'warn' });

    log.warn('slow disk');
    log.error('gone');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/ WARN: \[rst-bench\] slow disk$/);
    expect(error.mock.calls[0][0]).toMatch(/ ERROR: \[rst-bench\] gone$/);
  });

  it('drops messages below its level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = new Logger({ level: 'warn' });

    log.info('detected pandoc');
    log.debug('probe detail');

    expect(error).not.toHaveBeenCalled();
  });

  it('logs nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    new Logger({ level: 'silent' }).error('ignored');
    expect(error).not.toHaveBeenCalled();
  });

  it('nests child scopes and passes level changes down', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const root = new Logger({ scope: 'rst-bench', level: 'warn' });
    const child = root.child('probe');

    child.debug('hidden');
    root.setLevel('debug');
    child.debug('shown', { command: 'pandoc' });

    expect(child.getLevel()).toBe('debug');
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toMatch(/ DEBUG: \[rst-bench:probe\] shown$/);
    expect(error.mock.calls[0][1]).toEqual({ command: 'pandoc' });
  });
});

describe('log level parsing', () => {
  it('accepts known levels and falls back otherwise', () => {
    expect(isLogLevel('trace')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(resolveLogLevel('info')).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('warn');
    expect(resolveLogLevel(undefined, 'silent')).toBe('silent');
  });
});
