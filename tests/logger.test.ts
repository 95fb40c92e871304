import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, sendInfoToStderr } from '../src/logger.js';

afterEach(() => {
  sendInfoToStderr(false);
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('writes info lines to stdout with the tag', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('Calendar').info('fetched', 3);

    expect(out).toHaveBeenCalledTimes(1);
    expect(out.mock.calls[0].slice(1)).toEqual(['[Calendar]', 'fetched', 3]);
    expect(err).not.toHaveBeenCalled();
  });

  it('moves info lines to stderr when stdout carries data', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    sendInfoToStderr();
    createLogger('Refresh').info('4 live record(s)');

    expect(out).not.toHaveBeenCalled();
    expect(err.mock.calls[0].slice(1)).toEqual(['[Refresh]', '4 live record(s)']);
  });
});
