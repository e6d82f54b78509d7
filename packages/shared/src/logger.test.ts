import { describe, it, expect } from 'vitest';
import { createLogger, errorMessage } from './logger.js';

describe('createLogger', () => {
  it('names the logger and applies the level', () => {
    const logger = createLogger('horror-shorts', 'warn', { pretty: false });
    expect(logger.level).toBe('warn');
    expect(logger.bindings()).toEqual({ name: 'horror-shorts' });
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies anything else', () => {
    expect(errorMessage(new Error('disk full'))).toBe('disk full');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
