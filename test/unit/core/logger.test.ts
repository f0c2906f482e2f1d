import { describe, it, expect } from 'vitest';
import { createLogger, getLogger, setLogger } from '../../../src/core/logger.js';

describe('logger', () => {
  it('should build a silent logger without a transport', () => {
    const logger = createLogger({ name: 'quiet', level: 'silent' });

    expect(logger.level).toBe('silent');
    expect(logger.bindings()).toMatchObject({ name: 'quiet' });
  });

  it('should swap the shared logger', () => {
    const previous = getLogger();
    const replacement = createLogger({ level: 'silent' });

    setLogger(replacement);
    expect(getLogger()).toBe(replacement);

    setLogger(previous);
  });
});
