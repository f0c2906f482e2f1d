/**
 * Test Setup
 * Global test configuration and utilities
 */

import { vi } from 'vitest';
import pino from 'pino';
import { setLogger } from '../src/core/logger.js';

// Deterministic nanoid: a zero-padded counter
vi.mock('nanoid', () => {
  let counter = 0;
  return {
    nanoid: (size?: number) => String(++counter).padStart(size ?? 21, '0'),
  };
});

setLogger(pino({ level: 'silent' }));
