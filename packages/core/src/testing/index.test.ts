import { describe, expect, it } from 'vitest';

import * as engine from '../index.js';

import * as testing from './index.js';

describe('testing entry point', () => {
  it('exposes the fake browser only from the testing subpath', () => {
    expect(typeof testing.FakeLauncher).toBe('function');
    expect('FakeLauncher' in engine).toBe(false);
  });
});
