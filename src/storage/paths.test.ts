/**
 * Tests for path resolution utilities
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect } from '@jest/globals';
import { expandHomePath, getDataDir, getDefaultDatabasePath, resolveDatabasePath } from './paths.js';

describe('paths', () => {
  it('should place the default database in ~/.textpipe', () => {
    expect(getDataDir()).toBe(path.join(os.homedir(), '.textpipe'));
    expect(getDefaultDatabasePath()).toBe(path.join(os.homedir(), '.textpipe', 'textpipe.db'));
  });

  it('should expand a leading ~', () => {
    expect(expandHomePath('~')).toBe(os.homedir());
    expect(expandHomePath('~/x/y.db')).toBe(path.join(os.homedir(), 'x', 'y.db'));
  });

  it('should resolve relative paths against the working directory', () => {
    expect(expandHomePath('store.db')).toBe(path.join(process.cwd(), 'store.db'));
  });

  it('should leave :memory: alone', () => {
    expect(resolveDatabasePath(':memory:')).toBe(':memory:');
  });
});
