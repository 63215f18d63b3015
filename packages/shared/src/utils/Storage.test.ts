/**
 * Unit tests for Storage
 * Exercises the JSON file round trip through a temporary directory
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { Storage } from './Storage';

describe('Storage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'waystone-storage-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('starts empty when the file does not exist', () => {
    const storage = new Storage<number>(path.join(dir, 'missing.json'));

    expect(storage.keys()).toEqual([]);
    expect(storage.get('anything')).toBeUndefined();
  });

  it('persists values and reads them back in a new instance', async () => {
    const file = path.join(dir, 'nested', 'values.json');
    const storage = new Storage<{ visited: boolean }>(file);

    storage.set('Harbor Gate', { visited: true });
    storage.set('Ember Hollow', { visited: false });
    await storage.flush();

    const reopened = new Storage<{ visited: boolean }>(file);
    expect(reopened.get('Harbor Gate')).toEqual({ visited: true });
    expect(reopened.keys()).toEqual(['Harbor Gate', 'Ember Hollow']);
  });

  it('ignores undefined values', async () => {
    const file = path.join(dir, 'values.json');
    const storage = new Storage<string | undefined>(file);

    storage.set('a', undefined);
    expect(storage.has('a')).toBe(false);

    storage.set('b', 'kept');
    await storage.flush();

    expect(await fs.readJson(file)).toEqual({ b: 'kept' });
  });
});
