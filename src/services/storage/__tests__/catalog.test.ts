import fs from 'fs/promises';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTempDir, removeTempDir } from '../../../../tests/helpers/temp-dir.js';
import { listSymbols } from '../catalog.js';

describe('listSymbols', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should return an empty set for a directory that does not exist', async () => {
    expect(await listSymbols(path.join(dir, 'missing'))).toEqual(new Set());
  });

  it('should return the base name of every .json file', async () => {
    await fs.writeFile(path.join(dir, 'AAPL.json'), '{}');
    await fs.writeFile(path.join(dir, 'MSFT.json'), 'not even json');

    expect(await listSymbols(dir)).toEqual(new Set(['AAPL', 'MSFT']));
  });

  it('should ignore other files and subdirectories', async () => {
    await fs.writeFile(path.join(dir, 'AAPL.json'), '{}');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'x');
    await fs.writeFile(path.join(dir, 'AAPL.json.bak'), '{}');
    await fs.mkdir(path.join(dir, 'TSLA.json'));

    expect(await listSymbols(dir)).toEqual(new Set(['AAPL']));
  });
});
