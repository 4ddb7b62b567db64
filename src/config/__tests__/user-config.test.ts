import fs from 'fs/promises';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTempDir, readJson, removeTempDir } from '../../../tests/helpers/temp-dir.js';
import { CorruptDocumentError } from '../../utils/errors.js';
import { DEFAULT_USER_CONFIG, loadUserConfig, setUserConfigValue } from '../user-config.js';

describe('user config', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await createTempDir();
    configPath = path.join(dir, 'newsledger', 'config.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should return the defaults when no file exists', async () => {
    expect(await loadUserConfig(configPath)).toEqual({ news_provider: 'newsapi,gnews', storage_type: 'json' });
  });

  it('should not hand out the shared defaults object', async () => {
    const config = await loadUserConfig(configPath);
    config.news_provider = 'gnews';

    expect(DEFAULT_USER_CONFIG.news_provider).toBe('newsapi,gnews');
  });

  it('should create the file with defaults plus the new key', async () => {
    await setUserConfigValue('openai_model', 'gpt-4o-mini', configPath);

    expect(await readJson(configPath)).toEqual({
      news_provider: 'newsapi,gnews',
      storage_type: 'json',
      openai_model: 'gpt-4o-mini',
    });
  });

  it('should overwrite an existing key', async () => {
    await setUserConfigValue('news_provider', 'gnews', configPath);
    await setUserConfigValue('news_provider', 'newsapi', configPath);

    expect(await loadUserConfig(configPath)).toMatchObject({ news_provider: 'newsapi' });
  });

  it('should reject a file that is not JSON', async () => {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, '{broken');

    await expect(loadUserConfig(configPath)).rejects.toThrow(CorruptDocumentError);
  });

  it('should reject values that are not strings', async () => {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, JSON.stringify({ news_provider: 3 }));

    await expect(loadUserConfig(configPath)).rejects.toThrow(
      `Corrupt document at ${configPath}: config values must be strings`,
    );
  });
});
