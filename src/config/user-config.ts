import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { CorruptDocumentError } from '../utils/errors.js';
import { ensureDirectory, isFileNotFound, writeJsonFile } from '../utils/file.utils.js';
import { getEnvironment } from './environment.js';

const userConfigSchema = z.record(z.string());

export type UserConfig = z.infer<typeof userConfigSchema>;

export const DEFAULT_USER_CONFIG: Readonly<UserConfig> = {
  news_provider: 'newsapi,gnews',
  storage_type: 'json',
};

/**
 * NEWSLEDGER_CONFIG_PATH, else $XDG_CONFIG_HOME/newsledger/config.json,
 * else ~/.config/newsledger/config.json
 */
export function getUserConfigPath(): string {
  const explicit = getEnvironment().NEWSLEDGER_CONFIG_PATH;
  if (explicit) {
    return explicit;
  }

  const configHome = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(configHome, 'newsledger', 'config.json');
}

/**
 * Saved configuration, or the defaults when nothing was saved yet
 */
export async function loadUserConfig(configPath: string = getUserConfigPath()): Promise<UserConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isFileNotFound(error)) {
      return { ...DEFAULT_USER_CONFIG };
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new CorruptDocumentError(configPath, 'config file is not valid JSON');
  }

  const result = userConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new CorruptDocumentError(configPath, 'config values must be strings');
  }
  return result.data;
}

export async function setUserConfigValue(
  key: string,
  value: string,
  configPath: string = getUserConfigPath(),
): Promise<UserConfig> {
  const config = { ...(await loadUserConfig(configPath)), [key]: value };

  await ensureDirectory(path.dirname(configPath));
  await writeJsonFile(configPath, config);
  return config;
}
