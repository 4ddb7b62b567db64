import fs from 'fs/promises';
import path from 'path';
import { DOCUMENT_EXTENSION } from '../../config/constants.js';
import { isFileNotFound } from '../../utils/file.utils.js';

/**
 * Symbols with a stored document directly inside directory.
 * Only file names are looked at; a missing directory yields an empty set.
 */
export async function listSymbols(directory: string): Promise<Set<string>> {
  const entries = await fs.readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
    if (isFileNotFound(error)) {
      return null;
    }
    throw error;
  });

  if (!entries) {
    return new Set();
  }

  const symbols = new Set<string>();
  for (const entry of entries) {
    if (entry.isFile() && path.extname(entry.name) === DOCUMENT_EXTENSION) {
      symbols.add(path.basename(entry.name, DOCUMENT_EXTENSION));
    }
  }
  return symbols;
}
