import fs from 'fs/promises';
import { UNKNOWN_TIMESTAMP } from '../../config/constants.js';
import { JsonObject, JsonValue, isJsonObject } from '../../types/news.types.js';
import { CorruptDocumentError, NotFoundError } from '../../utils/errors.js';
import { isFileNotFound, writeJsonFile } from '../../utils/file.utils.js';
import { getLogger } from '../../utils/logger.js';

/**
 * Describes one kind of stored document to the merge engine
 */
export interface DocumentProfile {
  /** Label used in log records */
  name: string;
  /** Top-level keys in the order they are written, `timestamp` included */
  documentKeys: readonly string[];
  /** Keys copied into each history snapshot, in order */
  snapshotKeys: readonly string[];
  /**
   * Fill-in for a slot missing from a new document or a snapshot source.
   * A snapshot key with no entry here falls back to the merge's own payload.
   */
  slotDefaults: Readonly<Record<string, JsonValue>>;
}

/**
 * New payload per slot. An undefined value keeps whatever the document already holds.
 */
export type PayloadSlots = Readonly<Record<string, JsonValue | undefined>>;

const TIMESTAMP_KEY = 'timestamp';
const HISTORY_KEY = 'history';

/**
 * History Merge Service
 *
 * Folds a new payload into the JSON document at a path, keeping every
 * superseded top-level state in an append-only `history` array.
 *
 * Document lifecycle:
 * (no file) → flat document (no history)
 * flat document → document with history [previous state]
 * document with history [s1..sn] → history [s1..sn, previous state]
 *
 * A file that cannot be read as a document is logged and replaced by a
 * fresh flat document; its previous content, history included, is gone.
 *
 * Writes overwrite the file in place. Callers must not merge into the
 * same path concurrently, and the parent directory must already exist.
 */
export class HistoryMergeService {
  private logger;

  constructor(private readonly profile: DocumentProfile) {
    this.logger = getLogger();
  }

  /**
   * Merge new payload slots into the document at filePath
   *
   * @param filePath Target document
   * @param slots Payload per slot; slots left out keep their stored value
   * @param now Timestamp recorded for this write
   * @returns filePath, once the write has landed
   */
  async merge(filePath: string, slots: PayloadSlots, now: Date = new Date()): Promise<string> {
    const existing = await this.readExisting(filePath);

    if (!existing) {
      return this.create(filePath, slots, now);
    }

    const history = existing[HISTORY_KEY];
    const migrated = !Array.isArray(history);
    const nextHistory: JsonValue[] = Array.isArray(history) ? [...history] : [];
    nextHistory.push(this.snapshotOf(existing, slots));

    const document: JsonObject = {};
    for (const key of this.profile.documentKeys) {
      if (key === TIMESTAMP_KEY) {
        document[key] = now.toISOString();
        continue;
      }
      const value = slots[key] !== undefined ? slots[key] : this.storedOrDefault(existing, key);
      if (value !== undefined) {
        document[key] = value;
      }
    }

    // Keys this profile does not know about are carried over untouched
    for (const [key, value] of Object.entries(existing)) {
      if (key !== HISTORY_KEY && !(key in document)) {
        document[key] = value;
      }
    }
    document[HISTORY_KEY] = nextHistory;

    await writeJsonFile(filePath, document);

    if (migrated) {
      this.logger.info({ path: filePath, document: this.profile.name }, 'Migrated flat document to history log');
    }
    this.logger.debug(
      { path: filePath, document: this.profile.name, historyLength: nextHistory.length },
      'Merged document',
    );

    return filePath;
  }

  /**
   * Write a fresh flat document, replacing anything at filePath
   *
   * @returns filePath
   */
  async create(filePath: string, slots: PayloadSlots, now: Date = new Date()): Promise<string> {
    const document: JsonObject = {};

    for (const key of this.profile.documentKeys) {
      if (key === TIMESTAMP_KEY) {
        document[key] = now.toISOString();
        continue;
      }
      const value = slots[key] !== undefined ? slots[key] : this.profile.slotDefaults[key];
      if (value !== undefined) {
        document[key] = value;
      }
    }

    await writeJsonFile(filePath, document);
    this.logger.debug({ path: filePath, document: this.profile.name }, 'Created document');

    return filePath;
  }

  /**
   * Returns the parsed document, or null when there is none to merge into
   * (missing file, or a corrupt one that is about to be overwritten).
   */
  private async readExisting(filePath: string): Promise<JsonObject | null> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return null;
      }
      throw error;
    }

    try {
      return parseDocument(filePath, text);
    } catch (error) {
      if (error instanceof CorruptDocumentError) {
        this.logger.warn(
          { path: filePath, document: this.profile.name, reason: error.message },
          'Existing document is corrupt, overwriting with a fresh one',
        );
        return null;
      }
      throw error;
    }
  }

  /**
   * A snapshot key missing from the stored document takes the profile
   * default, else the value given for it in this merge.
   */
  private snapshotOf(existing: JsonObject, slots: PayloadSlots): JsonObject {
    const snapshot: JsonObject = {};

    for (const key of this.profile.snapshotKeys) {
      if (key === TIMESTAMP_KEY) {
        const timestamp = existing[TIMESTAMP_KEY];
        snapshot[key] = typeof timestamp === 'string' ? timestamp : UNKNOWN_TIMESTAMP;
        continue;
      }
      const stored = this.storedOrDefault(existing, key);
      const value = stored !== undefined ? stored : slots[key];
      if (value !== undefined) {
        snapshot[key] = value;
      }
    }

    return snapshot;
  }

  private storedOrDefault(existing: JsonObject, key: string): JsonValue | undefined {
    return key in existing ? existing[key] : this.profile.slotDefaults[key];
  }
}

/**
 * Parse and shape-check a stored document.
 *
 * @throws CorruptDocumentError if the text is not JSON, the root is not an
 * object, `timestamp` is not a string, or `history` is not a list of objects
 */
export function parseDocument(filePath: string, text: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'invalid JSON';
    throw new CorruptDocumentError(filePath, reason);
  }

  if (!isJsonObject(parsed)) {
    throw new CorruptDocumentError(filePath, 'root is not an object');
  }

  const timestamp = parsed[TIMESTAMP_KEY];
  if (timestamp !== undefined && typeof timestamp !== 'string') {
    throw new CorruptDocumentError(filePath, 'timestamp is not a string');
  }

  const history = parsed[HISTORY_KEY];
  if (history !== undefined && !(Array.isArray(history) && history.every(isJsonObject))) {
    throw new CorruptDocumentError(filePath, 'history is not a list of snapshots');
  }

  return parsed;
}

/**
 * Read the document stored at filePath
 *
 * @param resource Resource name used in the NotFound message
 * @param identifier Identifier used in the NotFound message
 * @throws NotFoundError if the file does not exist
 * @throws CorruptDocumentError if the file is not a document
 */
export async function readDocument(filePath: string, resource: string, identifier: string): Promise<JsonObject> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isFileNotFound(error)) {
      throw new NotFoundError(resource, identifier);
    }
    throw error;
  }

  return parseDocument(filePath, text);
}
