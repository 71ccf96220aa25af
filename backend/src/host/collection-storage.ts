/**
 * Collection Storage
 *
 * Reads and writes a profile's collection as one JSON document.
 * Writes are atomic: the document goes to a temp file that is then renamed
 * over the target.
 */

import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Collection } from "./collection";
import { safeParseCollectionData } from "./collection-schema";
import type { Clock } from "./types";
import { formatZodError } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("collection-storage");

export const COLLECTION_FILE_NAME = "collection.json";

/**
 * Error for a collection file that exists but cannot be used.
 */
export class CollectionFileError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = "CollectionFileError";
  }
}

/**
 * Loads a collection, or creates a fresh one when the file does not exist.
 *
 * @throws CollectionFileError for unreadable JSON or an invalid document
 */
export async function loadCollection(path: string, clock?: Clock): Promise<Collection> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      log.info(`No collection at ${path}, starting a new one`);
      return Collection.create(clock);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CollectionFileError(`Collection file is not valid JSON: ${message}`, path);
  }

  const result = safeParseCollectionData(parsed);
  if (!result.success) {
    throw new CollectionFileError(
      `Collection file is invalid: ${formatZodError(result.error)}`,
      path
    );
  }

  log.debug(`Loaded collection from ${path}`);
  return new Collection(result.data, clock);
}

/**
 * Writes the collection atomically. The dirty flag is cleared when the
 * snapshot is taken and set again if the write fails.
 */
export async function saveCollection(path: string, collection: Collection): Promise<void> {
  const content = JSON.stringify(collection.toData());
  // Changes made while the write is in flight set the flag again
  collection.markSaved();

  const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, path);
  } catch (error) {
    collection.store.markChanged();
    try {
      await unlink(tempPath);
    } catch (cleanupError) {
      log.debug(`Temp file cleanup failed: ${String(cleanupError)}`);
    }
    throw error;
  }

  log.debug(`Saved collection to ${path}`);
}
