/**
 * Media Store
 *
 * Files referenced from notes (`[sound:x.mp3]`, `<img src="x.png">`), kept
 * flat in the profile's media directory.
 */

import { mkdir, readFile, rename, stat, unlink, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { ValidationError } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("media");

const MIME_TYPES: Record<string, string> = {
  ".mp3": "audio/mpeg",
  ".wav": "audio/wav",
  ".ogg": "audio/ogg",
  ".m4a": "audio/mp4",
  ".flac": "audio/flac",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".svg": "image/svg+xml",
  ".mp4": "video/mp4",
  ".webm": "video/webm",
  ".txt": "text/plain",
  ".html": "text/html",
  ".css": "text/css",
  ".js": "application/javascript",
  ".json": "application/json",
  ".pdf": "application/pdf",
};

export function getMimeType(filename: string): string {
  return MIME_TYPES[extname(filename).toLowerCase()] ?? "application/octet-stream";
}

/**
 * Reduces a caller-supplied name to a safe media file name: base name only,
 * NFC-normalized, without characters file systems reject.
 */
export function normalizeMediaName(filename: string): string {
  const base = basename(filename.replace(/\\/g, "/"));
  return base.normalize("NFC").replace(/[\x00-\x1f[\]<>:"/?*^\\|]/g, "");
}

export class MediaStore {
  constructor(readonly dir: string) {}

  /**
   * Absolute path of a media file.
   *
   * @throws ValidationError when nothing is left of the name
   */
  pathOf(filename: string): string {
    const name = normalizeMediaName(filename);
    if (name.length === 0 || name === "." || name === "..") {
      throw new ValidationError(`Invalid media file name: "${filename}"`);
    }
    return join(this.dir, name);
  }

  /**
   * Writes a file, replacing any file of the same name.
   *
   * @returns the stored name
   */
  async write(filename: string, data: Uint8Array): Promise<string> {
    const path = this.pathOf(filename);
    await mkdir(this.dir, { recursive: true });
    const tempPath = `${path}.${Date.now()}.tmp`;
    await writeFile(tempPath, data);
    await rename(tempPath, path);
    log.debug(`Stored ${basename(path)} (${data.byteLength} bytes)`);
    return basename(path);
  }

  /**
   * @returns the file contents, or null when it does not exist
   */
  async read(filename: string): Promise<Buffer | null> {
    try {
      return await readFile(this.pathOf(filename));
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async exists(filename: string): Promise<boolean> {
    try {
      const stats = await stat(this.pathOf(filename));
      return stats.isFile();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Deletes a file. Missing files are ignored.
   */
  async delete(filename: string): Promise<void> {
    try {
      await unlink(this.pathOf(filename));
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
