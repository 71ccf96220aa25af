/**
 * Profile Manager
 *
 * Profiles are directories under `<dataDir>/profiles/`, each holding a
 * collection.json and a media/ directory. One profile is open at a time.
 */

import type { Dirent } from "node:fs";
import { mkdir, readdir, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import type { Collection } from "./collection";
import { COLLECTION_FILE_NAME, loadCollection, saveCollection } from "./collection-storage";
import { MediaStore } from "./media-store";
import type { Clock } from "./types";
import { ConflictError, NotFoundError, ValidationError } from "../errors";
import { profileLog as log } from "../logger";

export const PROFILES_DIR = "profiles";
export const MEDIA_DIR = "media";

/**
 * The profile every installation starts with. It cannot be deleted.
 */
export const DEFAULT_PROFILE_NAME = "User 1";

export const INVALID_PROFILE_CHARS = ["/", "\\", ":", "*", "?", '"', "<", ">", "|"];

export interface ProfileInfo {
  name: string;
  path: string;
  isDefault: boolean;
}

export interface ProfileManagerOptions {
  dataDir: string;
  clock?: Clock;
}

interface OpenProfile {
  name: string;
  path: string;
  collection: Collection;
  media: MediaStore;
}

/**
 * @throws ValidationError for blank names or names with path characters
 */
export function validateProfileName(name: string): void {
  if (name.trim().length === 0) {
    throw new ValidationError("Profile name must be a non-empty string");
  }
  if (INVALID_PROFILE_CHARS.some((char) => name.includes(char)) || name === "." || name === "..") {
    throw new ValidationError(
      `Profile name contains invalid characters. Avoid: ${INVALID_PROFILE_CHARS.join(" ")}`
    );
  }
}

async function directoryExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export class ProfileManager {
  private active: OpenProfile | null = null;

  constructor(private readonly options: ProfileManagerOptions) {}

  get profilesDir(): string {
    return join(this.options.dataDir, PROFILES_DIR);
  }

  profilePath(name: string): string {
    return join(this.profilesDir, name);
  }

  /**
   * Names of all profiles, sorted.
   */
  async list(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.profilesDir, { withFileTypes: true });
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));
  }

  async exists(name: string): Promise<boolean> {
    validateProfileName(name);
    return directoryExists(this.profilePath(name));
  }

  current(): ProfileInfo | null {
    if (!this.active) {
      return null;
    }
    return {
      name: this.active.name,
      path: this.active.path,
      isDefault: this.active.name === DEFAULT_PROFILE_NAME,
    };
  }

  collection(): Collection | null {
    return this.active?.collection ?? null;
  }

  media(): MediaStore | null {
    return this.active?.media ?? null;
  }

  /**
   * @throws ConflictError when the profile exists
   */
  async create(name: string): Promise<void> {
    validateProfileName(name);
    if (await this.exists(name)) {
      const existing = await this.list();
      throw new ConflictError(
        `Profile "${name}" already exists. Existing profiles: ${existing.join(", ")}`
      );
    }
    await mkdir(join(this.profilePath(name), MEDIA_DIR), { recursive: true });
    log.info(`Created profile "${name}"`);
  }

  /**
   * Saves and closes the open profile, then opens `name`.
   *
   * @throws NotFoundError when the profile does not exist
   */
  async open(name: string): Promise<void> {
    if (!(await this.exists(name))) {
      const available = await this.list();
      throw new NotFoundError(
        `Profile "${name}" not found. Available profiles: ${available.join(", ")}`
      );
    }
    if (this.active?.name === name) {
      return;
    }

    await this.close();

    const path = this.profilePath(name);
    const collection = await loadCollection(join(path, COLLECTION_FILE_NAME), this.options.clock);
    this.active = {
      name,
      path,
      collection,
      media: new MediaStore(join(path, MEDIA_DIR)),
    };
    if (collection.isDirty()) {
      await this.save();
    }
    log.info(`Opened profile "${name}"`);
  }

  /**
   * Opens a profile, creating it first when it does not exist.
   */
  async openOrCreate(name: string): Promise<void> {
    if (!(await this.exists(name))) {
      await this.create(name);
    }
    await this.open(name);
  }

  /**
   * @throws ValidationError for the default profile or the open one,
   *   NotFoundError when it does not exist
   */
  async remove(name: string): Promise<void> {
    if (!(await this.exists(name))) {
      const existing = await this.list();
      throw new NotFoundError(`Profile "${name}" not found. Available profiles: ${existing.join(", ")}`);
    }
    if (name === DEFAULT_PROFILE_NAME) {
      throw new ValidationError(`Cannot delete the default "${DEFAULT_PROFILE_NAME}" profile`);
    }
    if (this.active?.name === name) {
      throw new ValidationError(`Cannot delete the open profile "${name}"`);
    }
    await rm(this.profilePath(name), { recursive: true, force: true });
    log.info(`Deleted profile "${name}"`);
  }

  /**
   * Writes the open collection if it has unsaved changes.
   */
  async save(): Promise<void> {
    const active = this.active;
    if (!active || !active.collection.isDirty()) {
      return;
    }
    await saveCollection(join(active.path, COLLECTION_FILE_NAME), active.collection);
  }

  async close(): Promise<void> {
    if (!this.active) {
      return;
    }
    await this.save();
    log.info(`Closed profile "${this.active.name}"`);
    this.active = null;
  }
}
