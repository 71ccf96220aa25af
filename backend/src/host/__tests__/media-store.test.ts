import { rm } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { getMimeType, MediaStore, normalizeMediaName } from "../media-store";
import { ValidationError } from "../../errors";
import { createTempDir } from "../../__tests__/test-helpers";

describe("normalizeMediaName", () => {
  it("keeps the base name only", () => {
    expect(normalizeMediaName("../../etc/passwd")).toBe("passwd");
    expect(normalizeMediaName("dir\\sub\\clip.mp3")).toBe("clip.mp3");
  });

  it("removes characters file systems reject", () => {
    expect(normalizeMediaName('a:b?"c".txt')).toBe("abc.txt");
  });
});

describe("getMimeType", () => {
  it("maps extensions case-insensitively", () => {
    expect(getMimeType("clip.MP3")).toBe("audio/mpeg");
    expect(getMimeType("photo.jpeg")).toBe("image/jpeg");
    expect(getMimeType("blob.bin")).toBe("application/octet-stream");
  });
});

describe("MediaStore", () => {
  let dir: string;
  let store: MediaStore;

  beforeEach(async () => {
    dir = await createTempDir();
    store = new MediaStore(join(dir, "media"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes, reads and deletes files", async () => {
    const name = await store.write("sub/hello.txt", new TextEncoder().encode("hello"));
    expect(name).toBe("hello.txt");
    expect(await store.exists("hello.txt")).toBe(true);

    const content = await store.read("hello.txt");
    expect(content?.toString("utf-8")).toBe("hello");

    await store.delete("hello.txt");
    expect(await store.read("hello.txt")).toBeNull();
    expect(await store.exists("hello.txt")).toBe(false);
  });

  it("replaces a file of the same name", async () => {
    await store.write("a.txt", new TextEncoder().encode("one"));
    await store.write("a.txt", new TextEncoder().encode("two"));
    expect((await store.read("a.txt"))?.toString("utf-8")).toBe("two");
  });

  it("ignores deleting a missing file", async () => {
    await expect(store.delete("missing.mp3")).resolves.toBeUndefined();
  });

  it("rejects names with nothing left", () => {
    expect(() => store.pathOf("..")).toThrow(ValidationError);
    expect(() => store.pathOf("???")).toThrow(ValidationError);
  });
});
