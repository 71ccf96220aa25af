/**
 * Media Handler Tests
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { decodeBase64 } from "../media-handlers";
import { createDispatcherHarness, type DispatcherHarness } from "../../__tests__/test-helpers";

describe("decodeBase64", () => {
  it("decodes padded and whitespace-broken input", () => {
    expect(decodeBase64("aGk=").toString("utf8")).toBe("hi");
    expect(decodeBase64("aG\nk=").toString("utf8")).toBe("hi");
  });

  it("rejects text that is not base64", () => {
    expect(() => decodeBase64("not base64!")).toThrow("data must be base64-encoded");
    expect(() => decodeBase64("abcde")).toThrow("data must be base64-encoded");
  });
});

describe("media handlers", () => {
  let harness: DispatcherHarness;

  beforeEach(async () => {
    harness = await createDispatcherHarness();
  });

  afterEach(async () => {
    await harness.cleanup();
  });

  it("stores, retrieves and deletes files", async () => {
    expect(await harness.result("storeMediaFile", { filename: "greeting.txt", data: "aGk=" })).toBe("greeting.txt");
    expect(await harness.result("retrieveMediaFile", { filename: "greeting.txt" })).toBe("aGk=");

    expect(await harness.result("deleteMediaFile", { filename: "greeting.txt" })).toBeNull();
    expect(await harness.result("retrieveMediaFile", { filename: "greeting.txt" })).toBe(false);
  });

  it("keeps files inside the media folder", async () => {
    expect(await harness.result("storeMediaFile", { filename: "../outside.txt", data: "aGk=" })).toBe("outside.txt");
    expect(await harness.profiles.media()?.exists("outside.txt")).toBe(true);
  });

  it("reports bad data and bad names", async () => {
    expect((await harness.call("storeMediaFile", { filename: "x.txt", data: "???" })).error).toBe(
      "data must be base64-encoded"
    );
    expect((await harness.call("storeMediaFile", { filename: "??", data: "aGk=" })).error).toBe(
      'Invalid media file name: "??"'
    );
  });

  it("needs an open profile", async () => {
    await harness.profiles.close();
    expect((await harness.call("retrieveMediaFile", { filename: "greeting.txt" })).error).toBe(
      "Collection not available"
    );
  });
});
