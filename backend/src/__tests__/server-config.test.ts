/**
 * Server Configuration Tests
 *
 * Environment variables over deckbridge.yaml over defaults.
 */

import { rm, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  CONFIG_FILE_NAME,
  DEFAULT_HOST,
  DEFAULT_PORT,
  getDataDir,
  getPort,
  loadFileConfig,
  loadServerConfig,
  parseOrigins,
} from "../server-config";
import { createTempDir } from "./test-helpers";

describe("getDataDir", () => {
  it("uses DECKBRIDGE_DATA_DIR when set", () => {
    expect(getDataDir({ DECKBRIDGE_DATA_DIR: "/srv/decks" })).toBe("/srv/decks");
  });

  it("defaults to ~/.deckbridge", () => {
    expect(getDataDir({})).toBe(join(homedir(), ".deckbridge"));
  });
});

describe("getPort", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the fallback when PORT is not set", () => {
    expect(getPort({})).toBe(DEFAULT_PORT);
    expect(getPort({}, 9000)).toBe(9000);
  });

  it("parses a valid PORT", () => {
    expect(getPort({ PORT: "4000" })).toBe(4000);
  });

  it("ignores invalid PORT values", () => {
    expect(getPort({ PORT: "not-a-number" })).toBe(DEFAULT_PORT);
    expect(getPort({ PORT: "0" })).toBe(DEFAULT_PORT);
    expect(getPort({ PORT: "70000" })).toBe(DEFAULT_PORT);
  });
});

describe("parseOrigins", () => {
  it("splits, trims and drops blanks", () => {
    expect(parseOrigins(" http://a.test , ,http://b.test")).toEqual(["http://a.test", "http://b.test"]);
  });
});

describe("config file", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await createTempDir();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  it("returns an empty config when the file is missing", async () => {
    expect(await loadFileConfig(dataDir)).toEqual({});
  });

  it("reads deckbridge.yaml", async () => {
    await writeFile(
      join(dataDir, CONFIG_FILE_NAME),
      ["host: 0.0.0.0", "port: 9001", "corsOrigins:", "  - http://localhost:3000", "apiKey: test-secret"].join("\n")
    );

    expect(await loadFileConfig(dataDir)).toEqual({
      host: "0.0.0.0",
      port: 9001,
      corsOrigins: ["http://localhost:3000"],
      apiKey: "test-secret",
    });
  });

  it("ignores an empty file", async () => {
    await writeFile(join(dataDir, CONFIG_FILE_NAME), "");
    expect(await loadFileConfig(dataDir)).toEqual({});
  });

  it("ignores malformed YAML and invalid values", async () => {
    await writeFile(join(dataDir, CONFIG_FILE_NAME), "port: [unclosed");
    expect(await loadFileConfig(dataDir)).toEqual({});

    await writeFile(join(dataDir, CONFIG_FILE_NAME), "port: 99999");
    expect(await loadFileConfig(dataDir)).toEqual({});
  });

  it("resolves defaults", async () => {
    expect(await loadServerConfig({ DECKBRIDGE_DATA_DIR: dataDir })).toEqual({
      host: DEFAULT_HOST,
      port: DEFAULT_PORT,
      dataDir,
      corsOrigins: ["*"],
      apiKey: undefined,
      defaultProfile: "User 1",
      logLevel: "info",
    });
  });

  it("prefers the environment over the file", async () => {
    await writeFile(join(dataDir, CONFIG_FILE_NAME), "port: 9001\ndefaultProfile: Work\napiKey: file-key");

    const config = await loadServerConfig({
      DECKBRIDGE_DATA_DIR: dataDir,
      PORT: "9100",
      DECKBRIDGE_API_KEY: "test-secret",
      DECKBRIDGE_CORS_ORIGINS: "http://a.test",
    });

    expect(config.port).toBe(9100);
    expect(config.apiKey).toBe("test-secret");
    expect(config.corsOrigins).toEqual(["http://a.test"]);
    expect(config.defaultProfile).toBe("Work");
  });

  it("takes the log level from LOG_LEVEL, the file, then DEBUG", async () => {
    await writeFile(join(dataDir, CONFIG_FILE_NAME), "logLevel: warn");

    expect((await loadServerConfig({ DECKBRIDGE_DATA_DIR: dataDir, LOG_LEVEL: "ERROR" })).logLevel).toBe("error");
    expect((await loadServerConfig({ DECKBRIDGE_DATA_DIR: dataDir, LOG_LEVEL: "loud" })).logLevel).toBe("warn");

    await rm(join(dataDir, CONFIG_FILE_NAME));
    expect((await loadServerConfig({ DECKBRIDGE_DATA_DIR: dataDir, DEBUG: "1" })).logLevel).toBe("debug");
  });
});
