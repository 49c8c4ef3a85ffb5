/**
 * Configuration and File Utility Tests
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigError, ErrorCode } from "../../core/errors.js";
import { CONFIG_FILE, loadConfig, parseNamesList, readText } from "../index.js";
import { isLogLevel } from "../logger.js";

describe("parseNamesList", () => {
  it("drops comments and blank lines", () => {
    expect(parseNamesList("example.com\n# skipped\n\n  example.net  # trailing\r\n")).toEqual([
      "example.com",
      "example.net",
    ]);
  });
});

describe("isLogLevel", () => {
  it("accepts pino levels only", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "authgraph-config-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("uses defaults without a file or environment", async () => {
    expect(await loadConfig({ projectRoot: tempDir, env: {} })).toEqual({ assetBase: "share", defaultFormat: "dot" });
  });

  it("lets the environment override the file", async () => {
    await fs.writeFile(
      path.join(tempDir, CONFIG_FILE),
      JSON.stringify({ assetBase: "/static", defaultFormat: "svg", logLevel: "warn" })
    );

    const config = await loadConfig({ projectRoot: tempDir, env: { AUTHGRAPH_FORMAT: "PNG" } });

    expect(config).toEqual({ assetBase: "/static", defaultFormat: "png", logLevel: "warn" });
  });

  it("rejects unknown keys in the file", async () => {
    await fs.writeFile(path.join(tempDir, CONFIG_FILE), JSON.stringify({ theme: "dark" }));
    await expect(loadConfig({ projectRoot: tempDir, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects a file that is not JSON", async () => {
    await fs.writeFile(path.join(tempDir, CONFIG_FILE), "{ assetBase: ");
    await expect(loadConfig({ projectRoot: tempDir, env: {} })).rejects.toMatchObject({
      code: ErrorCode.CONFIGURATION_ERROR,
    });
  });

  it("rejects an invalid format from the environment", async () => {
    await expect(loadConfig({ projectRoot: tempDir, env: { AUTHGRAPH_FORMAT: "pdf" } })).rejects.toThrow(
      /^Invalid configuration from environment: defaultFormat: /
    );
  });
});

describe("readText", () => {
  it("reports unreadable files as file system errors", async () => {
    await expect(readText(path.join(os.tmpdir(), "authgraph-missing", "input.json"))).rejects.toMatchObject({
      code: ErrorCode.FILE_SYSTEM_ERROR,
    });
  });
});
