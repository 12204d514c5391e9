import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import {
  CONFIG_FILE_NAME,
  DEFAULT_JOB_OPTIONS,
  DEFAULT_RENDER_EXECUTABLE,
  loadConfigFile,
  mergeConfigs,
  normalizeFarmConfig,
  parseFarmConfig,
  resolveFarmConfig,
} from "../src/config.js";
import { FarmError, FarmErrorCode } from "../src/errors.js";
import { createTempDir } from "./_helpers/test-utils.js";

function writeConfig(dir: string, value: unknown, name = CONFIG_FILE_NAME): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, name);
  writeFileSync(path, JSON.stringify(value));
  return path;
}

describe("config normalization", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("fills every default", () => {
    const resolved = normalizeFarmConfig({}, {});
    expect(resolved).toEqual({
      renderExecutable: DEFAULT_RENDER_EXECUTABLE,
      version: "",
      dumpTool: null,
      submitCommand: "deadlinecommand",
      plugin: "HuskStandalone",
      tempDir: os.tmpdir(),
      dumpTimeoutMs: 60_000,
      job: DEFAULT_JOB_OPTIONS,
    });
    expect(resolved.job).toEqual({
      chunkSize: 5,
      logLevel: 3,
      renderer: null,
      extraArgs: "",
      comment: "",
    });
  });

  it("environment variables override file values", () => {
    vi.stubEnv("RENDERPLAN_VERSION", "20.5.332");
    vi.stubEnv("RENDERPLAN_SUBMIT_COMMAND", "/opt/farm/bin/submit");
    vi.stubEnv("RENDERPLAN_TEMP_DIR", "/scratch");
    vi.stubEnv("RENDERPLAN_RENDER_EXECUTABLE", "/opt/hfsXX.X.XXX/bin/husk");

    const resolved = normalizeFarmConfig({ version: "19.5.0", tempDir: "/var/tmp" });
    expect(resolved.version).toBe("20.5.332");
    expect(resolved.submitCommand).toBe("/opt/farm/bin/submit");
    expect(resolved.tempDir).toBe("/scratch");
    expect(resolved.renderExecutable).toBe("/opt/hfsXX.X.XXX/bin/husk");
  });

  it("empty environment values are ignored", () => {
    const resolved = normalizeFarmConfig({ version: "20.0.1" }, { RENDERPLAN_VERSION: "" });
    expect(resolved.version).toBe("20.0.1");
  });

  it("an empty renderer falls back to none", () => {
    expect(normalizeFarmConfig({ job: { renderer: "" } }, {}).job.renderer).toBeNull();
  });
});

describe("config validation", () => {
  it("copies known keys and ignores unknown ones", () => {
    const config = parseFarmConfig(
      { version: "20.5.332", job: { chunkSize: 10, renderer: "BRAY_HdKarmaXPU" }, colour: "blue" },
      "inline",
    );
    expect(config).toEqual({ version: "20.5.332", job: { chunkSize: 10, renderer: "BRAY_HdKarmaXPU" } });
  });

  it("rejects values of the wrong type", () => {
    expect(() => parseFarmConfig({ version: 20 }, "a.json")).toThrow('Invalid config a.json: "version" must be a string');
    expect(() => parseFarmConfig({ job: { chunkSize: 2.5 } }, "a.json")).toThrow(
      '"job.chunkSize" must be a non-negative integer',
    );
    expect(() => parseFarmConfig({ dumpTimeoutMs: 0 }, "a.json")).toThrow('"dumpTimeoutMs" must be a positive number');
    expect(() => parseFarmConfig([], "a.json")).toThrow("expected a JSON object");
  });

  it("raises CONFIG_INVALID", () => {
    try {
      parseFarmConfig({ job: "fast" }, "a.json");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FarmError);
      expect(error).toMatchObject({ code: FarmErrorCode.CONFIG_INVALID, file: "a.json" });
    }
  });
});

describe("config merging", () => {
  it("override wins and job merges one level deep", () => {
    const merged = mergeConfigs(
      { version: "19.5", submitCommand: "base", job: { chunkSize: 10, comment: "base" } },
      { version: "20.5", job: { comment: "shot" } },
    );
    expect(merged).toEqual({
      version: "20.5",
      submitCommand: "base",
      job: { chunkSize: 10, comment: "shot" },
    });
  });

  it("null base returns the override", () => {
    const override = { plugin: "Other" };
    expect(mergeConfigs(null, override)).toBe(override);
  });
});

describe("config file loading", () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir("renderplan-config-");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("returns null when there is no config file", async () => {
    expect(await loadConfigFile(root)).toBeNull();
  });

  it("walks up from the search directory to the root", async () => {
    writeConfig(root, { version: "20.5.332" });
    const nested = join(root, "shots", "sh010");
    mkdirSync(nested, { recursive: true });

    expect(await loadConfigFile(root, nested)).toEqual({ version: "20.5.332" });
  });

  it("the nearest config wins", async () => {
    writeConfig(root, { version: "outer" });
    const nested = join(root, "shots");
    writeConfig(nested, { version: "inner" });

    expect(await loadConfigFile(root, join(nested, "shot.usd"))).toEqual({ version: "inner" });
  });

  it("merges an extended base config first", async () => {
    writeConfig(join(root, "studio"), { submitCommand: "studio-submit", job: { chunkSize: 20, comment: "studio" } });
    writeConfig(root, { extends: "./studio", job: { comment: "show" } });

    expect(await loadConfigFile(root)).toEqual({
      submitCommand: "studio-submit",
      job: { chunkSize: 20, comment: "show" },
    });
  });

  it("extends a file path without its .json extension", async () => {
    writeConfig(root, { plugin: "BasePlugin" }, "base.json");
    writeConfig(root, { extends: "./base" });

    expect(await loadConfigFile(root)).toEqual({ plugin: "BasePlugin" });
  });

  it("rejects circular extends", async () => {
    writeConfig(root, { extends: "./other.json" });
    writeConfig(root, { extends: `./${CONFIG_FILE_NAME}` }, "other.json");

    await expect(loadConfigFile(root)).rejects.toMatchObject({ code: FarmErrorCode.CONFIG_CIRCULAR_EXTENDS });
  });

  it("rejects an unresolvable extends", async () => {
    writeConfig(root, { extends: "./missing" });
    await expect(loadConfigFile(root)).rejects.toMatchObject({ code: FarmErrorCode.CONFIG_INVALID });
  });

  it("rejects malformed JSON", async () => {
    writeFileSync(join(root, CONFIG_FILE_NAME), "{ version: ");
    await expect(loadConfigFile(root)).rejects.toMatchObject({ code: FarmErrorCode.CONFIG_INVALID });
  });

  it("resolves file, inline options and environment together", async () => {
    writeConfig(root, { version: "19.5.0", plugin: "FilePlugin", job: { chunkSize: 8 } });

    const resolved = await resolveFarmConfig({
      root,
      inline: { version: "20.0.0" },
      env: { RENDERPLAN_TEMP_DIR: "/scratch" },
    });
    expect(resolved.version).toBe("20.0.0");
    expect(resolved.plugin).toBe("FilePlugin");
    expect(resolved.job.chunkSize).toBe(8);
    expect(resolved.tempDir).toBe("/scratch");
  });
});
