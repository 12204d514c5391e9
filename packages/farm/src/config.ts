/**
 * Farm configuration: defaults, validation, file discovery and merging.
 *
 * Precedence (lowest → highest): defaults, `extends` bases, the config file,
 * inline options (CLI flags), environment variables.
 *
 * @module @renderplan/farm
 */

import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import { tmpdir } from "node:os";
import { dirname, extname, join, resolve as resolvePath } from "node:path";
import { debug } from "@renderplan/core";
import { FarmError, FarmErrorCode } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/** Per-job defaults, overridable per submission. */
export interface JobDefaults {
  chunkSize?: number;
  /** Renderer log verbosity, passed as `--verbose a<level>`. */
  logLevel?: number;
  renderer?: string;
  extraArgs?: string;
  comment?: string;
}

/** Shape of `renderplan.config.json`. */
export interface FarmConfig {
  /** Base config: relative path, directory, or package specifier. */
  extends?: string;
  /** `;`-separated candidate paths of the renderer; `XX.X.XXX` stands for the version. */
  renderExecutable?: string;
  version?: string;
  /** Explicit dump tool; defaults to `usdcat` next to the renderer. */
  dumpTool?: string;
  submitCommand?: string;
  plugin?: string;
  tempDir?: string;
  dumpTimeoutMs?: number;
  job?: JobDefaults;
}

export interface ResolvedJobDefaults {
  chunkSize: number;
  logLevel: number;
  renderer: string | null;
  extraArgs: string;
  comment: string;
}

export interface ResolvedFarmConfig {
  renderExecutable: string;
  version: string;
  dumpTool: string | null;
  submitCommand: string;
  plugin: string;
  tempDir: string;
  dumpTimeoutMs: number;
  job: ResolvedJobDefaults;
}

// ============================================================================
// Defaults
// ============================================================================

export const CONFIG_FILE_NAME = "renderplan.config.json";

export const VERSION_PLACEHOLDER = "XX.X.XXX";

export const DEFAULT_JOB_OPTIONS: ResolvedJobDefaults = {
  chunkSize: 5,
  logLevel: 3,
  renderer: null,
  extraArgs: "",
  comment: "",
};

export const DEFAULT_RENDER_EXECUTABLE = [
  `/opt/hfs${VERSION_PLACEHOLDER}/bin/husk`,
  `C:\\Program Files\\Side Effects Software\\Houdini ${VERSION_PLACEHOLDER}\\bin\\husk.exe`,
  `/Applications/Houdini/Houdini${VERSION_PLACEHOLDER}/Frameworks/Houdini.framework/Versions/Current/Resources/bin/husk`,
].join(";");

export const DEFAULT_FARM_CONFIG: Omit<ResolvedFarmConfig, "tempDir"> = {
  renderExecutable: DEFAULT_RENDER_EXECUTABLE,
  version: "",
  dumpTool: null,
  submitCommand: "deadlinecommand",
  plugin: "HuskStandalone",
  dumpTimeoutMs: 60_000,
  job: DEFAULT_JOB_OPTIONS,
};

/** Environment variables that override config values. */
export const ENV_OVERRIDES = {
  renderExecutable: "RENDERPLAN_RENDER_EXECUTABLE",
  version: "RENDERPLAN_VERSION",
  submitCommand: "RENDERPLAN_SUBMIT_COMMAND",
  tempDir: "RENDERPLAN_TEMP_DIR",
} as const;

// ============================================================================
// Normalization
// ============================================================================

export function normalizeJobDefaults(job: JobDefaults | undefined): ResolvedJobDefaults {
  return {
    chunkSize: job?.chunkSize ?? DEFAULT_JOB_OPTIONS.chunkSize,
    logLevel: job?.logLevel ?? DEFAULT_JOB_OPTIONS.logLevel,
    renderer: job?.renderer || DEFAULT_JOB_OPTIONS.renderer,
    extraArgs: job?.extraArgs ?? DEFAULT_JOB_OPTIONS.extraArgs,
    comment: job?.comment ?? DEFAULT_JOB_OPTIONS.comment,
  };
}

/** Fill defaults and apply environment overrides. */
export function normalizeFarmConfig(
  config: FarmConfig,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedFarmConfig {
  const fromEnv = (name: string): string | undefined => {
    const value = env[name];
    return value ? value : undefined;
  };

  const resolved: ResolvedFarmConfig = {
    renderExecutable:
      fromEnv(ENV_OVERRIDES.renderExecutable) ?? config.renderExecutable ?? DEFAULT_FARM_CONFIG.renderExecutable,
    version: fromEnv(ENV_OVERRIDES.version) ?? config.version ?? DEFAULT_FARM_CONFIG.version,
    dumpTool: config.dumpTool ?? DEFAULT_FARM_CONFIG.dumpTool,
    submitCommand: fromEnv(ENV_OVERRIDES.submitCommand) ?? config.submitCommand ?? DEFAULT_FARM_CONFIG.submitCommand,
    plugin: config.plugin ?? DEFAULT_FARM_CONFIG.plugin,
    tempDir: fromEnv(ENV_OVERRIDES.tempDir) ?? config.tempDir ?? tmpdir(),
    dumpTimeoutMs: config.dumpTimeoutMs ?? DEFAULT_FARM_CONFIG.dumpTimeoutMs,
    job: normalizeJobDefaults(config.job),
  };
  debug.config("resolved", { ...resolved });
  return resolved;
}

// ============================================================================
// Validation
// ============================================================================

const STRING_KEYS = ["extends", "renderExecutable", "version", "dumpTool", "submitCommand", "plugin", "tempDir"] as const;
const JOB_NUMBER_KEYS = ["chunkSize", "logLevel"] as const;
const JOB_STRING_KEYS = ["renderer", "extraArgs", "comment"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(source: string, message: string): FarmError {
  return new FarmError(`Invalid config ${source}: ${message}`, FarmErrorCode.CONFIG_INVALID, source);
}

/**
 * Check a parsed config file and copy out the known keys.
 * Unknown keys are ignored; known keys of the wrong type are errors.
 */
export function parseFarmConfig(raw: unknown, source: string): FarmConfig {
  if (!isRecord(raw)) {
    throw invalid(source, "expected a JSON object");
  }

  const config: FarmConfig = {};
  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "string") throw invalid(source, `"${key}" must be a string`);
    config[key] = value;
  }

  const timeout = raw["dumpTimeoutMs"];
  if (timeout !== undefined) {
    if (typeof timeout !== "number" || !Number.isFinite(timeout) || timeout <= 0) {
      throw invalid(source, `"dumpTimeoutMs" must be a positive number`);
    }
    config.dumpTimeoutMs = timeout;
  }

  const job = raw["job"];
  if (job !== undefined) {
    if (!isRecord(job)) throw invalid(source, `"job" must be an object`);
    const parsedJob: JobDefaults = {};
    for (const key of JOB_NUMBER_KEYS) {
      const value = job[key];
      if (value === undefined) continue;
      if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
        throw invalid(source, `"job.${key}" must be a non-negative integer`);
      }
      parsedJob[key] = value;
    }
    for (const key of JOB_STRING_KEYS) {
      const value = job[key];
      if (value === undefined) continue;
      if (typeof value !== "string") throw invalid(source, `"job.${key}" must be a string`);
      parsedJob[key] = value;
    }
    config.job = parsedJob;
  }

  return config;
}

// ============================================================================
// Config File Loading
// ============================================================================

/**
 * Find and load `renderplan.config.json`, searching from `searchFrom`
 * (default: `root`) up to `root`. Returns null when there is none.
 */
export async function loadConfigFile(root: string, searchFrom?: string): Promise<FarmConfig | null> {
  const rootDir = resolvePath(root);
  const startDir = resolveSearchDir(rootDir, searchFrom);
  const configPath = findConfigFile(startDir, rootDir);
  if (!configPath) {
    debug.config("file.none", { startDir, rootDir });
    return null;
  }
  return loadConfigWithExtends(configPath, new Set());
}

function resolveSearchDir(rootDir: string, searchFrom?: string): string {
  if (!searchFrom) {
    return rootDir;
  }
  const resolved = resolvePath(searchFrom);
  if (existsSync(resolved) && statSync(resolved).isFile()) {
    return dirname(resolved);
  }
  return resolved;
}

function findConfigFile(startDir: string, rootDir: string): string | null {
  let current = startDir;
  const stop = resolvePath(rootDir);

  while (true) {
    const candidate = join(current, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    if (current === stop) {
      break;
    }
    const parent = dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }
  return null;
}

async function loadConfigWithExtends(configPath: string, visited: Set<string>): Promise<FarmConfig> {
  const resolvedPath = resolvePath(configPath);
  if (visited.has(resolvedPath)) {
    throw new FarmError(
      `Circular config extends detected: ${[...visited, resolvedPath].join(" -> ")}`,
      FarmErrorCode.CONFIG_CIRCULAR_EXTENDS,
      resolvedPath,
    );
  }
  visited.add(resolvedPath);

  const config = await readConfigJson(resolvedPath);
  debug.config("file.loaded", { path: resolvedPath, extends: config.extends ?? null });
  if (!config.extends) {
    return config;
  }

  const base = await loadExtendedConfig(config.extends, dirname(resolvedPath), visited);
  if (!base) {
    throw invalid(resolvedPath, `cannot resolve "extends": "${config.extends}"`);
  }
  const { extends: _extends, ...own } = config;
  return mergeConfigs(base, own);
}

async function loadExtendedConfig(
  specifier: string,
  baseDir: string,
  visited: Set<string>,
): Promise<FarmConfig | null> {
  const resolved = resolveExtendsSpecifier(specifier, baseDir);
  if (!resolved) {
    return null;
  }

  if (existsSync(resolved) && statSync(resolved).isDirectory()) {
    const candidate = join(resolved, CONFIG_FILE_NAME);
    return existsSync(candidate) ? loadConfigWithExtends(candidate, visited) : null;
  }
  if (existsSync(resolved)) {
    return loadConfigWithExtends(resolved, visited);
  }
  if (!extname(resolved) && existsSync(`${resolved}.json`)) {
    return loadConfigWithExtends(`${resolved}.json`, visited);
  }
  return null;
}

function resolveExtendsSpecifier(specifier: string, baseDir: string): string | null {
  const isPathLike =
    specifier.startsWith(".") ||
    specifier.startsWith("/") ||
    specifier.startsWith("\\");

  if (isPathLike) {
    return resolvePath(baseDir, specifier);
  }

  try {
    const require = createRequire(join(baseDir, "noop.js"));
    return require.resolve(specifier);
  } catch (error) {
    debug.config("extends.unresolved", { specifier, baseDir, error: String(error) });
    return null;
  }
}

async function readConfigJson(path: string): Promise<FarmConfig> {
  const text = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw invalid(path, error instanceof Error ? error.message : String(error));
  }
  return parseFarmConfig(raw, path);
}

/**
 * Merge configs with proper precedence: `override` wins key by key,
 * `job` is merged one level deep.
 */
export function mergeConfigs(base: FarmConfig | null, override: FarmConfig): FarmConfig {
  if (!base) {
    return override;
  }
  const merged: FarmConfig = { ...base, ...override };
  if (base.job || override.job) {
    merged.job = { ...base.job, ...override.job };
  }
  return merged;
}

/**
 * Load, merge with inline options, and normalize: the config the farm
 * commands run with.
 */
export async function resolveFarmConfig(options: {
  root: string;
  searchFrom?: string;
  inline?: FarmConfig;
  env?: NodeJS.ProcessEnv;
}): Promise<ResolvedFarmConfig> {
  const fileConfig = await loadConfigFile(options.root, options.searchFrom);
  return normalizeFarmConfig(mergeConfigs(fileConfig, options.inline ?? {}), options.env);
}
