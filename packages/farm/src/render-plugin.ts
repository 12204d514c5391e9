/**
 * Render-node side of a job: turn the plugin file back into a renderer
 * command line, and read the renderer's output while it runs.
 */

import { debug } from "@renderplan/core";
import { VERSION_PLACEHOLDER } from "./config.js";
import type { ResolvedFarmConfig } from "./config.js";
import { FarmError, FarmErrorCode } from "./errors.js";
import { locateExecutable } from "./locator.js";
import type { ExistsCheck } from "./locator.js";
import type { FrameRange } from "./submission.js";

/** Variable that hides one GPU from the XPU renderer. */
export const GPU_DISABLE_VAR_PREFIX = "KARMA_XPU_DISABLE_DEVICE_";

const PROGRESS_LINE = /ALF_PROGRESS ([0-9]+(?=%))/;
const ERROR_LINE = /USD ERROR(.*)/;

export interface RenderProgress {
  /** The matched text, shown as the task status. */
  status: string;
  percent: number;
}

export interface RenderFailure {
  message: string;
  detail: string;
}

function required(info: ReadonlyMap<string, string>, key: string): string {
  const value = info.get(key);
  if (value === undefined || value === "") {
    throw new FarmError(`Plugin info has no ${key}`, FarmErrorCode.PLUGIN_INFO_INVALID);
  }
  return value;
}

function words(value: string): string[] {
  return value.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Renderer arguments for one task covering `frames`.
 *
 * Order: scene, verbosity, frame window, output path creation, extra args,
 * renderer, then the `ArgumentList` entries. `True` entries are bare flags;
 * `False` and missing entries are left out.
 */
export function buildRenderArguments(info: ReadonlyMap<string, string>, frames: FrameRange): string[] {
  const scene = required(info, "SceneFile").replace(/\\/g, "/");
  const logLevel = required(info, "LogLevel");

  const args = [
    scene,
    "--verbose", `a${logLevel}`,
    "--frame", String(frames.start),
    "--frame-count", String(frames.end - frames.start + 1),
    "--make-output-path",
    ...words((info.get("ExtraArgs") ?? "").replace(/\r?\n/g, " ")),
  ];

  const renderer = info.get("Renderer");
  if (renderer) {
    args.push("--renderer", renderer);
  }

  const names = (info.get("ArgumentList") ?? "").split(";").filter((name) => name.length > 0);
  for (const name of names) {
    const value = info.get(name);
    if (value === undefined || value === "False") continue;
    if (value === "True") {
      args.push(name);
    } else {
      args.push(name, ...words(value));
    }
  }

  debug.farm("render.args", { scene, frames: `${frames.start}-${frames.end}`, count: args.length });
  return args;
}

/**
 * Find the renderer for the job's version. A missing version or executable is
 * reported through `report` and yields null.
 */
export function resolveRenderExecutable(
  config: Pick<ResolvedFarmConfig, "renderExecutable">,
  version: string,
  report: (message: string) => void = console.error,
  exists?: ExistsCheck,
): string | null {
  const found = locateExecutable(config.renderExecutable, version, exists);
  if (version === "" || !found) {
    const pathList = config.renderExecutable.split(VERSION_PLACEHOLDER).join(version);
    report(`Failed to find executable:\nconfig:${pathList}\nVersion:${version}\n`);
  }
  return found;
}

export function parseRenderProgress(line: string): RenderProgress | null {
  const match = PROGRESS_LINE.exec(line);
  if (!match) return null;
  return { status: match[0], percent: Number(match[1]) };
}

export function detectRenderError(line: string): RenderFailure | null {
  const match = ERROR_LINE.exec(line);
  if (!match) return null;
  return { message: match[0], detail: match[1] ?? "" };
}

/**
 * Environment that limits the renderer to the selected GPUs by disabling
 * every other device index below `maxGpus`. No affinity means no variables.
 */
export function gpuMaskEnvironment(selected: readonly number[] | null, maxGpus = 4): Record<string, string> {
  const env: Record<string, string> = {};
  if (selected === null) {
    return env;
  }
  for (let gpu = 0; gpu < maxGpus; gpu++) {
    if (!selected.includes(gpu)) {
      env[`${GPU_DISABLE_VAR_PREFIX}${gpu}`] = "1";
    }
  }
  return env;
}
