/**
 * Batch submission: scene files in, one farm job per render pass out.
 *
 * Planning reads each scene through the dump tool, extracts its render graph
 * and plans its outputs. A scene that cannot be read fails on its own; the
 * rest of the batch still plans and submits.
 */

import { existsSync } from "node:fs";
import {
  LAYER_DEFAULT_PASS,
  RenderPlanError,
  debug,
  parseLayerMetadata,
  parseRenderGraph,
  planOutputs,
} from "@renderplan/core";
import type { PassPlan } from "@renderplan/core";
import { spawnCommand } from "./command.js";
import type { CommandRunner } from "./command.js";
import type { ResolvedFarmConfig } from "./config.js";
import { SubmissionDiagnosticCode, buildDiagnostic } from "./diagnostics.js";
import type { SubmissionDiagnostic } from "./diagnostics.js";
import type { DumpTool } from "./dump-tool.js";
import { FarmError, FarmErrorCode } from "./errors.js";
import { writeJobFiles } from "./job-files.js";
import type { ArgumentValue, FarmJob, JobFilePaths } from "./job-files.js";
import type { ExistsCheck } from "./locator.js";

// ============================================================================
// Types
// ============================================================================

export interface SubmissionOptions {
  /** Frame range `start-end`; replaces the range read from each scene. */
  frames?: string | null;
  /** Batch name; derived from the scene names when absent. */
  batchName?: string | null;
  comment?: string;
  chunkSize?: number;
  passSelection?: string | null;
  settingsSelection?: string | null;
  outputOverride?: string | null;
  renderer?: string | null;
  extraArgs?: string;
  /** Extra renderer arguments, placed before the per-pass ones. */
  arguments?: ReadonlyMap<string, ArgumentValue>;
}

export interface SubmissionHost {
  dumpTool: DumpTool;
  exists?: ExistsCheck;
}

export interface SceneFailure {
  scene: string;
  /** Job name the scene would have had. */
  name: string;
  error: RenderPlanError;
}

export interface SubmissionPlan {
  batchName: string;
  jobs: FarmJob[];
  failures: SceneFailure[];
  diagnostics: SubmissionDiagnostic[];
}

/** Farm command output per job name. */
export interface SubmissionResults {
  success: Map<string, string>;
  fail: Map<string, string>;
}

/** Submits one job's files and returns the farm command's output. */
export type JobSubmitter = (files: JobFilePaths) => Promise<string>;

export interface FrameRange {
  start: number;
  end: number;
}

// ============================================================================
// Names and Frames
// ============================================================================

const FRAME_RANGE = /^\s*(-?\d+)\s*-\s*(-?\d+)\s*$/;

/** Parse `start-end`; the end must not come before the start. */
export function parseFrameRange(value: string): FrameRange {
  const match = FRAME_RANGE.exec(value);
  if (!match) {
    throw new FarmError(`Invalid frame range "${value}": expected <start>-<end>`, FarmErrorCode.FRAME_RANGE_INVALID);
  }
  const start = Number(match[1]);
  const end = Number(match[2]);
  if (end < start) {
    throw new FarmError(
      `Invalid frame range "${value}": end frame must not be lower than start frame`,
      FarmErrorCode.FRAME_RANGE_INVALID,
    );
  }
  return { start, end };
}

/** `<startTimeCode>-<endTimeCode>`, exactly as the layer states them. */
export function frameListFromMetadata(metadata: Readonly<Record<string, string>>, scene?: string): string {
  const start = metadata["startTimeCode"];
  const end = metadata["endTimeCode"];
  if (start === undefined || end === undefined) {
    throw new FarmError(
      `Layer metadata has no ${start === undefined ? "startTimeCode" : "endTimeCode"}`,
      FarmErrorCode.FRAME_RANGE_INVALID,
      scene,
    );
  }
  return `${start}-${end}`;
}

/**
 * Batch name for several scenes: the common leading characters of their
 * paths, extension and directory stripped.
 *
 * `shots/Scene_v005.FG.usd`, `shots/Scene_v005.BG.usd` → `Scene_v005`.
 * A single scene needs no batch name.
 */
export function batchNameFor(scenes: readonly string[]): string {
  const [first, ...rest] = scenes;
  if (first === undefined || rest.length === 0) {
    return "";
  }
  let prefix = first;
  for (const scene of rest) {
    let i = 0;
    while (i < prefix.length && i < scene.length && prefix[i] === scene[i]) i++;
    prefix = prefix.slice(0, i);
  }
  return baseName(stripExtension(prefix));
}

/** `shot.usd` for the layer default, `shot.usd [beauty]` for a pass. */
export function jobNameFor(scene: string, pass: string): string {
  const name = baseName(scene);
  return pass === LAYER_DEFAULT_PASS ? name : `${name} [${baseName(pass)}]`;
}

/**
 * Results are reported per name, so every job and failure of a plan needs its
 * own. Colliding names fall back to the full pass path, then to the full
 * scene path, then to a running number.
 */
function disambiguateNames(plan: SubmissionPlan): void {
  const entries: Array<{ item: { name: string }; scene: string; pass: string }> = [
    ...plan.jobs.map((job) => ({ item: job, scene: job.scene, pass: job.pass })),
    ...plan.failures.map((failure) => ({ item: failure, scene: failure.scene, pass: LAYER_DEFAULT_PASS })),
  ];
  const fallbacks: Array<(scene: string, pass: string) => string> = [
    (scene, pass) => (pass === LAYER_DEFAULT_PASS ? baseName(scene) : `${baseName(scene)} [${pass}]`),
    (scene, pass) => (pass === LAYER_DEFAULT_PASS ? scene : `${scene} [${pass}]`),
  ];
  for (const rename of fallbacks) {
    const counts = countNames(entries.map((entry) => entry.item.name));
    for (const entry of entries) {
      if ((counts.get(entry.item.name) ?? 0) > 1) {
        entry.item.name = rename(entry.scene, entry.pass);
      }
    }
  }

  const seen = new Map<string, number>();
  for (const { item } of entries) {
    const count = (seen.get(item.name) ?? 0) + 1;
    seen.set(item.name, count);
    if (count > 1) item.name = `${item.name} (${count})`;
  }
}

function countNames(names: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const name of names) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return counts;
}

function lastSeparator(path: string): number {
  return Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
}

function baseName(path: string): string {
  return path.slice(lastSeparator(path) + 1);
}

/** Drop the last extension; leading dots of a name are not one. */
function stripExtension(path: string): string {
  const sep = lastSeparator(path);
  const dot = path.lastIndexOf(".");
  if (dot <= sep || /^\.*$/.test(path.slice(sep + 1, dot))) {
    return path;
  }
  return path.slice(0, dot);
}

// ============================================================================
// Planning
// ============================================================================

/**
 * Plan a batch. Throws only for problems with the batch as a whole
 * (an invalid frame range override); per-scene problems become failures.
 */
export async function planSubmission(
  scenes: readonly string[],
  options: SubmissionOptions,
  config: ResolvedFarmConfig,
  host: SubmissionHost,
): Promise<SubmissionPlan> {
  const frameOverride = options.frames?.trim() || null;
  if (frameOverride !== null) {
    parseFrameRange(frameOverride);
  }

  const exists = host.exists ?? existsSync;
  const plan: SubmissionPlan = {
    batchName: options.batchName ?? batchNameFor(scenes),
    jobs: [],
    failures: [],
    diagnostics: [],
  };

  for (const scene of scenes) {
    try {
      if (!exists(scene)) {
        throw new FarmError(`Scene file does not exist: ${scene}`, FarmErrorCode.SCENE_NOT_FOUND, scene);
      }
      const frames = frameOverride ?? frameListFromMetadata(
        parseLayerMetadata(await host.dumpTool.layerMetadata(scene), scene),
        scene,
      );
      const graph = parseRenderGraph(await host.dumpTool.flatten(scene), scene);
      const passes = planOutputs(graph, {
        passSelection: options.passSelection,
        settingsSelection: options.settingsSelection,
        outputOverride: options.outputOverride,
      });

      if (passes.size === 0) {
        plan.diagnostics.push(buildDiagnostic({
          code: SubmissionDiagnosticCode.NO_PASSES_RESOLVED,
          message: `No render pass matches "${options.passSelection ?? ""}"`,
          file: scene,
        }));
      }
      for (const [pass, passPlan] of passes) {
        plan.jobs.push(buildJob({ scene, pass, passPlan, frames, batchName: plan.batchName }, options, config));
        plan.diagnostics.push(...passDiagnostics(scene, pass, passPlan));
      }
    } catch (error) {
      if (!(error instanceof RenderPlanError)) {
        throw error;
      }
      debug.farm("scene.failed", { scene, code: error.code });
      plan.failures.push({ scene, name: baseName(scene), error });
      plan.diagnostics.push(buildDiagnostic({
        code: SubmissionDiagnosticCode.SCENE_FAILED,
        message: error.message,
        severity: "error",
        file: scene,
        data: { errorCode: error.code },
      }));
    }
  }

  disambiguateNames(plan);
  debug.farm("plan", {
    scenes: scenes.length,
    jobs: plan.jobs.length,
    failures: plan.failures.length,
    batchName: plan.batchName,
  });
  return plan;
}

interface PassJobInput {
  scene: string;
  pass: string;
  passPlan: PassPlan;
  frames: string;
  batchName: string;
}

/** Per-job fields come from the options, falling back to the config's job defaults. */
export function buildJob(input: PassJobInput, options: SubmissionOptions, config: ResolvedFarmConfig): FarmJob {
  const { scene, pass, passPlan } = input;
  const args = new Map<string, ArgumentValue>(options.arguments ?? []);
  if (pass !== LAYER_DEFAULT_PASS) {
    args.set("--pass", pass);
  }
  const [firstSettings] = passPlan.settings;
  if (passPlan.settingsSource === "selection" && firstSettings !== undefined) {
    args.set("--settings", firstSettings);
  }

  return {
    plugin: config.plugin,
    name: jobNameFor(scene, pass),
    batchName: input.batchName,
    comment: options.comment ?? config.job.comment,
    frames: input.frames,
    chunkSize: options.chunkSize ?? config.job.chunkSize,
    outputs: [...passPlan.outputs],
    scene,
    version: config.version,
    logLevel: config.job.logLevel,
    renderer: options.renderer || config.job.renderer,
    extraArgs: options.extraArgs ?? config.job.extraArgs,
    arguments: args,
    pass,
  };
}

function passDiagnostics(scene: string, pass: string, passPlan: PassPlan): SubmissionDiagnostic[] {
  const diagnostics: SubmissionDiagnostic[] = [];
  const label = pass === LAYER_DEFAULT_PASS ? "the layer's render settings" : `pass ${pass}`;
  if (passPlan.outputs.length === 0) {
    diagnostics.push(buildDiagnostic({
      code: SubmissionDiagnosticCode.NO_OUTPUTS_RESOLVED,
      message: `No outputs resolved for ${label}`,
      file: scene,
      pass,
    }));
  }
  if (passPlan.settingsSource === "selection" && passPlan.settings.length > 1) {
    diagnostics.push(buildDiagnostic({
      code: SubmissionDiagnosticCode.MULTIPLE_SETTINGS,
      message: `${passPlan.settings.length} render settings selected; the job renders with ${passPlan.settings[0] ?? ""}`,
      file: scene,
      pass,
      data: { settings: [...passPlan.settings] },
    }));
  }
  return diagnostics;
}

// ============================================================================
// Submitting
// ============================================================================

/** Submit through the farm manager's command line: `<command> <job file> <plugin file>`. */
export function createCommandSubmitter(command: string, run: CommandRunner = spawnCommand): JobSubmitter {
  return async (files) => {
    const result = await run(command, [files.jobInfo, files.pluginInfo]);
    return result.stdout + result.stderr;
  };
}

/** The farm manager reports an accepted job with this line. */
export const SUBMIT_SUCCESS_MARKER = "Result=Success";

/**
 * Write and submit every job of the plan, in order. Scenes that failed to
 * plan are reported as failed submissions.
 */
export async function submitBatch(
  plan: SubmissionPlan,
  submit: JobSubmitter,
  dir: string,
): Promise<SubmissionResults> {
  const results: SubmissionResults = { success: new Map(), fail: new Map() };
  for (const failure of plan.failures) {
    results.fail.set(failure.name, failure.error.message);
  }

  for (const [index, job] of plan.jobs.entries()) {
    const files = await writeJobFiles(job, dir, index);
    let output: string;
    try {
      output = await submit(files);
    } catch (error) {
      if (!(error instanceof RenderPlanError)) {
        throw error;
      }
      output = error.message;
    }
    const bucket = output.includes(SUBMIT_SUCCESS_MARKER) ? results.success : results.fail;
    bucket.set(job.name, output);
    debug.farm("submit", { name: job.name, success: bucket === results.success });
  }
  return results;
}

// ============================================================================
// Reporting
// ============================================================================

const SUCCESS_HEADER = "---| Successful Submissions |---";
const FAIL_HEADER = "-!!|   Failed Submissions   |!!-";

/**
 * Report for the user: successful job names, then failed ones with the
 * non-blank lines of their output indented by a tab.
 */
export function formatResultsMessage(results: SubmissionResults): string {
  let message = "";
  for (const [kind, entries] of [["success", results.success], ["fail", results.fail]] as const) {
    if (entries.size === 0) continue;

    message += `${kind === "success" ? SUCCESS_HEADER : FAIL_HEADER}\n`;
    for (const [name, output] of entries) {
      message += `${name}\n`;
      if (kind === "fail") {
        message += linesWithEnds(output)
          .filter((line) => line.trim())
          .map((line) => `\t${line}`)
          .join("");
        message += "\n";
      }
    }
    message += "\n";
  }
  return message.trimEnd();
}

function linesWithEnds(text: string): string[] {
  return text.match(/[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g) ?? [];
}
