/**
 * Job and plugin description files handed to the farm manager.
 *
 * Both are plain `key=value` lines. The plugin file lists the renderer
 * arguments twice: once as `ArgumentList` (names, `;`-joined, in order) and
 * once per argument, so the render side can rebuild the command line.
 */

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { debug } from "@renderplan/core";

/** A bare flag is `true`; anything else is passed as the flag's value. */
export type ArgumentValue = string | true;

export interface FarmJob {
  plugin: string;
  name: string;
  /** Omitted from the job file when empty. */
  batchName: string;
  comment: string;
  /** Frame list, e.g. `1001-1250`. */
  frames: string;
  chunkSize: number;
  outputs: string[];
  scene: string;
  version: string;
  logLevel: number;
  renderer: string | null;
  extraArgs: string;
  /** Renderer arguments in command-line order. */
  arguments: Map<string, ArgumentValue>;
  /** Pass key the job renders (`""` for the layer default). */
  pass: string;
}

export interface JobFilePaths {
  jobInfo: string;
  pluginInfo: string;
}

export function buildJobInfo(job: FarmJob): string {
  const lines = [`Plugin=${job.plugin}`, `Name=${job.name}`];
  if (job.batchName) {
    lines.push(`BatchName=${job.batchName}`);
  }
  lines.push(`Comment=${job.comment}`, `Frames=${job.frames}`, `ChunkSize=${job.chunkSize}`);
  job.outputs.forEach((output, i) => lines.push(`OutputFilename${i}=${output}`));
  return toFileText(lines);
}

export function buildPluginInfo(job: FarmJob): string {
  const lines = [`SceneFile=${job.scene}`, `Version=${job.version}`, `LogLevel=${job.logLevel}`];
  if (job.renderer) {
    lines.push(`Renderer=${job.renderer}`);
  }
  if (job.extraArgs) {
    lines.push(`ExtraArgs=${job.extraArgs.replace(/\r?\n/g, " ")}`);
  }
  lines.push(`ArgumentList=${[...job.arguments.keys()].join(";")}`);
  for (const [name, value] of job.arguments) {
    lines.push(`${name}=${value === true ? "True" : value}`);
  }
  return toFileText(lines);
}

/**
 * Read a job or plugin file back. The value is everything after the first `=`;
 * lines without one are ignored. Later keys win.
 */
export function parseKeyValueFile(text: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    entries.set(line.slice(0, eq).trim(), line.slice(eq + 1));
  }
  return entries;
}

/**
 * Write both files for the job at `index` of a batch. Each job in a batch
 * gets its own pair, so a batch can be written before any of it is submitted.
 */
export async function writeJobFiles(job: FarmJob, dir: string, index: number): Promise<JobFilePaths> {
  const paths: JobFilePaths = {
    jobInfo: join(dir, `renderplan_job_info_${index}.job`),
    pluginInfo: join(dir, `renderplan_plugin_info_${index}.job`),
  };
  await writeFile(paths.jobInfo, buildJobInfo(job), "utf-8");
  await writeFile(paths.pluginInfo, buildPluginInfo(job), "utf-8");
  debug.farm("job.files", { name: job.name, pass: job.pass, ...paths });
  return paths;
}

function toFileText(lines: readonly string[]): string {
  return `${lines.join("\n")}\n`;
}
