/**
 * `renderplan` command line: inspect a scene's render graph, preview its
 * plan, or submit scenes to the farm.
 */

import { readFile } from "node:fs/promises";
import { parse as parsePath, resolve } from "node:path";
import {
  RenderPlanError,
  parseRenderGraph,
  planOutputs,
  renderGraphToJson,
} from "@renderplan/core";
import type { OutputPlan, RenderGraph } from "@renderplan/core";
import { spawnCommand } from "./command.js";
import { resolveFarmConfig } from "./config.js";
import type { FarmConfig, ResolvedFarmConfig } from "./config.js";
import { formatDiagnostic, hasErrors } from "./diagnostics.js";
import { createDumpTool } from "./dump-tool.js";
import type { DumpTool } from "./dump-tool.js";
import { FarmError, FarmErrorCode } from "./errors.js";
import { buildJobInfo, buildPluginInfo } from "./job-files.js";
import { locateDumpTool, locateExecutable } from "./locator.js";
import type { ExistsCheck } from "./locator.js";
import {
  createCommandSubmitter,
  formatResultsMessage,
  planSubmission,
  submitBatch,
} from "./submission.js";
import type { JobSubmitter, SubmissionOptions } from "./submission.js";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_FAILED_ITEMS = 2;

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

/** Everything the CLI touches outside the process. */
export interface CliHost {
  createDumpTool(config: ResolvedFarmConfig): DumpTool;
  createSubmitter(config: ResolvedFarmConfig): JobSubmitter;
  readText(path: string): Promise<string>;
  exists?: ExistsCheck;
}

export const defaultCliIo: CliIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  cwd: process.cwd(),
  env: process.env,
};

export const defaultCliHost: CliHost = {
  createDumpTool(config) {
    const executable = config.dumpTool ?? findDumpTool(config);
    return createDumpTool(executable, spawnCommand, config.dumpTimeoutMs);
  },
  createSubmitter: (config) => createCommandSubmitter(config.submitCommand),
  readText: (path) => readFile(path, "utf-8"),
};

function findDumpTool(config: ResolvedFarmConfig): string {
  const renderer = locateExecutable(config.renderExecutable, config.version);
  const dumpTool = renderer ? locateDumpTool(renderer) : null;
  if (!dumpTool) {
    throw new FarmError(
      renderer
        ? `usdcat not found next to ${renderer}`
        : `Renderer not found for version "${config.version}" in ${config.renderExecutable}`,
      FarmErrorCode.EXECUTABLE_NOT_FOUND,
    );
  }
  return dumpTool;
}

// ============================================================================
// Argument Parsing
// ============================================================================

const VALUE_FLAGS = [
  "--text",
  "--pass",
  "--settings",
  "--outputs",
  "--frames",
  "--batch",
  "--comment",
  "--chunk",
  "--renderer",
  "--extra-args",
  "--render-version",
] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  values: Partial<Record<ValueFlag, string>>;
  dryRun: boolean;
  help: boolean;
}

class UsageError extends Error {}

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === arg);
}

function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: undefined, positionals: [], values: {}, dryRun: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (arg === "--dry-run") {
      parsed.dryRun = true;
    } else if (isValueFlag(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`${arg} needs a value`);
      }
      parsed.values[arg] = value;
      i++;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option ${arg}`);
    } else if (parsed.command === undefined) {
      parsed.command = arg;
    } else {
      parsed.positionals.push(arg);
    }
  }
  return parsed;
}

function parseChunk(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const chunk = Number(value);
  if (!Number.isInteger(chunk) || chunk < 1) {
    throw new UsageError(`--chunk must be a positive integer, got "${value}"`);
  }
  return chunk;
}

// ============================================================================
// Commands
// ============================================================================

/** Run the CLI and return its exit code. */
export async function runCli(
  argv: readonly string[],
  io: CliIo = defaultCliIo,
  host: CliHost = defaultCliHost,
): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.err(error.message);
    io.err(usage());
    return EXIT_ERROR;
  }

  if (args.help) {
    io.out(usage());
    return EXIT_OK;
  }

  try {
    switch (args.command) {
      case "inspect":
        return await inspectCommand(args, io, host);
      case "plan":
        return await planCommand(args, io, host);
      case "submit":
        return await submitCommand(args, io, host);
      default:
        io.err(args.command ? `Unknown command ${args.command}` : "No command given");
        io.err(usage());
        return EXIT_ERROR;
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(error.message);
      io.err(usage());
      return EXIT_ERROR;
    }
    if (error instanceof RenderPlanError) {
      io.err(`Error [${error.code}]: ${error.message}`);
      return EXIT_ERROR;
    }
    throw error;
  }
}

async function loadConfig(args: ParsedArgs, io: CliIo): Promise<ResolvedFarmConfig> {
  const inline: FarmConfig = {};
  const version = args.values["--render-version"];
  if (version !== undefined) {
    inline.version = version;
  }
  return resolveFarmConfig({ root: parsePath(io.cwd).root, searchFrom: io.cwd, inline, env: io.env });
}

function singleScene(args: ParsedArgs, io: CliIo): string {
  const [scene, ...extra] = args.positionals;
  if (scene === undefined || extra.length > 0) {
    throw new UsageError(`${args.command ?? ""} takes exactly one scene file`);
  }
  return resolve(io.cwd, scene);
}

/** The graph from a saved dump (`--text`) or from the dump tool. */
async function readGraph(args: ParsedArgs, io: CliIo, host: CliHost): Promise<RenderGraph> {
  const scene = singleScene(args, io);
  const textPath = args.values["--text"];
  if (textPath !== undefined) {
    return parseRenderGraph(await readDump(host, resolve(io.cwd, textPath)), textPath);
  }
  const config = await loadConfig(args, io);
  return parseRenderGraph(await host.createDumpTool(config).flatten(scene), scene);
}

async function readDump(host: CliHost, path: string): Promise<string> {
  try {
    return await host.readText(path);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FarmError(`Cannot read ${path}: ${reason}`, FarmErrorCode.READ_FAILED, path, error);
  }
}

async function inspectCommand(args: ParsedArgs, io: CliIo, host: CliHost): Promise<number> {
  const graph = await readGraph(args, io, host);
  io.out(JSON.stringify(renderGraphToJson(graph), null, 2));
  return EXIT_OK;
}

async function planCommand(args: ParsedArgs, io: CliIo, host: CliHost): Promise<number> {
  const graph = await readGraph(args, io, host);
  const plan = planOutputs(graph, {
    passSelection: args.values["--pass"],
    settingsSelection: args.values["--settings"],
    outputOverride: args.values["--outputs"],
  });
  io.out(JSON.stringify(planToJson(plan), null, 2));
  return EXIT_OK;
}

function planToJson(plan: OutputPlan): Record<string, { settings: string[]; outputs: string[] }> {
  const json: Record<string, { settings: string[]; outputs: string[] }> = {};
  for (const [pass, { settings, outputs }] of plan) {
    json[pass] = { settings, outputs };
  }
  return json;
}

async function submitCommand(args: ParsedArgs, io: CliIo, host: CliHost): Promise<number> {
  if (args.positionals.length === 0) {
    throw new UsageError("submit needs at least one scene file");
  }
  const scenes = args.positionals.map((scene) => resolve(io.cwd, scene));
  const config = await loadConfig(args, io);

  const options: SubmissionOptions = {
    frames: args.values["--frames"],
    batchName: args.values["--batch"],
    comment: args.values["--comment"],
    chunkSize: parseChunk(args.values["--chunk"]),
    passSelection: args.values["--pass"],
    settingsSelection: args.values["--settings"],
    outputOverride: args.values["--outputs"],
    renderer: args.values["--renderer"],
    extraArgs: args.values["--extra-args"],
  };

  const plan = await planSubmission(scenes, options, config, {
    dumpTool: host.createDumpTool(config),
    exists: host.exists,
  });
  for (const diag of plan.diagnostics) {
    io.err(formatDiagnostic(diag));
  }

  if (args.dryRun) {
    for (const job of plan.jobs) {
      io.out(`# ${job.name}\n${buildJobInfo(job)}${buildPluginInfo(job)}`);
    }
    return hasErrors(plan.diagnostics) ? EXIT_FAILED_ITEMS : EXIT_OK;
  }

  const results = await submitBatch(plan, host.createSubmitter(config), config.tempDir);
  io.out(formatResultsMessage(results));
  return results.fail.size > 0 ? EXIT_FAILED_ITEMS : EXIT_OK;
}

function usage(): string {
  return `
renderplan - Plan and submit render-pass jobs for layered scenes

Usage:
  renderplan inspect <scene> [--text <dump>]
  renderplan plan <scene> [--pass <patterns>] [--settings <patterns>] [--outputs <names>] [--text <dump>]
  renderplan submit <scene...> [options]

Submit options:
  --frames <start-end>      Frame range for every scene (default: from each scene)
  --batch <name>            Batch name (default: common prefix of the scene names)
  --comment <text>          Job comment
  --chunk <n>               Frames per task
  --pass <patterns>         Render passes to submit, one job each
  --settings <patterns>     Render settings to use instead of the passes' own
  --outputs <names>         Comma separated output names
  --renderer <name>         Renderer delegate
  --extra-args <args>       Extra renderer arguments
  --render-version <v>      Renderer version used to find the executable
  --dry-run                 Print the job files instead of submitting

Other options:
  --text <dump>             Read a saved flatten dump instead of running the dump tool
  --help, -h                Show this help message

Environment:
  RENDERPLAN_DEBUG          Debug channels (parse,resolve,plan,farm,config or *)

Exit codes:
  0  Success
  1  Error (invalid args, unreadable config, missing tools)
  2  One or more scenes or jobs failed
`.trim();
}
