/**
 * @renderplan/farm
 *
 * Locate the renderer and its dump tool, plan one farm job per render pass,
 * write the job files and submit them.
 */

// === Configuration ===
export {
  CONFIG_FILE_NAME,
  VERSION_PLACEHOLDER,
  DEFAULT_FARM_CONFIG,
  DEFAULT_JOB_OPTIONS,
  DEFAULT_RENDER_EXECUTABLE,
  ENV_OVERRIDES,
  loadConfigFile,
  mergeConfigs,
  normalizeFarmConfig,
  normalizeJobDefaults,
  parseFarmConfig,
  resolveFarmConfig,
} from "./config.js";
export type { FarmConfig, JobDefaults, ResolvedFarmConfig, ResolvedJobDefaults } from "./config.js";

// === Tools ===
export { expandSearchList, locateExecutable, locateDumpTool } from "./locator.js";
export type { ExistsCheck } from "./locator.js";
export { spawnCommand } from "./command.js";
export type { CommandOptions, CommandResult, CommandRunner } from "./command.js";
export { createDumpTool, RENDER_MASK } from "./dump-tool.js";
export type { DumpTool } from "./dump-tool.js";

// === Jobs ===
export { buildJobInfo, buildPluginInfo, parseKeyValueFile, writeJobFiles } from "./job-files.js";
export type { ArgumentValue, FarmJob, JobFilePaths } from "./job-files.js";
export {
  SUBMIT_SUCCESS_MARKER,
  batchNameFor,
  buildJob,
  createCommandSubmitter,
  formatResultsMessage,
  frameListFromMetadata,
  jobNameFor,
  parseFrameRange,
  planSubmission,
  submitBatch,
} from "./submission.js";
export type {
  FrameRange,
  JobSubmitter,
  SceneFailure,
  SubmissionHost,
  SubmissionOptions,
  SubmissionPlan,
  SubmissionResults,
} from "./submission.js";

// === Render side ===
export {
  GPU_DISABLE_VAR_PREFIX,
  buildRenderArguments,
  detectRenderError,
  gpuMaskEnvironment,
  parseRenderProgress,
  resolveRenderExecutable,
} from "./render-plugin.js";
export type { RenderFailure, RenderProgress } from "./render-plugin.js";

// === Diagnostics and errors ===
export { SubmissionDiagnosticCode, buildDiagnostic, formatDiagnostic, hasErrors } from "./diagnostics.js";
export type { DiagnosticSeverity, SubmissionDiagnostic, SubmissionDiagnosticCodeType } from "./diagnostics.js";
export { FarmError, FarmErrorCode } from "./errors.js";
export type { FarmErrorCodeType } from "./errors.js";

// === CLI ===
export { runCli, defaultCliHost, defaultCliIo, EXIT_OK, EXIT_ERROR, EXIT_FAILED_ITEMS } from "./cli.js";
export type { CliHost, CliIo } from "./cli.js";
