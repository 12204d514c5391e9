/**
 * @renderplan/core
 *
 * Extract the render graph of a flattened layer and plan the outputs each
 * render pass produces.
 *
 * @example
 * ```typescript
 * import { parseRenderGraph, planOutputs } from "@renderplan/core";
 *
 * const graph = parseRenderGraph(flattenedText);
 * for (const [pass, { settings, outputs }] of planOutputs(graph, { passSelection: "beauty" })) {
 *   console.log(pass, settings, outputs);
 * }
 * ```
 */

// === Model ===
export {
  PRIM_KINDS,
  RELATIONSHIP_NAMES,
  DEFAULT_RENDER_SETTINGS_PATH,
  createRenderGraph,
  createLayerMetadata,
  isPrimKind,
  isRelationshipName,
  primsOfKind,
  relationshipTargets,
  kindOf,
  isProductName,
  productNamesOf,
  renderGraphToJson,
} from "./model/graph.js";
export type {
  PrimKind,
  RelationshipName,
  LayerMetadata,
  RenderGraph,
  RenderGraphJson,
} from "./model/graph.js";

// === Parsing ===
export { parseRenderGraph, parseLayerMetadata, createParserState, currentPath, step } from "./parsing/layer-parser.js";
export type { ParserState, ResumeState } from "./parsing/layer-parser.js";
export { normalizeFramePadding, hasFrameToken, paddingToken, splitFileName } from "./parsing/frame-padding.js";
export type { FileNameParts } from "./parsing/frame-padding.js";

// === Resolution ===
export { resolvePrimPattern, splitSelection, compilePattern } from "./resolve/pattern-resolver.js";

// === Planning ===
export {
  planOutputs,
  passSettings,
  collectOutputs,
  splitOutputOverride,
  LAYER_DEFAULT_PASS,
} from "./plan/output-planner.js";
export type { OutputPlan, OutputPlanOptions, PassPlan } from "./plan/output-planner.js";

// === Shared ===
export { RenderPlanError, MalformedLayerError, LayerErrorCode } from "./shared/errors.js";
export type { LayerErrorCodeType } from "./shared/errors.js";
export {
  debug,
  configureDebug,
  resetDebugConfig,
  refreshDebugChannels,
  isDebugEnabled,
  getDebugChannel,
  DEBUG_ENV_VAR,
} from "./shared/debug.js";
export type { Debug, DebugChannel, DebugConfig, DebugData } from "./shared/debug.js";
