import {
  appendTarget,
  createRenderGraph,
  isPrimKind,
  isRelationshipName,
  openRelationship,
  recordPrim,
  recordProductName,
  RELATIONSHIP_NAMES,
  type LayerMetadata,
  type RenderGraph,
} from "../model/graph.js";
import { MalformedLayerError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import { normalizeFramePadding } from "./frame-padding.js";

/* ---------- Line patterns ---------- */

const KEY_VALUE = /^\s*([^=]+?)\s*=\s*(.*?)\s*$/;
const PRIM_DEF = /^(\s*)def\s+(?:([A-Za-z_]\w*)\s+)?"([^"]+)"/;
const RELATIONSHIP = new RegExp(
  String.raw`\b(?:rel|token)\s+(${RELATIONSHIP_NAMES.join("|")})(?:\.timeSamples)?\s*=\s*(.*?)\s*$`,
);
const SINGLE_PATH = /^<([^>]*)>$/;
const QUOTED = /^"(.*)"$/;
const ARRAY_ENTRY = /<(.*)>/;
const INLINE_ARRAY_ENTRY = /<([^>]*)>/g;
const MAP_ENTRY = /[-+\d.eE]+\s*:\s*"(.+)",?/;

/** Indentation unit of the flattened text. */
const INDENT_WIDTH = 4;

/* ---------- Parser state ---------- */

type Terminator = "]" | "}";

/**
 * What the parser does with lines inside a multi-line relationship value.
 * - `consuming-array`: every `<path>` line is a target of `source`
 * - `consuming-map`: the first `time: "literal",` line is the product name of `source`
 * - `skipping`: drop lines until the terminator
 */
export type ResumeState =
  | { kind: "idle" }
  | { kind: "consuming-array"; source: string; terminator: "]" }
  | { kind: "consuming-map"; source: string; terminator: "}" }
  | { kind: "skipping"; terminator: Terminator };

export interface ParserState {
  readonly graph: RenderGraph;
  /** Still reading the layer preamble. Never re-entered once left. */
  inMetadata: boolean;
  /** Segments of the innermost prim seen so far. */
  segments: readonly string[];
  /** Depth of that prim; -1 before the first `def`. */
  depth: number;
  resume: ResumeState;
}

const IDLE: ResumeState = { kind: "idle" };

export function createParserState(): ParserState {
  return {
    graph: createRenderGraph(),
    inMetadata: true,
    segments: [],
    depth: -1,
    resume: IDLE,
  };
}

export function currentPath(state: ParserState): string {
  return state.segments.length === 0 ? "" : `/${state.segments.join("/")}`;
}

/* ---------- Entry points ---------- */

/**
 * Build a render graph from the flattened text of a layer.
 *
 * Throws MalformedLayerError when the metadata preamble is never closed;
 * anything else that does not match a known line shape is skipped.
 */
export function parseRenderGraph(text: string | readonly string[], file?: string): RenderGraph {
  const lines = typeof text === "string" ? splitLines(text) : text;
  const state = createParserState();
  for (const line of lines) {
    step(state, line);
  }
  if (state.inMetadata) {
    throw new MalformedLayerError(
      `Layer metadata is never closed: no line containing only ")" in ${lines.length} line(s)`,
      lines.length,
      file,
    );
  }
  debug.parse("graph.done", {
    settings: state.graph.prims.RenderSettings.size,
    products: state.graph.prims.RenderProduct.size,
    passes: state.graph.prims.RenderPass.size,
    productNames: [...state.graph.productNames],
  });
  return state.graph;
}

/**
 * Read every `key = value` pair of a layer's metadata preamble
 * (the output of `usdcat --layerMetadata`).
 */
export function parseLayerMetadata(text: string | readonly string[], file?: string): Record<string, string> {
  const lines = typeof text === "string" ? splitLines(text) : text;
  const pairs: Record<string, string> = {};
  for (const line of lines) {
    if (isMetadataTerminator(line)) return pairs;
    const pair = readKeyValue(line);
    if (pair) pairs[pair.key] = pair.value;
  }
  throw new MalformedLayerError(
    `Layer metadata is never closed: no line containing only ")" in ${lines.length} line(s)`,
    lines.length,
    file,
  );
}

/** Advance the parser by one line. */
export function step(state: ParserState, line: string): void {
  if (state.inMetadata) {
    stepMetadata(state, line);
    return;
  }
  if (state.resume.kind !== "idle") {
    stepResume(state, state.resume, line);
    return;
  }
  if (stepPrim(state, line)) return;
  stepRelationship(state, line);
}

/* ---------- Metadata ---------- */

function stepMetadata(state: ParserState, line: string): void {
  if (isMetadataTerminator(line)) {
    state.inMetadata = false;
    debug.parse("metadata.end", { ...state.graph.metadata });
    return;
  }
  const pair = readKeyValue(line);
  if (pair) assignMetadata(state.graph.metadata, pair.key, pair.value);
}

function isMetadataTerminator(line: string): boolean {
  return line.trim() === ")";
}

function readKeyValue(line: string): { key: string; value: string } | null {
  const match = KEY_VALUE.exec(line);
  if (!match) return null;
  const key = match[1] ?? "";
  if (!key) return null;
  return { key, value: unquote(match[2] ?? "") };
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}

function assignMetadata(metadata: LayerMetadata, key: string, value: string): void {
  switch (key) {
    case "startTimeCode":
    case "endTimeCode":
    case "framesPerSecond":
    case "timeCodesPerSecond": {
      const num = Number(value);
      if (value !== "" && Number.isFinite(num)) metadata[key] = num;
      return;
    }
    case "defaultPrim":
      metadata.defaultPrim = value;
      return;
    case "renderSettingsPrimPath":
      if (value) metadata.renderSettingsPrimPath = value;
      return;
  }
}

/* ---------- Prims ---------- */

function stepPrim(state: ParserState, line: string): boolean {
  const match = PRIM_DEF.exec(line);
  if (!match) return false;

  const indent = match[1] ?? "";
  const kind = match[2];
  const name = match[3] ?? "";
  const depth = Math.floor(indent.length / INDENT_WIDTH);

  if (depth > state.depth) {
    state.segments = [...state.segments, name];
  } else {
    const pops = state.depth - depth + 1;
    state.segments = [...state.segments.slice(0, Math.max(0, state.segments.length - pops)), name];
  }
  state.depth = depth;

  const path = currentPath(state);
  if (kind !== undefined && isPrimKind(kind)) {
    recordPrim(state.graph, kind, path);
  }
  debug.parse("prim.def", { path, kind: kind ?? null, depth });
  return true;
}

/* ---------- Relationships ---------- */

function stepRelationship(state: ParserState, line: string): void {
  const match = RELATIONSHIP.exec(line);
  if (!match) return;

  const name = match[1] ?? "";
  if (!isRelationshipName(name)) return;
  const value = match[2] ?? "";
  const source = currentPath(state);
  const { graph } = state;
  openRelationship(graph, source);

  const single = SINGLE_PATH.exec(value);
  if (single) {
    appendTarget(graph, source, single[1] ?? "");
    return;
  }

  if (value.startsWith("[")) {
    if (value.includes("]")) {
      for (const entry of value.matchAll(INLINE_ARRAY_ENTRY)) {
        appendTarget(graph, source, entry[1] ?? "");
      }
      return;
    }
    state.resume = { kind: "consuming-array", source, terminator: "]" };
    debug.parse("resume.array", { source, name });
    return;
  }

  if (value.startsWith("{")) {
    if (value.includes("}")) {
      const entry = MAP_ENTRY.exec(value);
      if (entry) recordProductName(graph, source, normalizeFramePadding(entry[1] ?? ""));
      return;
    }
    state.resume = { kind: "consuming-map", source, terminator: "}" };
    debug.parse("resume.map", { source, name });
    return;
  }

  const quoted = QUOTED.exec(value);
  if (quoted && quoted[1]) {
    recordProductName(graph, source, normalizeFramePadding(quoted[1]));
  }
}

function stepResume(state: ParserState, resume: Exclude<ResumeState, { kind: "idle" }>, line: string): void {
  if (line.includes(resume.terminator)) {
    state.resume = IDLE;
    return;
  }

  switch (resume.kind) {
    case "skipping":
      return;

    case "consuming-array": {
      const match = ARRAY_ENTRY.exec(line);
      if (!match) {
        endResume(state, resume.source, line);
        return;
      }
      appendTarget(state.graph, resume.source, match[1] ?? "");
      return;
    }

    case "consuming-map": {
      const match = MAP_ENTRY.exec(line);
      if (!match) {
        endResume(state, resume.source, line);
        return;
      }
      // Only the first time sample counts as the product's current name
      recordProductName(state.graph, resume.source, normalizeFramePadding(match[1] ?? ""));
      state.resume = { kind: "skipping", terminator: resume.terminator };
      return;
    }
  }
}

function endResume(state: ParserState, source: string, line: string): void {
  debug.parse("resume.unmatched", { source, line: line.trim() });
  state.resume = IDLE;
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}
