/* =======================================================================================
 * RENDER GRAPH MODEL
 * ---------------------------------------------------------------------------------------
 * Pure data types for the render subtree of a flattened layer, plus the small set of
 * mutators the extractor uses while building one. Nothing here performs I/O.
 * ======================================================================================= */

/** Prim kinds recorded into their own bucket. */
export const PRIM_KINDS = ["RenderSettings", "RenderProduct", "RenderVar", "RenderPass"] as const;

export type PrimKind = (typeof PRIM_KINDS)[number];

/** Relationship (or token) names whose targets are recorded. */
export const RELATIONSHIP_NAMES = ["products", "renderSource", "orderedVars", "productName"] as const;

export type RelationshipName = (typeof RELATIONSHIP_NAMES)[number];

/** Default render settings prim used when the layer does not name one. */
export const DEFAULT_RENDER_SETTINGS_PATH = "/Render/rendersettings";

/** Layer-level scalar metadata read from the preamble. */
export interface LayerMetadata {
  startTimeCode: number | null;
  endTimeCode: number | null;
  framesPerSecond: number | null;
  timeCodesPerSecond: number | null;
  defaultPrim: string | null;
  renderSettingsPrimPath: string;
}

/**
 * Render prims and relationships of one layer.
 *
 * Every relationship of a prim lands in the same ordered list, keyed by the
 * source prim path. Targets are prim paths or literal product names.
 */
export interface RenderGraph {
  readonly metadata: LayerMetadata;
  readonly prims: Readonly<Record<PrimKind, Set<string>>>;
  /** Frame-normalized product names, in discovery order. */
  readonly productNames: Set<string>;
  readonly relationships: Map<string, string[]>;
}

export function createLayerMetadata(): LayerMetadata {
  return {
    startTimeCode: null,
    endTimeCode: null,
    framesPerSecond: null,
    timeCodesPerSecond: null,
    defaultPrim: null,
    renderSettingsPrimPath: DEFAULT_RENDER_SETTINGS_PATH,
  };
}

export function createRenderGraph(): RenderGraph {
  return {
    metadata: createLayerMetadata(),
    prims: {
      RenderSettings: new Set(),
      RenderProduct: new Set(),
      RenderVar: new Set(),
      RenderPass: new Set(),
    },
    productNames: new Set(),
    relationships: new Map(),
  };
}

export function isPrimKind(value: string): value is PrimKind {
  return PRIM_KINDS.some((kind) => kind === value);
}

export function isRelationshipName(value: string): value is RelationshipName {
  return RELATIONSHIP_NAMES.some((name) => name === value);
}

/* ---------- Mutators (extractor only) ---------- */

export function recordPrim(graph: RenderGraph, kind: PrimKind, path: string): void {
  graph.prims[kind].add(path);
}

/** Ensure `source` has a relationship list and return it. */
export function openRelationship(graph: RenderGraph, source: string): string[] {
  let targets = graph.relationships.get(source);
  if (!targets) {
    targets = [];
    graph.relationships.set(source, targets);
  }
  return targets;
}

export function appendTarget(graph: RenderGraph, source: string, target: string): void {
  openRelationship(graph, source).push(target);
}

export function recordProductName(graph: RenderGraph, source: string, name: string): void {
  graph.productNames.add(name);
  appendTarget(graph, source, name);
}

/* ---------- Queries ---------- */

export function primsOfKind(graph: RenderGraph, kind: PrimKind): readonly string[] {
  return [...graph.prims[kind]];
}

/** Targets recorded for `source`; empty for unknown sources. */
export function relationshipTargets(graph: RenderGraph, source: string): readonly string[] {
  return graph.relationships.get(source) ?? [];
}

export function kindOf(graph: RenderGraph, path: string): PrimKind | null {
  for (const kind of PRIM_KINDS) {
    if (graph.prims[kind].has(path)) return kind;
  }
  return null;
}

export function isProductName(graph: RenderGraph, target: string): boolean {
  return graph.productNames.has(target);
}

/** Targets of a product's list that are recorded product names, in list order. */
export function productNamesOf(graph: RenderGraph, productPath: string): string[] {
  return relationshipTargets(graph, productPath).filter((target) => isProductName(graph, target));
}

/** Plain-JSON view of a graph, for printing and structural comparison. */
export interface RenderGraphJson {
  metadata: LayerMetadata;
  prims: Record<PrimKind, string[]>;
  productNames: string[];
  relationships: Record<string, string[]>;
}

export function renderGraphToJson(graph: RenderGraph): RenderGraphJson {
  const relationships: Record<string, string[]> = {};
  for (const [source, targets] of graph.relationships) {
    relationships[source] = [...targets];
  }
  return {
    metadata: { ...graph.metadata },
    prims: {
      RenderSettings: [...graph.prims.RenderSettings],
      RenderProduct: [...graph.prims.RenderProduct],
      RenderVar: [...graph.prims.RenderVar],
      RenderPass: [...graph.prims.RenderPass],
    },
    productNames: [...graph.productNames],
    relationships,
  };
}
