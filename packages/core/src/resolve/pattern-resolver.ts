import type { PrimKind, RenderGraph } from "../model/graph.js";
import { primsOfKind } from "../model/graph.js";
import { debug } from "../shared/debug.js";

/**
 * Prim selection patterns.
 *
 * A selection is a comma and/or whitespace separated list of patterns. `*`
 * matches any run of characters and a pattern is rooted with a leading `/`
 * when it lacks one. Matching is a *search*: the pattern may match anywhere
 * in the path, so `/foo` selects `/group/foo2` and `rs1` selects `/Render/rs10`.
 * Users rely on that partial matching; it is intentionally kept.
 */

export function splitSelection(selection: string): string[] {
  return selection.split(/[\s,]+/).filter((pattern) => pattern.length > 0);
}

/** Compile one selection pattern to its search regex. */
export function compilePattern(pattern: string): RegExp {
  const body = pattern
    .split("*")
    .map((literal) => literal.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(body.startsWith("/") ? body : `/${body}`);
}

/**
 * Paths of `kind` selected by `selection`, grouped by pattern in pattern order
 * and by bucket order within a pattern. Paths matched by several patterns are
 * repeated.
 */
export function resolvePrimPattern(selection: string, graph: RenderGraph, kind: PrimKind): string[] {
  const candidates = primsOfKind(graph, kind);
  const resolved: string[] = [];

  for (const pattern of splitSelection(selection)) {
    const regex = compilePattern(pattern);
    const matches = candidates.filter((path) => regex.test(path));
    if (matches.length === 0) {
      debug.resolve("pattern.empty", { pattern, kind, candidates: candidates.length });
    }
    resolved.push(...matches);
  }

  debug.resolve("selection", { selection, kind, resolved });
  return resolved;
}
