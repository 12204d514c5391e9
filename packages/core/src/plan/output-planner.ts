import type { RenderGraph } from "../model/graph.js";
import { productNamesOf, relationshipTargets } from "../model/graph.js";
import { resolvePrimPattern } from "../resolve/pattern-resolver.js";
import { debug } from "../shared/debug.js";

/** Key of the implicit pass used when no pass is selected: the layer's own settings. */
export const LAYER_DEFAULT_PASS = "";

export interface OutputPlanOptions {
  /** Pass selection patterns (RenderPass). */
  passSelection?: string | null;
  /** Settings selection patterns (RenderSettings); replaces pass-derived settings. */
  settingsSelection?: string | null;
  /** Comma separated output names; replaces graph traversal. */
  outputOverride?: string | null;
}

export interface PassPlan {
  settings: string[];
  outputs: string[];
  /** Where the settings came from. */
  settingsSource: "layer-default" | "render-source" | "selection";
  /** Where the outputs came from. */
  outputsSource: "graph" | "override";
}

/** Pass key (`""` for the layer default) to what gets rendered for it, in pass order. */
export type OutputPlan = Map<string, PassPlan>;

/**
 * Plan the settings and output names to render for each selected pass.
 *
 * Precedence, per pass:
 * - settings: explicit selection > the pass's `renderSource` > the layer's render settings prim
 * - outputs: explicit override > product names reachable through settings → products
 *
 * An empty output list means nothing could be resolved; it is not an error here.
 */
export function planOutputs(graph: RenderGraph, options: OutputPlanOptions = {}): OutputPlan {
  const passSelection = provided(options.passSelection);
  const settingsSelection = provided(options.settingsSelection);
  const outputOverride = provided(options.outputOverride);

  const passes = passSelection !== null
    ? resolvePrimPattern(passSelection, graph, "RenderPass")
    : [LAYER_DEFAULT_PASS];

  const selectedSettings = settingsSelection !== null
    ? resolvePrimPattern(settingsSelection, graph, "RenderSettings")
    : null;
  const overrideOutputs = outputOverride !== null ? splitOutputOverride(outputOverride) : null;

  const plan: OutputPlan = new Map();
  for (const pass of passes) {
    const settingsSource: PassPlan["settingsSource"] = selectedSettings
      ? "selection"
      : pass === LAYER_DEFAULT_PASS ? "layer-default" : "render-source";
    const settings = selectedSettings
      ? [...selectedSettings]
      : passSettings(graph, pass);

    const outputs = overrideOutputs
      ? [...overrideOutputs]
      : collectOutputs(graph, settings);

    if (outputs.length === 0) {
      debug.plan("pass.unresolved", { pass, settings });
    }
    debug.plan("pass", { pass, settingsSource, settings, outputs });

    plan.set(pass, {
      settings,
      outputs,
      settingsSource,
      outputsSource: overrideOutputs ? "override" : "graph",
    });
  }
  return plan;
}

/** Settings a pass renders by itself, without a settings selection. */
export function passSettings(graph: RenderGraph, pass: string): string[] {
  if (pass === LAYER_DEFAULT_PASS) {
    return [graph.metadata.renderSettingsPrimPath];
  }
  return [...relationshipTargets(graph, pass)];
}

/**
 * Output names of the products `settings` point at, in settings → product order.
 * A product contributes every target that is a recorded product name, wherever
 * it sits in the product's list.
 */
export function collectOutputs(graph: RenderGraph, settings: readonly string[]): string[] {
  const outputs: string[] = [];
  for (const settingsPath of settings) {
    for (const product of relationshipTargets(graph, settingsPath)) {
      outputs.push(...productNamesOf(graph, product));
    }
  }
  return outputs;
}

export function splitOutputOverride(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function provided(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return value.trim() === "" ? null : value;
}
