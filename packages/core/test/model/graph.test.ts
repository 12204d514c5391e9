import { describe, test, expect } from "vitest";

import {
  appendTarget,
  createRenderGraph,
  isPrimKind,
  isRelationshipName,
  kindOf,
  openRelationship,
  productNamesOf,
  recordPrim,
  recordProductName,
  relationshipTargets,
} from "../../src/model/graph.js";

describe("render graph model", () => {
  test("recognizes the fixed kinds and relationship names", () => {
    expect(isPrimKind("RenderProduct")).toBe(true);
    expect(isPrimKind("Scope")).toBe(false);
    expect(isRelationshipName("orderedVars")).toBe(true);
    expect(isRelationshipName("camera")).toBe(false);
  });

  test("absent sources have no targets", () => {
    expect(relationshipTargets(createRenderGraph(), "/nowhere")).toEqual([]);
  });

  test("openRelationship keeps existing targets", () => {
    const graph = createRenderGraph();
    appendTarget(graph, "/rs", "/p");
    openRelationship(graph, "/rs");
    expect(relationshipTargets(graph, "/rs")).toEqual(["/p"]);
  });

  test("kindOf finds the bucket of a classified path", () => {
    const graph = createRenderGraph();
    recordPrim(graph, "RenderVar", "/vars/C");
    expect(kindOf(graph, "/vars/C")).toBe("RenderVar");
    expect(kindOf(graph, "/vars/Z")).toBeNull();
  });

  test("a product's output names are its targets that are product names", () => {
    const graph = createRenderGraph();
    appendTarget(graph, "/p", "/vars/C");
    recordProductName(graph, "/p", "beauty.%04d.exr");
    appendTarget(graph, "/q", "/vars/C");

    expect(productNamesOf(graph, "/p")).toEqual(["beauty.%04d.exr"]);
    expect(productNamesOf(graph, "/q")).toEqual([]);
    expect(productNamesOf(graph, "/missing")).toEqual([]);
  });
});
