import { describe, test, expect } from "vitest";

import { hasFrameToken, normalizeFramePadding, splitFileName } from "../../src/parsing/frame-padding.js";

describe("frame padding", () => {
  test("replaces the frame number with a token of the same width", () => {
    expect(normalizeFramePadding("$HIP/render/beauty.1001.exr")).toBe("$HIP/render/beauty.%04d.exr");
    expect(normalizeFramePadding("shot_v003.00042.exr")).toBe("shot_v003.%05d.exr");
  });

  test("uses the frame number of the file name only", () => {
    expect(normalizeFramePadding("/jobs/ep101/sh010/comp.0010.tif")).toBe("/jobs/ep101/sh010/comp.%04d.tif");
    expect(normalizeFramePadding("C:\\renders\\v2\\beauty_1001.png")).toBe("C:\\renders\\v2\\beauty_%04d.png");
  });

  test("treats a trailing numeric suffix as the frame, not the extension", () => {
    expect(normalizeFramePadding("out/beauty.1001")).toBe("out/beauty.%04d");
  });

  test("is idempotent", () => {
    const once = normalizeFramePadding("render/beauty.1001.exr");
    expect(normalizeFramePadding(once)).toBe(once);
  });

  test("leaves names with an existing frame token untouched", () => {
    expect(normalizeFramePadding("beauty.$F4.exr")).toBe("beauty.$F4.exr");
    expect(normalizeFramePadding("beauty.####.exr")).toBe("beauty.####.exr");
    expect(normalizeFramePadding("beauty.%d.exr")).toBe("beauty.%d.exr");
  });

  test("leaves digits that are not a separated frame number untouched", () => {
    expect(normalizeFramePadding("beauty_4k.exr")).toBe("beauty_4k.exr");
    expect(normalizeFramePadding("render_v3.exr")).toBe("render_v3.exr");
    expect(normalizeFramePadding("out/beauty1001.exr")).toBe("out/beauty1001.exr");
  });

  test("a stem that is only digits is the frame", () => {
    expect(normalizeFramePadding("out/0042.exr")).toBe("out/%04d.exr");
  });

  test("leaves names without digits untouched", () => {
    expect(normalizeFramePadding("render/v1/beauty.exr")).toBe("render/v1/beauty.exr");
  });

  test("splits directory, stem and extension", () => {
    expect(splitFileName("a/b/c.d.exr")).toEqual({ dir: "a/b/", stem: "c.d", ext: ".exr" });
    expect(splitFileName(".hidden")).toEqual({ dir: "", stem: ".hidden", ext: "" });
    expect(hasFrameToken("$F4/beauty.exr")).toBe(false);
  });
});
