import { describe, expect, it } from "vitest";
import { expandSearchList, locateDumpTool, locateExecutable } from "../src/locator.js";

const existing = (...paths: string[]) => (candidate: string) => paths.includes(candidate);

describe("expandSearchList", () => {
  it("substitutes the version and drops blank entries", () => {
    expect(expandSearchList("/opt/hfsXX.X.XXX/bin/husk; ;/usr/local/bin/husk;", "20.5.332")).toEqual([
      "/opt/hfs20.5.332/bin/husk",
      "/usr/local/bin/husk",
    ]);
  });
});

describe("locateExecutable", () => {
  const searchList = "/opt/hfsXX.X.XXX/bin/husk;/usr/local/hfsXX.X.XXX/bin/husk";

  it("returns the first entry that exists", () => {
    const exists = existing("/usr/local/hfs20.5.332/bin/husk", "/opt/hfs20.5.332/bin/husk");
    expect(locateExecutable(searchList, "20.5.332", exists)).toBe("/opt/hfs20.5.332/bin/husk");
  });

  it("returns null when nothing exists", () => {
    expect(locateExecutable(searchList, "20.5.332", existing())).toBeNull();
  });

  it("an empty version still searches", () => {
    expect(locateExecutable(searchList, "", existing("/usr/local/hfs/bin/husk"))).toBe("/usr/local/hfs/bin/husk");
  });
});

describe("locateDumpTool", () => {
  it("finds usdcat beside the renderer", () => {
    const exists = existing("/opt/hfs20.5.332/bin/usdcat");
    expect(locateDumpTool("/opt/hfs20.5.332/bin/husk", "linux", exists)).toBe("/opt/hfs20.5.332/bin/usdcat");
  });

  it("uses the .exe name and Windows separators on Windows", () => {
    const expected = "C:\\Houdini 20.5.332\\bin\\usdcat.exe";
    expect(locateDumpTool("C:\\Houdini 20.5.332\\bin\\husk.exe", "win32", existing(expected))).toBe(expected);
  });

  it("returns null when usdcat is missing", () => {
    expect(locateDumpTool("/opt/hfs20.5.332/bin/husk", "darwin", existing())).toBeNull();
  });
});
