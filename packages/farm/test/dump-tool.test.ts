import { describe, expect, it } from "vitest";
import { createDumpTool, RENDER_MASK } from "../src/dump-tool.js";
import { FarmError, FarmErrorCode } from "../src/errors.js";
import { fakeRunner } from "./_helpers/test-utils.js";

describe("dump tool", () => {
  it("flattens the /Render subtree", async () => {
    const run = fakeRunner({ stdout: "#usda 1.0\n" });
    const tool = createDumpTool("/opt/hfs/bin/usdcat", run, 5000);

    expect(await tool.flatten("/shots/a.usd")).toBe("#usda 1.0\n");
    expect(run.calls).toEqual([
      {
        command: "/opt/hfs/bin/usdcat",
        args: ["--flatten", "--mask", RENDER_MASK, "/shots/a.usd"],
        options: { timeoutMs: 5000 },
      },
    ]);
  });

  it("reads layer metadata", async () => {
    const run = fakeRunner({ stdout: "(\n)\n" });
    const tool = createDumpTool("usdcat", run);

    await tool.layerMetadata("a.usd");
    expect(run.calls[0]?.args).toEqual(["--layerMetadata", "a.usd"]);
  });

  it("a non-zero exit becomes DUMP_TOOL_FAILED with the tool's stderr", async () => {
    const tool = createDumpTool("usdcat", fakeRunner({ exitCode: 1, stderr: "Cannot open layer\n" }));

    await expect(tool.flatten("a.usd")).rejects.toThrow("Dump tool failed on a.usd: Cannot open layer");
    await expect(tool.flatten("a.usd")).rejects.toMatchObject({ code: FarmErrorCode.DUMP_TOOL_FAILED, file: "a.usd" });
  });

  it("a silent failure reports the exit code", async () => {
    const tool = createDumpTool("usdcat", fakeRunner({ exitCode: 3 }));
    await expect(tool.flatten("a.usd")).rejects.toThrow("Dump tool failed on a.usd: exit code 3");
  });

  it("a runner that cannot start the tool is wrapped", async () => {
    const cause = new FarmError("Failed to start usdcat: ENOENT", FarmErrorCode.COMMAND_FAILED);
    const tool = createDumpTool("usdcat", async () => {
      throw cause;
    });

    const error = await tool.layerMetadata("a.usd").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FarmError);
    expect(error).toMatchObject({
      code: FarmErrorCode.DUMP_TOOL_FAILED,
      message: "Dump tool failed on a.usd: Failed to start usdcat: ENOENT",
      cause,
    });
  });
});
