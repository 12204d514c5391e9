import { debug } from "@renderplan/core";
import type { CommandResult, CommandRunner } from "./command.js";
import { FarmError, FarmErrorCode } from "./errors.js";

/** Prim subtree the flatten call is restricted to. */
export const RENDER_MASK = "/Render";

/** Text producer for the extractor. */
export interface DumpTool {
  /** Flattened `/Render` subtree of the scene, as text. */
  flatten(scene: string): Promise<string>;
  /** The scene's layer metadata preamble, as text. */
  layerMetadata(scene: string): Promise<string>;
}

export function createDumpTool(executable: string, run: CommandRunner, timeoutMs?: number): DumpTool {
  const invoke = async (scene: string, args: readonly string[]): Promise<string> => {
    let result: CommandResult;
    try {
      result = await run(executable, [...args, scene], { timeoutMs });
    } catch (error) {
      throw new FarmError(
        `Dump tool failed on ${scene}: ${error instanceof Error ? error.message : String(error)}`,
        FarmErrorCode.DUMP_TOOL_FAILED,
        scene,
        error,
      );
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${String(result.exitCode)}`;
      throw new FarmError(`Dump tool failed on ${scene}: ${detail}`, FarmErrorCode.DUMP_TOOL_FAILED, scene);
    }
    debug.farm("dump", { scene, args: [...args], length: result.stdout.length });
    return result.stdout;
  };

  return {
    flatten: (scene) => invoke(scene, ["--flatten", "--mask", RENDER_MASK]),
    layerMetadata: (scene) => invoke(scene, ["--layerMetadata"]),
  };
}
