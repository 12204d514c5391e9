import { RenderPlanError } from "@renderplan/core";

/** Error codes */
export const FarmErrorCode = {
  EXECUTABLE_NOT_FOUND: "FARM_EXECUTABLE_NOT_FOUND",
  COMMAND_FAILED: "FARM_COMMAND_FAILED",
  DUMP_TOOL_FAILED: "FARM_DUMP_TOOL_FAILED",
  CONFIG_INVALID: "FARM_CONFIG_INVALID",
  CONFIG_CIRCULAR_EXTENDS: "FARM_CONFIG_CIRCULAR_EXTENDS",
  SCENE_NOT_FOUND: "FARM_SCENE_NOT_FOUND",
  FRAME_RANGE_INVALID: "FARM_FRAME_RANGE_INVALID",
  PLUGIN_INFO_INVALID: "FARM_PLUGIN_INFO_INVALID",
  READ_FAILED: "FARM_READ_FAILED",
} as const;

export type FarmErrorCodeType = (typeof FarmErrorCode)[keyof typeof FarmErrorCode];

/**
 * Error while locating tools, running them, or preparing farm jobs.
 */
export class FarmError extends RenderPlanError {
  declare readonly code: FarmErrorCodeType;

  constructor(message: string, code: FarmErrorCodeType, file?: string, cause?: unknown) {
    super(message, code, file);
    this.name = "FarmError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}
