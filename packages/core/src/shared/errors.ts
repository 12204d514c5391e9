/* =============================================================================
 * ERRORS
 * ============================================================================= */

/**
 * Base class for errors raised by the render-plan packages.
 * `code` is stable and safe to switch on.
 */
export class RenderPlanError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly file?: string,
  ) {
    super(message);
    this.name = "RenderPlanError";
  }
}

/** Error codes raised by the core */
export const LayerErrorCode = {
  METADATA_UNTERMINATED: "LAYER_METADATA_UNTERMINATED",
} as const;

export type LayerErrorCodeType = (typeof LayerErrorCode)[keyof typeof LayerErrorCode];

/**
 * The layer's metadata preamble never closed.
 * The dump is unusable; callers skip the file and continue with the rest of a batch.
 */
export class MalformedLayerError extends RenderPlanError {
  constructor(
    message: string,
    public readonly line: number,
    file?: string,
  ) {
    super(message, LayerErrorCode.METADATA_UNTERMINATED, file);
    this.name = "MalformedLayerError";
  }
}
