export type PipelineErrorCode =
  | "CONFIG_INVALID"
  | "INSTRUCTIONS_MISSING"
  | "PRIOR_SNAPSHOT_REQUIRED"
  | "PRIOR_SNAPSHOT_UNREADABLE"
  | "FEED_UNAVAILABLE"
  | "OVERRIDES_INVALID"
  | "VOCABULARY_INVALID";

/**
 * Fatal-for-run failure. Thrown before anything committed is touched,
 * so the previous snapshot and catalog stay the last-known-good artifacts.
 */
export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly details?: unknown;

  constructor(opts: { code: PipelineErrorCode; message: string; details?: unknown }) {
    super(opts.message);
    this.name = "PipelineError";
    this.code = opts.code;
    this.details = opts.details;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
