/**
 * Error taxonomy for the pipeline.
 *
 * Input errors are surfaced immediately. Remote and empty-result errors are
 * retried and then wrapped in a RetryExhaustedError. Everything that escapes
 * the orchestrator is a PipelineError naming the failed stage.
 */

export class InputError extends Error {
  override readonly name = "InputError";
}

export class DownloadError extends Error {
  override readonly name = "DownloadError";
}

/** The backend answered without error but produced no usable text. */
export class EmptyResultError extends Error {
  override readonly name = "EmptyResultError";
}

export class RetryExhaustedError extends Error {
  override readonly name = "RetryExhaustedError";

  constructor(
    readonly label: string,
    readonly attempts: number,
    cause: unknown
  ) {
    super(`${label} failed after ${attempts} attempts: ${describeError(cause)}`, { cause });
  }
}

export class CommandError extends Error {
  override readonly name = "CommandError";

  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    const detail = stderr.trim();
    super(`${command} exited with code ${exitCode ?? "null"}${detail ? `: ${detail}` : ""}`);
  }
}

export class SettingsPersistError extends Error {
  override readonly name = "SettingsPersistError";
}

export type PipelineStage =
  | "scratch"
  | "fetch"
  | "transcribe"
  | "reformat"
  | "render"
  | "deliver";

const STAGE_LABELS: Record<PipelineStage, string> = {
  scratch: "Preparing workspace",
  fetch: "Download",
  transcribe: "Transcription",
  reformat: "Formatting",
  render: "Rendering",
  deliver: "Delivery",
};

export class PipelineError extends Error {
  override readonly name = "PipelineError";

  constructor(
    readonly stage: PipelineStage,
    cause: unknown
  ) {
    super(`${STAGE_LABELS[stage]} failed: ${describeError(cause)}`, { cause });
  }
}

/** One-line description of an unknown thrown value, without a stack trace. */
export function describeError(error: unknown): string {
  if (error instanceof RetryExhaustedError) {
    return `${describeError(error.cause)} (after ${error.attempts} attempts)`;
  }
  if (error instanceof Error) {
    return error.message.split("\n")[0] || error.name;
  }
  return String(error);
}
