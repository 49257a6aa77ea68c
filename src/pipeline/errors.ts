/**
 * Error taxonomy for the step pipeline engine.
 *
 * Everything extending {@link PipelineConfigError} is detected before any
 * step action runs. {@link StepContractError} is raised mid-run and is fatal.
 */

export class PipelineConfigError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;

  constructor(message: string, code: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "PipelineConfigError";
    this.code = code;
    this.details = details;
  }
}

/** Two steps in one sequence share a name. */
export class DuplicateStepError extends PipelineConfigError {
  readonly stepName: string;

  constructor(stepName: string) {
    super(`Duplicate step '${stepName}' encountered`, "DUPLICATE_STEP", { stepName });
    this.name = "DuplicateStepError";
    this.stepName = stepName;
  }
}

/** A hook names a step that is not in the sequence. */
export class UnknownTargetError extends PipelineConfigError {
  readonly targetName: string;

  constructor(targetName: string) {
    super(`Target step '${targetName}' does not exist`, "UNKNOWN_TARGET", { targetName });
    this.name = "UnknownTargetError";
    this.targetName = targetName;
  }
}

export class InvalidHookError extends PipelineConfigError {
  readonly targetName: string;

  constructor(message: string, targetName: string) {
    super(message, "INVALID_HOOK", { targetName });
    this.name = "InvalidHookError";
    this.targetName = targetName;
  }
}

export class MultipleResumeHooksError extends PipelineConfigError {
  readonly firstTarget: string;
  readonly secondTarget: string;

  constructor(firstTarget: string, secondTarget: string) {
    super(
      `More than one resume hook is present ('${firstTarget}' and '${secondTarget}')`,
      "MULTIPLE_RESUME_HOOKS",
      { firstTarget, secondTarget },
    );
    this.name = "MultipleResumeHooksError";
    this.firstTarget = firstTarget;
    this.secondTarget = secondTarget;
  }
}

/** A step action does not match the `(context) => StepResult` contract. */
export class SignatureMismatchError extends PipelineConfigError {
  readonly stepName: string;

  constructor(stepName: string, reason: string) {
    super(
      `Step '${stepName || "<anonymous>"}' does not meet the required signature: ${reason}`,
      "SIGNATURE_MISMATCH",
      { stepName, reason },
    );
    this.name = "SignatureMismatchError";
    this.stepName = stepName;
  }
}

/** A step action produced something other than a boolean or PAUSE. */
export class StepContractError extends Error {
  readonly stepName: string;
  readonly received: unknown;

  constructor(stepName: string, received: unknown) {
    super(
      `Step '${stepName}' returned ${describeValue(received)}; expected a boolean or PAUSE`,
    );
    this.name = "StepContractError";
    this.stepName = stepName;
    this.received = received;
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "string") return `string "${value}"`;
  return typeof value;
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
