/**
 * Hook applier.
 *
 * Turns a tool's base step list plus a list of hook actions into the
 * sequence that actually runs. Hooks resolve their targets against the
 * current (already mutated) sequence: a later post-insertion on the same
 * target lands closer to it, and a hook may anchor on an inserted step.
 */
import type { AppliedSteps, HookAction, ResumeMarker, Step } from "./types.js";
import {
  DuplicateStepError,
  InvalidHookError,
  MultipleResumeHooksError,
  SignatureMismatchError,
  UnknownTargetError,
} from "./errors.js";

/**
 * Throw {@link DuplicateStepError} on the first repeated name.
 *
 * @returns The set of step names.
 */
export function checkDuplicates<C>(steps: readonly Step<C>[]): Set<string> {
  const seen = new Set<string>();
  for (const step of steps) {
    if (seen.has(step.name)) {
      throw new DuplicateStepError(step.name);
    }
    seen.add(step.name);
  }
  return seen;
}

/** Check the runtime shape of a step; callers outside TypeScript can hand us anything. */
export function assertStep<C>(step: Step<C>): void {
  if (typeof step.name !== "string" || step.name === "") {
    throw new SignatureMismatchError("", "step name must be a non-empty string");
  }
  if (typeof step.action !== "function") {
    throw new SignatureMismatchError(step.name, "action is not a function");
  }
}

function indexSteps<C>(steps: readonly Step<C>[]): Map<string, number> {
  const index = new Map<string, number>();
  steps.forEach((step, i) => index.set(step.name, i));
  return index;
}

function isStep(value: unknown): value is Step<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "action" in value &&
    typeof value.action === "function"
  );
}

function describeKind(hook: never): string {
  const raw: unknown = hook;
  if (typeof raw === "object" && raw !== null && "kind" in raw) {
    return String(raw.kind);
  }
  return String(raw);
}

/**
 * Apply hook actions to a base step list.
 *
 * The input list is never modified. Throws a {@link PipelineConfigError}
 * subclass on the first malformed or conflicting hook.
 */
export function applyHooks<C>(
  baseSteps: readonly Step<C>[],
  hooks: readonly HookAction<C>[] = [],
): AppliedSteps<C> {
  baseSteps.forEach((step) => assertStep(step));
  const names = checkDuplicates(baseSteps);

  const steps = [...baseSteps];
  let index = indexSteps(steps);
  let resume: ResumeMarker | null = null;

  for (const hook of hooks) {
    const position = index.get(hook.targetName);
    if (position === undefined) {
      throw new UnknownTargetError(hook.targetName);
    }

    switch (hook.kind) {
      case "ReplaceStep": {
        if (!isStep(hook.step)) {
          throw new InvalidHookError("ReplaceStep requires a step", hook.targetName);
        }
        if (hook.step.name !== hook.targetName) {
          throw new InvalidHookError(
            `Replacement step '${hook.step.name}' must have the same name as its target '${hook.targetName}'`,
            hook.targetName,
          );
        }
        steps[position] = hook.step;
        break;
      }
      case "InsertPreStep":
      case "InsertPostStep": {
        if (!isStep(hook.step)) {
          throw new InvalidHookError(`${hook.kind} requires a step`, hook.targetName);
        }
        assertStep(hook.step);
        if (names.has(hook.step.name)) {
          throw new DuplicateStepError(hook.step.name);
        }
        const at = hook.kind === "InsertPreStep" ? position : position + 1;
        steps.splice(at, 0, hook.step);
        names.add(hook.step.name);
        index = indexSteps(steps);
        break;
      }
      case "ResumePreStep":
      case "ResumePostStep": {
        if (resume !== null) {
          throw new MultipleResumeHooksError(resume.targetName, hook.targetName);
        }
        resume = { targetName: hook.targetName, pre: hook.kind === "ResumePreStep" };
        break;
      }
      default:
        throw new InvalidHookError(
          `Unknown hook location '${describeKind(hook)}'`,
          "",
        );
    }
  }

  checkDuplicates(steps);

  return { steps, resume };
}
