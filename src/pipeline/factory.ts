/**
 * Constructors for steps and hook actions.
 *
 * These hold no engine state. Signature checks happen here, at construction
 * time, so a malformed tool fails before any of its steps runs.
 */
import type {
  HookAction,
  HookLocation,
  InsertHookAction,
  ReplaceHookAction,
  ResumeHookAction,
  Step,
  StepAction,
  StepResult,
} from "./types.js";
import { PAUSE } from "./types.js";
import { InvalidHookError, SignatureMismatchError } from "./errors.js";

/** A zero-argument method usable as a step (e.g. `tool.elaborate`). */
export type StepMethod = () => StepResult | Promise<StepResult>;

/** Name given to steps built by {@link pauseStep} when none is supplied. */
export const DEFAULT_PAUSE_STEP_NAME = "pause";

function makeStep<C>(name: string, action: StepAction<C>, pausePoint = false): Step<C> {
  return Object.freeze({ name, action, pausePoint });
}

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

/**
 * Create a step from a function taking the run context.
 *
 * @param name - Defaults to the function's own name.
 */
export function fromFunction<C>(action: StepAction<C>, name?: string): Step<C> {
  if (typeof action !== "function") {
    throw new SignatureMismatchError(name ?? "", "action is not a function");
  }
  const stepName = name || action.name;
  if (action.length > 1) {
    throw new SignatureMismatchError(
      stepName,
      `expected at most one parameter (context), got ${action.length}`,
    );
  }
  if (!stepName) {
    throw new SignatureMismatchError("", "no name given and the function is anonymous");
  }
  return makeStep(stepName, action);
}

/**
 * Create a step from a method of `owner`. The method is called with `owner`
 * as `this` and ignores the run context.
 *
 * @param name - Defaults to the method key.
 */
export function fromMethod<T extends Record<K, StepMethod>, K extends string>(
  owner: T,
  key: K,
  name: string = key,
): Step<unknown> {
  const method: unknown = owner[key];
  if (typeof method !== "function") {
    throw new SignatureMismatchError(name, `'${key}' is not a method`);
  }
  if (method.length !== 0) {
    throw new SignatureMismatchError(
      name,
      `method '${key}' must take no arguments, got ${method.length}`,
    );
  }
  const bound = owner[key];
  return makeStep(name, () => bound.call(owner));
}

export function fromMethods<T extends Record<K, StepMethod>, K extends string>(
  owner: T,
  keys: readonly K[],
): Step<unknown>[] {
  return keys.map((key) => fromMethod(owner, key));
}

/** An action that always pauses the run. */
export function pauseAction(): () => typeof PAUSE {
  return () => PAUSE;
}

/** A pause point step. */
export function pauseStep<C>(name: string = DEFAULT_PAUSE_STEP_NAME): Step<C> {
  return makeStep<C>(name, pauseAction(), true);
}

function toStep<C>(stepOrAction: Step<C> | StepAction<C>): Step<C> {
  return typeof stepOrAction === "function" ? fromFunction(stepOrAction) : stepOrAction;
}

// ---------------------------------------------------------------------------
// Hooks
// ---------------------------------------------------------------------------

/** Replace `target` with `action`; the new step keeps the target's name. */
export function makeReplacementHook<C>(target: string, action: StepAction<C>): ReplaceHookAction<C> {
  return { kind: "ReplaceStep", targetName: target, step: fromFunction(action, target) };
}

/**
 * Insert a step before or after `target`. A bare function is named after
 * itself.
 */
export function makeInsertionHook<C>(
  target: string,
  location: HookLocation,
  stepOrAction: Step<C> | StepAction<C>,
): InsertHookAction<C> {
  if (location !== "InsertPreStep" && location !== "InsertPostStep") {
    throw new InvalidHookError(
      `Insertion hook location must be InsertPreStep or InsertPostStep, got ${location}`,
      target,
    );
  }
  return { kind: location, targetName: target, step: toStep(stepOrAction) };
}

export function makePreInsertionHook<C>(
  target: string,
  stepOrAction: Step<C> | StepAction<C>,
): InsertHookAction<C> {
  return makeInsertionHook(target, "InsertPreStep", stepOrAction);
}

export function makePostInsertionHook<C>(
  target: string,
  stepOrAction: Step<C> | StepAction<C>,
): InsertHookAction<C> {
  return makeInsertionHook(target, "InsertPostStep", stepOrAction);
}

/** Only one resume hook may appear in a hook list. */
export function makeResumeHook(target: string, location: HookLocation): ResumeHookAction {
  if (location !== "ResumePreStep" && location !== "ResumePostStep") {
    throw new InvalidHookError(
      `Resume hook location must be ResumePreStep or ResumePostStep, got ${location}`,
      target,
    );
  }
  return { kind: location, targetName: target };
}

/**
 * Pause before `target` runs. Give the pause step its own `name` when more
 * than one pause is inserted into the same sequence.
 */
export function makePrePauseHook<C>(target: string, name?: string): InsertHookAction<C> {
  return makeInsertionHook(target, "InsertPreStep", pauseStep<C>(name));
}

/** Pause once `target` has completed. */
export function makePostPauseHook<C>(target: string, name?: string): InsertHookAction<C> {
  return makeInsertionHook(target, "InsertPostStep", pauseStep<C>(name));
}

/** Skip everything before `target`, then run it. */
export function makePreResumeHook(target: string): ResumeHookAction {
  return makeResumeHook(target, "ResumePreStep");
}

/** Skip everything before `target`; skipping ends once `target` completes. */
export function makePostResumeHook(target: string): ResumeHookAction {
  return makeResumeHook(target, "ResumePostStep");
}

/**
 * Disable `target` by replacing it with a step that does nothing. The name is
 * preserved so other hooks can still anchor on it.
 */
export function makeRemovalHook<C>(target: string): ReplaceHookAction<C> {
  return makeReplacementHook<C>(target, () => true);
}

/**
 * Hooks that restrict a run to the inclusive range `fromStep`..`toStep`.
 * Either end may be omitted to run from the start or to the end.
 */
export function makeFromToHooks<C>(fromStep?: string, toStep?: string): HookAction<C>[] {
  const hooks: HookAction<C>[] = [];
  if (fromStep !== undefined) {
    hooks.push(makePreResumeHook(fromStep));
  }
  if (toStep !== undefined) {
    hooks.push(makePostPauseHook<C>(toStep));
  }
  return hooks;
}
