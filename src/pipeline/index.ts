/**
 * Step pipeline engine: types, hook application, execution and factories.
 */
export type {
  AppliedSteps,
  HookAction,
  HookLocation,
  InsertHookAction,
  InsertLocation,
  LifecycleCallbacks,
  ReplaceHookAction,
  ResumeHookAction,
  ResumeLocation,
  ResumeMarker,
  ExecuteStepsOptions,
  RunStepsOptions,
  Step,
  StepAction,
  StepLogger,
  StepResult,
} from "./types.js";
export { HOOK_LOCATIONS, PAUSE } from "./types.js";
export {
  DuplicateStepError,
  InvalidHookError,
  MultipleResumeHooksError,
  PipelineConfigError,
  SignatureMismatchError,
  StepContractError,
  UnknownTargetError,
  formatError,
} from "./errors.js";
export { applyHooks, assertStep, checkDuplicates } from "./hooks.js";
export { executeSteps, runSteps } from "./runner.js";
export type { StepMethod } from "./factory.js";
export {
  DEFAULT_PAUSE_STEP_NAME,
  fromFunction,
  fromMethod,
  fromMethods,
  makeFromToHooks,
  makeInsertionHook,
  makePostInsertionHook,
  makePostPauseHook,
  makePostResumeHook,
  makePreInsertionHook,
  makePrePauseHook,
  makePreResumeHook,
  makeRemovalHook,
  makeReplacementHook,
  makeResumeHook,
  pauseAction,
  pauseStep,
} from "./factory.js";
