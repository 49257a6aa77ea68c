/**
 * Core types for the step pipeline engine.
 *
 * A tool describes its work as an ordered list of named steps. Hook actions
 * rewrite that list before a run; the runner then executes it in order.
 */

// ---------------------------------------------------------------------------
// Step results
// ---------------------------------------------------------------------------

/** Returned by a step action to stop the run early without failing it. */
export const PAUSE: unique symbol = Symbol("stepline.pause");

/**
 * Outcome of a single step action.
 *
 * `true` continues, `false` fails the run, {@link PAUSE} stops iteration and
 * reports success.
 */
export type StepResult = boolean | typeof PAUSE;

export type StepAction<C> = (context: C) => StepResult | Promise<StepResult>;

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

export interface Step<C> {
  /** Unique (case-sensitive) name within a sequence. */
  readonly name: string;
  readonly action: StepAction<C>;
  /**
   * Marks the step as a pause point. Pause points are never passed as the
   * `next` argument of the between-steps callback.
   */
  readonly pausePoint: boolean;
}

// ---------------------------------------------------------------------------
// Hook actions
// ---------------------------------------------------------------------------

export const HOOK_LOCATIONS = [
  "ReplaceStep",
  "InsertPreStep",
  "InsertPostStep",
  "ResumePreStep",
  "ResumePostStep",
] as const;

export type HookLocation = (typeof HOOK_LOCATIONS)[number];

export type InsertLocation = "InsertPreStep" | "InsertPostStep";

export type ResumeLocation = "ResumePreStep" | "ResumePostStep";

export interface ReplaceHookAction<C> {
  readonly kind: "ReplaceStep";
  readonly targetName: string;
  /** Replacement; must carry the target's name. */
  readonly step: Step<C>;
}

export interface InsertHookAction<C> {
  readonly kind: InsertLocation;
  readonly targetName: string;
  readonly step: Step<C>;
}

export interface ResumeHookAction {
  readonly kind: ResumeLocation;
  readonly targetName: string;
}

export type HookAction<C> = ReplaceHookAction<C> | InsertHookAction<C> | ResumeHookAction;

// ---------------------------------------------------------------------------
// Applied sequence
// ---------------------------------------------------------------------------

export interface ResumeMarker {
  /** Step at which execution resumes. */
  targetName: string;
  /** True for ResumePreStep, false for ResumePostStep. */
  pre: boolean;
}

export interface AppliedSteps<C> {
  steps: Step<C>[];
  resume: ResumeMarker | null;
}

// ---------------------------------------------------------------------------
// Runner collaborators
// ---------------------------------------------------------------------------

/** Observers around step execution. Their return values are ignored. */
export interface LifecycleCallbacks<C> {
  doPreSteps?(firstStep: Step<C>): void | Promise<void>;
  doBetweenSteps?(prev: Step<C>, next: Step<C>): void | Promise<void>;
  doPostSteps?(): void | Promise<void>;
}

/** Minimal leveled sink the engine reports through. */
export interface StepLogger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  /** A logger whose lines are attributed to `step`. */
  child?(context: { step: string }): StepLogger;
}

export interface ExecuteStepsOptions<C> {
  /** Value handed to every step action. */
  context: C;
  callbacks?: LifecycleCallbacks<C>;
  logger?: StepLogger;
  /** Called right before a step's action runs. */
  onStepStart?(step: Step<C>): void;
}

export interface RunStepsOptions<C> extends ExecuteStepsOptions<C> {
  /** Applied to the steps before execution. Defaults to none. */
  hooks?: readonly HookAction<C>[];
}
