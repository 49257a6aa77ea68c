/**
 * Step runner: executes an applied step sequence in order.
 *
 * A run ends in one of three ways:
 *   - a step returns false: overall failure, post-steps callback skipped
 *   - a step returns PAUSE: iteration stops, post-steps runs, overall success
 *   - every step completes: post-steps runs, overall success
 *
 * Resuming is not stateful: a later run re-supplies the same base steps plus
 * a resume hook, and everything before the resume point is skipped.
 */
import type {
  AppliedSteps,
  ExecuteStepsOptions,
  ResumeMarker,
  RunStepsOptions,
  Step,
  StepLogger,
} from "./types.js";
import { PAUSE } from "./types.js";
import { applyHooks } from "./hooks.js";
import { PipelineConfigError, StepContractError, formatError } from "./errors.js";

const silentLogger: StepLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Decide whether a step runs given the pending resume marker.
 * Returns the marker that remains pending once the step is reached.
 */
function resolveResume(
  marker: ResumeMarker,
  stepName: string,
  logger: StepLogger,
): { run: boolean; pending: ResumeMarker | null } {
  if (marker.targetName !== stepName) {
    logger.info(`Sub-step '${stepName}' skipped due to resume hook`);
    return { run: false, pending: marker };
  }
  if (marker.pre) {
    logger.info(`Resuming before '${stepName}' due to resume hook`);
    return { run: true, pending: null };
  }
  return { run: true, pending: marker };
}

/**
 * Execute an already-applied sequence.
 *
 * @returns true if every executed step succeeded or the run paused.
 * @throws StepContractError if an action yields a non-boolean result.
 */
export async function executeSteps<C>(
  applied: AppliedSteps<C>,
  options: ExecuteStepsOptions<C>,
): Promise<boolean> {
  const { context, callbacks = {} } = options;
  const logger = options.logger ?? silentLogger;
  const { steps } = applied;

  let resume = applied.resume;
  let prev: Step<C> | null = null;

  for (const [i, step] of steps.entries()) {
    const stepLogger = logger.child?.({ step: step.name }) ?? logger;
    stepLogger.debug(`Running sub-step '${step.name}'`);

    if (resume !== null) {
      const decision = resolveResume(resume, step.name, stepLogger);
      resume = decision.pending;
      if (!decision.run) continue;
    }

    if (prev === null) {
      await callbacks.doPreSteps?.(step);
    } else {
      // Pause points are invisible to between-steps observers.
      const next = step.pausePoint ? steps[i + 1] : step;
      if (next) await callbacks.doBetweenSteps?.(prev, next);
    }

    options.onStepStart?.(step);
    let result: unknown;
    try {
      result = await step.action(context);
    } catch (error: unknown) {
      stepLogger.error(`Sub-step '${step.name}' threw: ${formatError(error)}`);
      throw error;
    }

    if (result === PAUSE) {
      stepLogger.info(`Sub-step '${step.name}' paused the tool execution`);
      break;
    }
    if (typeof result !== "boolean") {
      throw new StepContractError(step.name, result);
    }
    if (!result) {
      stepLogger.error(`Sub-step '${step.name}' failed`);
      return false;
    }

    prev = step;

    if (resume !== null && !resume.pre && resume.targetName === step.name) {
      stepLogger.info(`Resuming after '${step.name}' due to resume hook`);
      resume = null;
    }
  }

  await callbacks.doPostSteps?.();

  return true;
}

/**
 * Apply hooks to `steps` and run the result.
 *
 * Configuration errors (duplicate names, unknown targets, malformed or
 * conflicting hooks) are logged and reported as `false` before any action
 * runs.
 */
export async function runSteps<C>(
  steps: readonly Step<C>[],
  options: RunStepsOptions<C>,
): Promise<boolean> {
  const { hooks = [], ...executeOptions } = options;
  const logger = options.logger ?? silentLogger;

  let applied: AppliedSteps<C>;
  try {
    applied = applyHooks(steps, hooks);
  } catch (error: unknown) {
    if (error instanceof PipelineConfigError) {
      logger.error(error.message);
      return false;
    }
    throw error;
  }

  return executeSteps(applied, executeOptions);
}
