/**
 * Base class for tools driven by the step pipeline engine.
 *
 * A subclass lists its steps; `run()` prepares the run directory, applies
 * the caller's hooks, executes the steps and collects outputs. Pausing and
 * resuming happen across separate `run()` calls: the caller re-runs with a
 * resume hook, nothing is persisted between runs.
 */
import fs from "node:fs";
import path from "node:path";
import { stringify } from "yaml";
import type { HookAction, Step, StepLogger } from "../pipeline/types.js";
import { runSteps } from "../pipeline/runner.js";
import { redactSecrets } from "../shared/redact.js";
import type { TechnologyProvider, ToolContext, ToolOptions } from "./context.js";
import { ToolConfigError, createToolContext } from "./context.js";
import type { CommandResult } from "./submit.js";
import { formatEnterScript } from "./shell.js";

export const OUTPUTS_FILENAME = "outputs.yaml";
export const SETTINGS_SNAPSHOT_FILENAME = "settings-snapshot.json";
export const ENTER_SCRIPT_FILENAME = "enter";
/** Env var pointing child processes at the settings snapshot. */
export const SETTINGS_ENV_VAR = "STEPLINE_SETTINGS";

export abstract class Tool {
  readonly context: ToolContext;
  private stepLogger: StepLogger | null = null;

  constructor(options: ToolOptions) {
    this.context = createToolContext(options);
  }

  get name(): string {
    return this.context.name;
  }

  get runDir(): string {
    return this.context.runDir;
  }

  /** Attributed to the running step while `run()` is executing one. */
  get logger(): StepLogger {
    return this.stepLogger ?? this.context.logger;
  }

  /** Steps of this tool, built fresh for every run. */
  abstract get steps(): Step<this>[];

  /**
   * Run this tool.
   *
   * @returns true if the steps finished (or paused) and outputs were written.
   */
  async run(hooks: readonly HookAction<this>[] = []): Promise<boolean> {
    fs.mkdirSync(this.runDir, { recursive: true });

    const base = this.context.logger;
    let ok: boolean;
    try {
      ok = await runSteps(this.steps, {
        hooks,
        context: this,
        callbacks: this,
        logger: base,
        onStepStart: (step) => {
          this.stepLogger = base.child?.({ step: step.name }) ?? null;
        },
      });
    } finally {
      this.stepLogger = null;
    }
    if (!ok) return false;

    return this.fillOutputs();
  }

  // ---------------------------------------------------------------------------
  // Lifecycle callbacks (override as needed)
  // ---------------------------------------------------------------------------

  /** Runs before the first executed step. */
  doPreSteps(_firstStep: Step<this>): void | Promise<void> {}

  /** Runs between two executed steps; never sees a pause point as `next`. */
  doBetweenSteps(_prev: Step<this>, _next: Step<this>): void | Promise<void> {}

  /** Runs once after the last step, including after a pause. */
  doPostSteps(): void | Promise<void> {}

  // ---------------------------------------------------------------------------
  // Outputs
  // ---------------------------------------------------------------------------

  /** Values this tool hands to the next tool in a flow. */
  exportConfigOutputs(): Record<string, unknown> {
    return {};
  }

  /**
   * Write {@link exportConfigOutputs} to `<runDir>/outputs.yaml`.
   * Subclasses that override this should call the base implementation.
   */
  async fillOutputs(): Promise<boolean> {
    const outputsPath = path.join(this.runDir, OUTPUTS_FILENAME);
    fs.writeFileSync(outputsPath, stringify(this.exportConfigOutputs()), "utf-8");
    return true;
  }

  // ---------------------------------------------------------------------------
  // Settings
  // ---------------------------------------------------------------------------

  getSetting(key: string, nullValue?: unknown): unknown {
    return this.context.settings.getSetting(key, nullValue);
  }

  setSetting(key: string, value: unknown): void {
    this.context.settings.setSetting(key, value);
  }

  /** Write the settings as JSON into the run directory and return the path. */
  dumpSettings(): string {
    const snapshotPath = path.join(this.runDir, SETTINGS_SNAPSHOT_FILENAME);
    fs.mkdirSync(this.runDir, { recursive: true });
    fs.writeFileSync(snapshotPath, JSON.stringify(this.context.settings.toJSON(), null, 2));
    return snapshotPath;
  }

  // ---------------------------------------------------------------------------
  // Environment and subprocesses
  // ---------------------------------------------------------------------------

  /** Tool-specific environment variables for subprocesses. */
  get envVars(): Record<string, string> {
    return {};
  }

  subprocessEnv(): NodeJS.ProcessEnv {
    return {
      ...process.env,
      [SETTINGS_ENV_VAR]: this.dumpSettings(),
      ...this.envVars,
    };
  }

  /**
   * Write a script that recreates this tool's environment interactively.
   *
   * @param location - Defaults to `<runDir>/enter`.
   * @param raw - Emit values without shell escaping.
   */
  createEnterScript(location?: string, raw = false): string {
    const target = location || path.join(this.runDir, ENTER_SCRIPT_FILENAME);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, formatEnterScript(this.envVars, raw));
    return target;
  }

  /**
   * Check that every input file exists and has one of `extensions`.
   * Logs each problem; returns false if any were found.
   */
  checkInputFiles(extensions: readonly string[]): boolean {
    let ok = true;
    for (const file of this.context.inputFiles) {
      if (!extensions.some((ext) => file.endsWith(ext))) {
        this.logger.error(`Input of unsupported type ${file} detected!`);
        ok = false;
      }
      if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
        this.logger.error(`Input file ${file} does not exist!`);
        ok = false;
      }
    }
    return ok;
  }

  /** Run an external program through the configured command submitter. */
  async runExecutable(args: readonly string[], cwd?: string): Promise<CommandResult> {
    this.logger.debug(`Executing: ${redactSecrets(args.join(" "))}`);
    return this.context.submitCommand.submit(args, {
      cwd: cwd ?? this.runDir,
      env: this.subprocessEnv(),
    });
  }

  requireTechnology(): TechnologyProvider {
    if (!this.context.technology) {
      throw new ToolConfigError(
        "technology",
        `Tool "${this.name}" needs a technology provider but none was configured`,
      );
    }
    return this.context.technology;
  }
}
