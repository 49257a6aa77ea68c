/**
 * A tool whose steps are external commands listed in a pipeline definition.
 */
import type { Step, StepLogger, StepResult } from "../pipeline/types.js";
import { fromFunction } from "../pipeline/factory.js";
import { Tool } from "../tool/tool.js";
import { MemorySettings } from "../tool/settings.js";
import type { SettingsStore } from "../tool/settings.js";
import type { CommandSubmitter } from "../tool/submit.js";
import type { CommandStepDefinition, PipelineDefinition } from "./loader.js";

export interface CommandToolOptions {
  logger: StepLogger;
  /** Settings layered under the definition's own settings. */
  baseSettings?: Record<string, unknown>;
  /** Overrides the definition's run directory. */
  runDir?: string;
  submitCommand?: CommandSubmitter;
}

export class CommandTool extends Tool {
  readonly definition: PipelineDefinition;

  constructor(definition: PipelineDefinition, options: CommandToolOptions) {
    const settings: SettingsStore = new MemorySettings(options.baseSettings ?? {}).merge(
      definition.settings,
    );
    super({
      name: definition.name,
      runDir: options.runDir ?? definition.runDir,
      inputFiles: definition.inputFiles,
      settings,
      logger: options.logger,
      submitCommand: options.submitCommand,
    });
    this.definition = definition;
  }

  get steps(): Step<this>[] {
    return this.definition.steps.map((step) =>
      fromFunction(() => this.runCommand(step), step.name),
    );
  }

  override get envVars(): Record<string, string> {
    return { ...this.definition.env };
  }

  private async runCommand(step: CommandStepDefinition): Promise<StepResult> {
    const result = await this.runExecutable(step.run, step.cwd ?? undefined);
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      this.logger.error(
        `Command '${step.run.join(" ")}' exited with code ${result.exitCode}` +
          (stderr ? `: ${stderr}` : ""),
      );
      return false;
    }
    return true;
  }
}
