/**
 * Tool context: everything a tool needs, validated once at setup.
 *
 * Required fields are checked here so a tool never discovers a missing run
 * directory or settings store halfway through its steps.
 */
import path from "node:path";
import type { StepLogger } from "../pipeline/types.js";
import type { SettingsStore } from "./settings.js";
import type { CommandSubmitter } from "./submit.js";
import { LocalSubmitCommand } from "./submit.js";

/** Domain metadata (cell libraries, dont-use lists) handed to step actions. */
export interface TechnologyProvider {
  readonly name: string;
  dontUseList(): string[];
}

export interface ToolOptions {
  name: string;
  /** Where the tool writes its outputs. Resolved to an absolute path. */
  runDir: string;
  settings: SettingsStore;
  logger: StepLogger;
  /** Where the tool's default configs live. Defaults to `runDir`. */
  toolDir?: string;
  inputFiles?: readonly string[];
  topModule?: string;
  submitCommand?: CommandSubmitter;
  technology?: TechnologyProvider;
}

export interface ToolContext {
  readonly name: string;
  readonly runDir: string;
  readonly toolDir: string;
  readonly inputFiles: readonly string[];
  readonly topModule: string | null;
  readonly settings: SettingsStore;
  readonly logger: StepLogger;
  readonly submitCommand: CommandSubmitter;
  readonly technology: TechnologyProvider | null;
}

export class ToolConfigError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "ToolConfigError";
    this.field = field;
  }
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ToolConfigError(field, `Tool option "${field}" must be a non-empty string`);
  }
  return value;
}

export function createToolContext(options: ToolOptions): ToolContext {
  const name = requireString(options.name, "name");
  const runDir = path.resolve(requireString(options.runDir, "runDir"));
  if (!options.settings) {
    throw new ToolConfigError("settings", `Tool "${name}" requires a settings store`);
  }
  if (!options.logger) {
    throw new ToolConfigError("logger", `Tool "${name}" requires a logger`);
  }

  return Object.freeze({
    name,
    runDir,
    toolDir: options.toolDir ? path.resolve(options.toolDir) : runDir,
    inputFiles: Object.freeze([...(options.inputFiles ?? [])]),
    topModule: options.topModule ?? null,
    settings: options.settings,
    logger: options.logger,
    submitCommand: options.submitCommand ?? new LocalSubmitCommand(),
    technology: options.technology ?? null,
  });
}
