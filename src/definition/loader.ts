/**
 * Pipeline definition loader.
 *
 * Parses command pipeline YAML files and validates required fields.
 * Relative paths are resolved against the definition file's directory.
 */
import fs from "node:fs";
import path from "node:path";
import { parse } from "yaml";

export interface CommandStepDefinition {
  name: string;
  /** argv of the command; the first entry is the executable. */
  run: string[];
  /** Absolute working directory, or null for the run directory. */
  cwd: string | null;
}

export interface PipelineDefinition {
  name: string;
  /** Absolute path of the YAML file this was loaded from. */
  source: string;
  runDir: string;
  inputFiles: string[];
  env: Record<string, string>;
  settings: Record<string, unknown>;
  steps: CommandStepDefinition[];
}

export class DefinitionError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(message);
    this.name = "DefinitionError";
    this.source = source;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load a pipeline definition from a YAML file.
 *
 * Duplicate step names are not rejected here; the engine reports them when
 * the pipeline runs.
 */
export function loadPipelineDefinition(filePath: string): PipelineDefinition {
  const source = path.resolve(filePath);
  if (!fs.existsSync(source)) {
    throw new DefinitionError(source, `Pipeline definition not found: ${source}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(fs.readFileSync(source, "utf-8"));
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new DefinitionError(source, `Pipeline definition ${source} is not valid YAML: ${msg}`);
  }
  if (!isRecord(parsed)) {
    throw new DefinitionError(source, `Pipeline definition ${source} must be a mapping`);
  }

  return validateDefinition(parsed, source);
}

function validateDefinition(raw: Record<string, unknown>, source: string): PipelineDefinition {
  const baseDir = path.dirname(source);

  if (!raw.name || typeof raw.name !== "string") {
    throw new DefinitionError(source, `Pipeline in ${source} missing required field "name" (string)`);
  }
  const name = raw.name;

  if (raw.runDir !== undefined && (typeof raw.runDir !== "string" || raw.runDir === "")) {
    throw new DefinitionError(source, `Pipeline in ${source} has invalid "runDir". Must be a string`);
  }
  const runDir =
    typeof raw.runDir === "string"
      ? path.resolve(baseDir, raw.runDir)
      : path.join(baseDir, "build", name);

  const inputFiles = validateStringList(raw.inputFiles, `"inputFiles" in ${source}`, source).map(
    (file) => path.resolve(baseDir, file),
  );

  const env: Record<string, string> = {};
  if (raw.env !== undefined) {
    if (!isRecord(raw.env)) {
      throw new DefinitionError(source, `Pipeline in ${source} has invalid "env". Must be a mapping`);
    }
    for (const [key, value] of Object.entries(raw.env)) {
      if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
        throw new DefinitionError(source, `env.${key} in ${source} must be a string`);
      }
      env[key] = String(value);
    }
  }

  let settings: Record<string, unknown> = {};
  if (raw.settings !== undefined && raw.settings !== null) {
    if (!isRecord(raw.settings)) {
      throw new DefinitionError(
        source,
        `Pipeline in ${source} has invalid "settings". Must be a mapping`,
      );
    }
    settings = raw.settings;
  }

  if (!Array.isArray(raw.steps) || raw.steps.length === 0) {
    throw new DefinitionError(source, `Pipeline in ${source} must have at least one step`);
  }
  const steps = raw.steps.map((step: unknown, i: number) =>
    validateStep(step, source, i, runDir),
  );

  return { name, source, runDir, inputFiles, env, settings, steps };
}

function validateStep(
  raw: unknown,
  source: string,
  index: number,
  runDir: string,
): CommandStepDefinition {
  const ctx = `step[${index}] in ${source}`;

  if (!isRecord(raw)) {
    throw new DefinitionError(source, `${ctx} must be a mapping`);
  }
  if (!raw.name || typeof raw.name !== "string") {
    throw new DefinitionError(source, `${ctx} missing required field "name" (string)`);
  }

  let run: string[];
  if (typeof raw.run === "string") {
    run = raw.run.split(/\s+/).filter(Boolean);
  } else {
    run = validateStringList(raw.run, `"run" of ${ctx}`, source);
  }
  if (run.length === 0) {
    throw new DefinitionError(source, `${ctx} missing required field "run" (command)`);
  }

  if (raw.cwd !== undefined && typeof raw.cwd !== "string") {
    throw new DefinitionError(source, `${ctx} has invalid "cwd". Must be a string`);
  }
  const cwd = typeof raw.cwd === "string" ? path.resolve(runDir, raw.cwd) : null;

  return { name: raw.name, run, cwd };
}

function validateStringList(raw: unknown, label: string, source: string): string[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    throw new DefinitionError(source, `${label} must be a list of strings`);
  }
  return raw.map((item: unknown) => {
    if (typeof item !== "string" && typeof item !== "number") {
      throw new DefinitionError(source, `${label} must be a list of strings`);
    }
    return String(item);
  });
}
