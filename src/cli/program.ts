/**
 * CLI program definition for stepline.
 *
 * Uses Commander to define the command structure.
 */
import { Command, Option } from "commander";
import { VERSION } from "../version.js";
import { loadConfig, resolveStateDir } from "../config/index.js";
import { loadPipelineDefinition } from "../definition/loader.js";
import { CommandTool } from "../definition/command-tool.js";
import { applyHooks } from "../pipeline/hooks.js";
import {
  makePostPauseHook,
  makePostResumeHook,
  makePrePauseHook,
  makePreResumeHook,
  makeRemovalHook,
} from "../pipeline/factory.js";
import type { HookAction } from "../pipeline/types.js";
import { createLogger } from "../shared/logger.js";
import { LOG_LEVELS } from "../shared/types.js";
import type { LogLevel } from "../shared/types.js";
import type { CommandSubmitter } from "../tool/submit.js";

export interface HookOptions {
  from?: string;
  to?: string;
  resumeBefore?: string;
  resumeAfter?: string;
  pauseBefore?: string;
  pauseAfter?: string;
  skip?: string[];
}

export interface RunOptions extends HookOptions {
  runDir?: string;
  logLevel?: LogLevel;
}

export interface ProgramDeps {
  /** Environment used to locate the state dir. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Submitter for step commands. Defaults to local child processes. */
  submitCommand?: CommandSubmitter;
}

/**
 * Translate CLI flags into hook actions.
 * Order: skips, from/to range, resume, pause.
 */
export function buildHooks<C>(opts: HookOptions): HookAction<C>[] {
  const hooks: HookAction<C>[] = [];
  for (const name of opts.skip ?? []) {
    hooks.push(makeRemovalHook<C>(name));
  }
  if (opts.from) hooks.push(makePreResumeHook(opts.from));
  if (opts.resumeBefore) hooks.push(makePreResumeHook(opts.resumeBefore));
  if (opts.resumeAfter) hooks.push(makePostResumeHook(opts.resumeAfter));

  // Pause steps are named after their anchor so several can coexist.
  const pauses = new Set<string>();
  const pauseBefore = (target: string): void => {
    const name = `pause-before-${target}`;
    if (pauses.has(name)) return;
    pauses.add(name);
    hooks.push(makePrePauseHook<C>(target, name));
  };
  const pauseAfter = (target: string): void => {
    const name = `pause-after-${target}`;
    if (pauses.has(name)) return;
    pauses.add(name);
    hooks.push(makePostPauseHook<C>(target, name));
  };
  if (opts.to) pauseAfter(opts.to);
  if (opts.pauseBefore) pauseBefore(opts.pauseBefore);
  if (opts.pauseAfter) pauseAfter(opts.pauseAfter);
  return hooks;
}

function addHookOptions(command: Command): Command {
  return command
    .option("--from <step>", "start at this step")
    .option("--to <step>", "stop after this step")
    .option("--resume-before <step>", "skip every step before this one")
    .option("--resume-after <step>", "skip every step before this one and resume from it")
    .option("--pause-before <step>", "pause right before this step")
    .option("--pause-after <step>", "pause right after this step")
    .option("--skip <steps...>", "replace these steps with no-ops");
}

function reportError(error: unknown): void {
  const msg = error instanceof Error ? error.message : String(error);
  console.error(`[stepline] ${msg}`);
  process.exitCode = 1;
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const program = new Command();

  program
    .name("stepline")
    .description("Run tools as named steps with pause, resume and insertion hooks")
    .version(VERSION);

  // --- run ---
  addHookOptions(
    program
      .command("run")
      .description("Run a pipeline definition")
      .argument("<definition>", "path to the pipeline YAML file"),
  )
    .option("--run-dir <path>", "override the definition's run directory")
    .addOption(new Option("--log-level <level>", "minimum log level").choices(LOG_LEVELS))
    .action(async (file: string, opts: RunOptions) => {
      try {
        await runDefinition(file, opts, env, deps.submitCommand);
      } catch (error: unknown) {
        reportError(error);
      }
    });

  // --- steps ---
  addHookOptions(
    program
      .command("steps")
      .description("Print the step order a run would use, without running anything")
      .argument("<definition>", "path to the pipeline YAML file"),
  ).action((file: string, opts: HookOptions) => {
    try {
      for (const line of describeSteps(file, opts)) {
        console.log(line);
      }
    } catch (error: unknown) {
      reportError(error);
    }
  });

  return program;
}

async function runDefinition(
  file: string,
  opts: RunOptions,
  env: NodeJS.ProcessEnv,
  submitCommand: CommandSubmitter | undefined,
): Promise<void> {
  const config = loadConfig(resolveStateDir(env));
  const definition = loadPipelineDefinition(file);
  const logger = createLogger(
    { tool: definition.name },
    {
      level: opts.logLevel ?? config.logLevel,
      logDir: config.logDir,
      fileOutput: config.fileLogging,
    },
  );
  const tool = new CommandTool(definition, {
    logger,
    baseSettings: config.settings,
    runDir: opts.runDir,
    submitCommand,
  });

  const ok = await tool.run(buildHooks(opts));
  if (ok) {
    logger.info(`Finished ${definition.name}`);
  } else {
    logger.error(`Run of ${definition.name} failed`);
    process.exitCode = 1;
  }
}

/** The mutated step order as printable lines. */
export function describeSteps(file: string, opts: HookOptions): string[] {
  const definition = loadPipelineDefinition(file);
  const tool = new CommandTool(definition, { logger: createLogger({}, { fileOutput: false }) });
  const applied = applyHooks(tool.steps, buildHooks(opts));

  const lines = applied.steps.map(
    (step, i) => `${i + 1}. ${step.name}${step.pausePoint ? " (pause)" : ""}`,
  );
  if (applied.resume) {
    const where = applied.resume.pre ? "before" : "after";
    lines.push(`resume ${where} ${applied.resume.targetName}`);
  }
  return lines;
}
