import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { CommandResult, CommandSubmitter, SubmitOptions } from "../tool/submit.js";
import { buildHooks, buildProgram, describeSteps } from "./program.js";

class RecordingSubmitter implements CommandSubmitter {
  readonly executed: string[] = [];
  failing = new Set<string>();

  async submit(args: readonly string[], _options: SubmitOptions): Promise<CommandResult> {
    const executable = args[0] ?? "";
    this.executed.push(executable);
    return this.failing.has(executable)
      ? { exitCode: 1, stdout: "", stderr: "boom" }
      : { exitCode: 0, stdout: "", stderr: "" };
  }
}

const DEFINITION = [
  "name: synth",
  "steps:",
  "  - name: elaborate",
  "    run: [elab]",
  "  - name: map",
  "    run: [mapper]",
  "  - name: report",
  "    run: [reporter]",
  "",
].join("\n");

describe("CLI program", () => {
  it("creates a program with name stepline", () => {
    expect(buildProgram().name()).toBe("stepline");
  });

  it("registers run and steps commands", () => {
    expect(buildProgram().commands.map((c) => c.name())).toEqual(["run", "steps"]);
  });

  it("gives run the hook options plus run-dir and log-level", () => {
    const run = buildProgram().commands.find((c) => c.name() === "run");
    expect(run?.options.map((o) => o.long)).toEqual([
      "--from",
      "--to",
      "--resume-before",
      "--resume-after",
      "--pause-before",
      "--pause-after",
      "--skip",
      "--run-dir",
      "--log-level",
    ]);
  });
});

describe("buildHooks", () => {
  it("returns nothing without flags", () => {
    expect(buildHooks({})).toEqual([]);
  });

  it("orders skips, range, resume and pause", () => {
    const hooks = buildHooks({
      skip: ["a", "b"],
      to: "d",
      resumeAfter: "b",
      pauseBefore: "c",
    });
    expect(hooks.map((h) => `${h.kind}:${h.targetName}`)).toEqual([
      "ReplaceStep:a",
      "ReplaceStep:b",
      "ResumePostStep:b",
      "InsertPostStep:d",
      "InsertPreStep:c",
    ]);
  });

  it("names each pause step after its anchor", () => {
    const names = buildHooks({ to: "b", pauseBefore: "d", pauseAfter: "a" }).map((h) =>
      "step" in h ? h.step.name : h.kind,
    );
    expect(names).toEqual(["pause-after-b", "pause-before-d", "pause-after-a"]);
  });

  it("inserts a single pause when --to and --pause-after share a target", () => {
    expect(buildHooks({ to: "b", pauseAfter: "b" })).toHaveLength(1);
  });
});

describe("commands", () => {
  let tmpDir: string;
  let definitionFile: string;
  let submitter: RecordingSubmitter;
  let logged: unknown[];
  let errored: unknown[];

  async function cli(...args: string[]): Promise<void> {
    const program = buildProgram({
      env: { STEPLINE_STATE_DIR: path.join(tmpDir, "state") },
      submitCommand: submitter,
    });
    await program.parseAsync(args, { from: "user" });
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "stepline-cli-test-"));
    fs.mkdirSync(path.join(tmpDir, "state"));
    fs.writeFileSync(path.join(tmpDir, "state", "config.yaml"), "fileLogging: false\n");
    definitionFile = path.join(tmpDir, "synth.yaml");
    fs.writeFileSync(definitionFile, DEFINITION);
    submitter = new RecordingSubmitter();
    process.exitCode = undefined;
    logged = [];
    errored = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      logged.push(line);
    });
    vi.spyOn(console, "error").mockImplementation((line: unknown) => {
      errored.push(line);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("run", () => {
    it("runs every step and exits cleanly", async () => {
      await cli("run", definitionFile);
      expect(submitter.executed).toEqual(["elab", "mapper", "reporter"]);
      expect(process.exitCode).toBeUndefined();
      expect(logged).toContain("[synth] Finished synth");
    });

    it("writes into the default run directory", async () => {
      await cli("run", definitionFile);
      expect(fs.existsSync(path.join(tmpDir, "build", "synth", "outputs.yaml"))).toBe(true);
    });

    it("honors --run-dir", async () => {
      const runDir = path.join(tmpDir, "custom");
      await cli("run", definitionFile, "--run-dir", runDir);
      expect(fs.existsSync(path.join(runDir, "outputs.yaml"))).toBe(true);
    });

    it("stops at a pause and resumes in a second invocation", async () => {
      await cli("run", definitionFile, "--pause-after", "elaborate");
      expect(submitter.executed).toEqual(["elab"]);
      expect(process.exitCode).toBeUndefined();

      await cli("run", definitionFile, "--resume-before", "map");
      expect(submitter.executed).toEqual(["elab", "mapper", "reporter"]);
    });

    it("runs a range with --from and --to", async () => {
      await cli("run", definitionFile, "--from", "map", "--to", "map");
      expect(submitter.executed).toEqual(["mapper"]);
    });

    it("combines --to with a pause elsewhere", async () => {
      await cli("run", definitionFile, "--to", "map", "--pause-before", "report");
      expect(submitter.executed).toEqual(["elab", "mapper"]);
      expect(process.exitCode).toBeUndefined();
    });

    it("accepts a pause before and after the same step", async () => {
      await cli("run", definitionFile, "--pause-before", "map", "--pause-after", "map");
      expect(submitter.executed).toEqual(["elab"]);
      expect(process.exitCode).toBeUndefined();
    });

    it("skips steps given to --skip", async () => {
      await cli("run", definitionFile, "--skip", "elaborate", "report");
      expect(submitter.executed).toEqual(["mapper"]);
    });

    it("sets exit code 1 when a step fails", async () => {
      submitter.failing.add("mapper");
      await cli("run", definitionFile);
      expect(submitter.executed).toEqual(["elab", "mapper"]);
      expect(process.exitCode).toBe(1);
      expect(errored).toEqual([
        "[synth] Command 'mapper' exited with code 1: boom",
        "[synth] Sub-step 'map' failed",
        "[synth] Run of synth failed",
      ]);
    });

    it("reports an unknown hook target", async () => {
      await cli("run", definitionFile, "--pause-before", "nope");
      expect(submitter.executed).toEqual([]);
      expect(process.exitCode).toBe(1);
      expect(errored).toContain("[synth] Target step 'nope' does not exist");
    });

    it("reports a missing definition", async () => {
      const missing = path.join(tmpDir, "missing.yaml");
      await cli("run", missing);
      expect(process.exitCode).toBe(1);
      expect(errored).toEqual([`[stepline] Pipeline definition not found: ${missing}`]);
    });

    it("reports an invalid config", async () => {
      fs.writeFileSync(path.join(tmpDir, "state", "config.yaml"), "fileLogging: maybe\n");
      await cli("run", definitionFile);
      expect(process.exitCode).toBe(1);
      expect(submitter.executed).toEqual([]);
    });
  });

  describe("steps", () => {
    it("prints the step order", async () => {
      await cli("steps", definitionFile);
      expect(logged).toEqual(["1. elaborate", "2. map", "3. report"]);
    });

    it("marks pause points and resume markers", async () => {
      await cli("steps", definitionFile, "--resume-before", "map", "--pause-after", "map");
      expect(logged).toEqual([
        "1. elaborate",
        "2. map",
        "3. pause-after-map (pause)",
        "4. report",
        "resume before map",
      ]);
      expect(submitter.executed).toEqual([]);
    });

    it("lists several pause points side by side", async () => {
      await cli("steps", definitionFile, "--pause-before", "map", "--pause-after", "map");
      expect(logged).toEqual([
        "1. elaborate",
        "2. pause-before-map (pause)",
        "3. map",
        "4. pause-after-map (pause)",
        "5. report",
      ]);
    });

    it("exits 1 for duplicate step names", async () => {
      fs.writeFileSync(
        definitionFile,
        "name: dup\nsteps:\n  - name: a\n    run: [x]\n  - name: a\n    run: [y]\n",
      );
      await cli("steps", definitionFile);
      expect(process.exitCode).toBe(1);
      expect(errored).toEqual(["[stepline] Duplicate step 'a' encountered"]);
    });
  });

  describe("describeSteps", () => {
    it("shows removed steps under their own name", () => {
      expect(describeSteps(definitionFile, { skip: ["map"] })).toEqual([
        "1. elaborate",
        "2. map",
        "3. report",
      ]);
    });
  });
});
