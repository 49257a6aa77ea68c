/**
 * Command submission for step actions.
 *
 * Steps that shell out to an external program go through a
 * {@link CommandSubmitter} so a tool can be pointed at a local runner, a
 * batch queue, or a fake in tests. The engine itself never submits commands.
 */
import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Exit code reported when the executable could not be found. */
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface SubmitOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export interface CommandSubmitter {
  submit(args: readonly string[], options: SubmitOptions): Promise<CommandResult>;
}

function readString(error: object, key: "stdout" | "stderr"): string {
  const value: unknown = key in error ? Reflect.get(error, key) : undefined;
  return typeof value === "string" ? value : "";
}

/**
 * Turn an execFile rejection into a result. Returns null for errors that are
 * not about the child process exiting (those are rethrown).
 */
function resultFromExecError(error: unknown): CommandResult | null {
  if (typeof error !== "object" || error === null || !("code" in error)) return null;
  const stdout = readString(error, "stdout");
  const stderr = readString(error, "stderr");

  if (typeof error.code === "number") {
    return { exitCode: error.code, stdout, stderr };
  }
  if (error.code === "ENOENT") {
    const msg = error instanceof Error ? error.message : "command not found";
    return { exitCode: COMMAND_NOT_FOUND_EXIT_CODE, stdout, stderr: stderr || msg };
  }
  return null;
}

/** Runs commands as local child processes. */
export class LocalSubmitCommand implements CommandSubmitter {
  private readonly maxBuffer: number;

  constructor(options: { maxBuffer?: number } = {}) {
    this.maxBuffer = options.maxBuffer ?? 64 * 1024 * 1024;
  }

  async submit(args: readonly string[], options: SubmitOptions): Promise<CommandResult> {
    const [file, ...rest] = args;
    if (!file) {
      throw new Error("Cannot submit an empty command");
    }
    try {
      const { stdout, stderr } = await execFileAsync(file, rest, {
        cwd: options.cwd,
        env: options.env,
        maxBuffer: this.maxBuffer,
        encoding: "utf-8",
      });
      return { exitCode: 0, stdout, stderr };
    } catch (error: unknown) {
      const result = resultFromExecError(error);
      if (result) return result;
      throw error;
    }
  }
}
