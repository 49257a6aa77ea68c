/**
 * Tool layer: the base class, its context and settings, and command submission.
 */
export { Tool, OUTPUTS_FILENAME, SETTINGS_SNAPSHOT_FILENAME, ENTER_SCRIPT_FILENAME, SETTINGS_ENV_VAR } from "./tool.js";
export type { TechnologyProvider, ToolContext, ToolOptions } from "./context.js";
export { ToolConfigError, createToolContext } from "./context.js";
export type { SettingsStore } from "./settings.js";
export { MemorySettings, SettingNotFoundError, flattenSettings } from "./settings.js";
export type { CommandResult, CommandSubmitter, SubmitOptions } from "./submit.js";
export { COMMAND_NOT_FOUND_EXIT_CODE, LocalSubmitCommand } from "./submit.js";
export { escapeEnvValue, formatEnterScript, shellQuote } from "./shell.js";
