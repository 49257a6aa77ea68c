/**
 * Settings store consumed by tools and their step actions.
 *
 * Keys are flat dotted paths ("synthesis.clock_period"). Nested YAML mappings
 * are flattened on load. Layering is last-writer-wins per key; there is no
 * deeper merge.
 */
import fs from "node:fs";
import { parse as parseYaml } from "yaml";

export interface SettingsStore {
  /**
   * Look up `key`. A stored `null` yields `nullValue`.
   * @throws SettingNotFoundError if the key was never set.
   */
  getSetting(key: string, nullValue?: unknown): unknown;
  setSetting(key: string, value: unknown): void;
  /** Flat snapshot of every key. */
  toJSON(): Record<string, unknown>;
}

export class SettingNotFoundError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Setting not found: ${key}`);
    this.name = "SettingNotFoundError";
    this.key = key;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Flatten nested mappings into dotted keys. Arrays are kept as values. */
export function flattenSettings(
  raw: Record<string, unknown>,
  prefix = "",
): Record<string, unknown> {
  const flat: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value) && Object.keys(value).length > 0) {
      Object.assign(flat, flattenSettings(value, fullKey));
    } else {
      flat[fullKey] = value;
    }
  }
  return flat;
}

export class MemorySettings implements SettingsStore {
  private readonly values = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    this.merge(initial);
  }

  /** Layer `raw` (nested or flat) over the current values. */
  merge(raw: Record<string, unknown>): this {
    for (const [key, value] of Object.entries(flattenSettings(raw))) {
      this.values.set(key, value);
    }
    return this;
  }

  /** Layer a YAML file over the current values. An empty file is a no-op. */
  loadFile(filePath: string): this {
    const parsed: unknown = parseYaml(fs.readFileSync(filePath, "utf-8"));
    if (parsed === null || parsed === undefined) return this;
    if (!isPlainObject(parsed)) {
      throw new Error(`Settings file ${filePath} must contain a mapping at the top level`);
    }
    return this.merge(parsed);
  }

  getSetting(key: string, nullValue: unknown = null): unknown {
    if (!this.values.has(key)) {
      throw new SettingNotFoundError(key);
    }
    const value = this.values.get(key);
    return value === null || value === undefined ? nullValue : value;
  }

  setSetting(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries([...this.values.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }
}
