import { createRequire } from "node:module";

const CORE_PACKAGE_NAME = "stepline";

const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json", "./package.json"] as const;

function readPackageField(parsed: unknown, key: "name" | "version"): string | undefined {
  if (typeof parsed !== "object" || parsed === null || !(key in parsed)) return undefined;
  const value: unknown = Reflect.get(parsed, key);
  return typeof value === "string" ? value.trim() : undefined;
}

/** First package.json above this module that belongs to stepline. */
export function readVersionFromPackageJson(moduleUrl: string): string | null {
  const require = createRequire(moduleUrl);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let parsed: unknown;
    try {
      parsed = require(candidate);
    } catch {
      continue;
    }
    const version = readPackageField(parsed, "version");
    if (version && readPackageField(parsed, "name") === CORE_PACKAGE_NAME) {
      return version;
    }
  }
  return null;
}

export const VERSION = readVersionFromPackageJson(import.meta.url) ?? "0.0.0";
