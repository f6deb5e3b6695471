import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

function readPackageVersion(relativePath: string): string | undefined {
  try {
    const pkgPath = new URL(relativePath, import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(pkgPath), "utf-8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch {
    // not at this level
  }
  return undefined;
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Resolves relative to this file so it works from src/ (tsx, vitest)
 * and from dist/src/ (compiled).
 */
export const SERVICE_VERSION: string =
  process.env.SERVICE_VERSION ??
  readPackageVersion("../package.json") ??
  readPackageVersion("../../package.json") ??
  "0.0.0";

export const SERVICE_NAME = "counterpoint-service";
