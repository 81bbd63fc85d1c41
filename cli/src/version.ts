/**
 * CLI version, read from the package manifest next to src/ or dist/
 */

import * as fs from "fs";

const PACKAGE_JSON_URL = new URL("../package.json", import.meta.url);

/**
 * Read the "version" field of a package.json
 *
 * Falls back to "0.0.0" when the manifest has no string version.
 */
export function readPackageVersion(manifest: URL | string = PACKAGE_JSON_URL): string {
  const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf8"));
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }
  return "0.0.0";
}

export const VERSION = readPackageVersion();
