/**
 * Package version, read once from package.json
 */

import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

let cachedVersion: string | null = null;

/**
 * Resolves package.json two levels up, which holds from both src/utils
 * and dist/utils
 */
export function getPackageVersion(): string {
  if (cachedVersion !== null) {
    return cachedVersion;
  }

  const packagePath = join(
    dirname(fileURLToPath(import.meta.url)),
    "..",
    "..",
    "package.json",
  );
  const packageJson: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));

  cachedVersion =
    packageJson !== null &&
    typeof packageJson === "object" &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
      ? packageJson.version
      : "0.0.0";

  return cachedVersion;
}
