/**
 * Version constant read from package.json at module load time
 */
import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

function findPackageJson(from: string): string | undefined {
  let dir = from;
  for (;;) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

function readVersion(): string {
  const packageJsonPath = findPackageJson(
    dirname(fileURLToPath(import.meta.url)),
  );
  if (packageJsonPath === undefined) return "unknown";
  const json: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  if (
    typeof json === "object" && json !== null && "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "unknown";
}

export const VERSION: string = readVersion();
