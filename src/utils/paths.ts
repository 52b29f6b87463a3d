import path from "path";
import os from "os";

/**
 * True when `child` is `parent` or lies beneath it. Compares path
 * components, so `/data/out-10` is not inside `/data/out-1`.
 */
export function isWithin(child: string, parent: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child));
  if (relative === "") return true;
  if (path.isAbsolute(relative)) return false;
  return relative !== ".." && !relative.startsWith(`..${path.sep}`);
}

/**
 * Expand a leading `~` and make the path absolute
 */
export function resolveUserPath(filePath: string): string {
  if (filePath === "~") return os.homedir();
  if (filePath.startsWith("~/") || filePath.startsWith(`~${path.sep}`)) {
    return path.resolve(os.homedir(), filePath.slice(2));
  }
  return path.resolve(filePath);
}
