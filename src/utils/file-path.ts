/**
 * File path utilities for resolving and normalizing file locations.
 */

import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Absolute, symlink-free location of `p` (relative paths resolve against `root`).
 * Locations that no longer exist (removed files) keep their last segment and
 * canonicalize the nearest existing ancestor, so a removed file maps to the
 * same key it was indexed under.
 */
export function canonicalPath(p: string, root?: string): string {
  const abs = root ? path.resolve(root, p) : path.resolve(p);
  try {
    return fs.realpathSync.native(abs);
  } catch {
    const parent = path.dirname(abs);
    if (parent === abs) return abs;
    return path.join(canonicalPath(parent), path.basename(abs));
  }
}

/** True when `p` names a directory or file by more than its bare name */
export function hasDirectoryComponent(p: string): boolean {
  return p.includes("/") || p.includes("\\");
}

/** Forward-slash form used for unit identifiers and display */
export function toPosix(p: string): string {
  return p.replace(/\\/g, "/");
}

/**
 * True when `dir` ends with `suffix` on a path-segment boundary.
 * "/w/cmd/appA" ends with "appA" and "cmd/appA", not with "ppA".
 */
export function endsWithSegments(dir: string, suffix: string): boolean {
  const d = toPosix(dir).replace(/\/+$/, "");
  const s = toPosix(suffix).replace(/^\.\/+/, "").replace(/\/+$/, "");
  if (!s || s === ".") return false;
  return d === s || d.endsWith("/" + s);
}

/** Last segment of a unit identifier ("example.com/proj/cmd/app" -> "app") */
export function lastSegment(id: string): string {
  const parts = toPosix(id).split("/").filter(Boolean);
  return parts[parts.length - 1] ?? "";
}

/**
 * Convert absolute locations to paths relative to the root (for display).
 */
export function toRelativePaths(files: Iterable<string>, root: string): string[] {
  const result: string[] = [];
  for (const f of files) {
    result.push(path.isAbsolute(f) ? toPosix(path.relative(root, f)) : toPosix(f));
  }
  return result;
}
