/**
 * Unit discovery by reading the tree directly: every directory holding
 * *.go files is a unit, named by the go.mod module path plus its relative
 * directory. Needs no Go toolchain.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import fg from "fast-glob";
import { GO_DIR_SOURCE_GLOB, GO_MOD_FILE, GO_SOURCE_GLOB, GO_TEST_FILE, SCAN_IGNORE } from "../constants.js";
import { readGoHeader } from "./go-source.js";
import { toPosix } from "../utils/file-path.js";
import type { AbsolutePath, UnitLister, UnitMetadata } from "../engine/types.js";

export interface SourceScanOptions {
  /** Count *_test.go files and their imports. Default false */
  includeTests?: boolean;
}

const IGNORED_SEGMENTS = new Set(["node_modules", "vendor", "testdata"]);
const MODULE_DIRECTIVE = /^\s*module\s+("?)([^\s"]+)\1\s*$/m;

/** Module path declared in `<root>/go.mod`, or "" when there is none */
export function readModulePath(root: AbsolutePath): string {
  let content: string;
  try {
    content = fs.readFileSync(path.join(root, GO_MOD_FILE), "utf-8");
  } catch {
    return "";
  }
  const m = MODULE_DIRECTIVE.exec(content.replace(/\/\/.*$/gm, ""));
  return m ? m[2] : "";
}

/** Unit identifier for a directory relative to the module root */
export function unitIdFor(modulePath: string, relativeDir: string): string {
  const rel = toPosix(relativeDir).replace(/^\.\/?/, "");
  if (!modulePath) return rel || ".";
  return rel ? `${modulePath}/${rel}` : modulePath;
}

function isIgnoredDir(relativeDir: string): boolean {
  return toPosix(relativeDir)
    .split("/")
    .some((seg) => seg !== "." && seg !== ".." && (seg.startsWith(".") || seg.startsWith("_") || IGNORED_SEGMENTS.has(seg)));
}

export class SourceScanUnitLister implements UnitLister {
  private readonly includeTests: boolean;

  constructor(options: SourceScanOptions = {}) {
    this.includeTests = options.includeTests ?? false;
  }

  listUnits(root: AbsolutePath): UnitMetadata[] {
    const modulePath = readModulePath(root);
    const matches = fg.sync(GO_SOURCE_GLOB, {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      ignore: SCAN_IGNORE,
    });

    const byDir = new Map<string, string[]>();
    for (const file of matches) {
      const dir = path.dirname(path.resolve(file));
      const list = byDir.get(dir) ?? [];
      list.push(file);
      byDir.set(dir, list);
    }

    const units: UnitMetadata[] = [];
    for (const [dir, files] of byDir) {
      const unit = this.scanDir(root, modulePath, dir, files);
      if (unit) units.push(unit);
    }
    return units.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  listUnit(root: AbsolutePath, dir: AbsolutePath): UnitMetadata | null {
    const rel = path.relative(root, dir);
    if (rel.startsWith("..") || path.isAbsolute(rel) || isIgnoredDir(rel)) return null;
    if (!fs.existsSync(dir)) return null;
    const files = fg.sync(GO_DIR_SOURCE_GLOB, { cwd: dir, absolute: true, onlyFiles: true });
    return this.scanDir(root, readModulePath(root), dir, files);
  }

  private scanDir(
    root: AbsolutePath,
    modulePath: string,
    dir: AbsolutePath,
    files: string[]
  ): UnitMetadata | null {
    const sources = files
      .filter((f) => this.includeTests || !GO_TEST_FILE.test(f))
      .map((f) => path.basename(f))
      .sort();
    if (sources.length === 0) return null;

    const relDir = path.relative(root, dir);
    const id = unitIdFor(modulePath, relDir);
    const unit: UnitMetadata = { id, dir, sourceFiles: sources, imports: [], isEntry: false };

    const imports = new Set<string>();
    const packages = new Map<string, string>();
    for (const name of sources) {
      let content: string;
      try {
        content = fs.readFileSync(path.join(dir, name), "utf-8");
      } catch {
        continue; // removed between glob and read
      }
      const header = readGoHeader(content);
      if (header.packageName === null) {
        return { ...unit, error: `${toPosix(path.join(relDir, name))}: expected 'package' clause` };
      }
      const pkg =
        GO_TEST_FILE.test(name) && header.packageName.endsWith("_test")
          ? header.packageName.slice(0, -"_test".length)
          : header.packageName;
      packages.set(pkg, packages.get(pkg) ?? name);
      for (const imp of header.imports) imports.add(imp);
    }

    if (packages.size > 1) {
      const found = [...packages].map(([pkg, file]) => `${pkg} (${file})`).join(", ");
      return { ...unit, error: `found packages ${found} in ${toPosix(relDir) || "."}` };
    }
    return {
      ...unit,
      imports: [...imports].filter((imp) => imp !== id).sort(),
      isEntry: packages.has("main"),
    };
  }
}
