/**
 * Unit discovery through the Go toolchain: `go list -e -json <pattern>`.
 *
 * The toolchain applies build constraints and module resolution, so this is
 * the authoritative view of a tree. The call is synchronous with no timeout;
 * a failing command surfaces as ScanFailureError and is never retried.
 */

import { execFileSync } from "node:child_process";
import * as path from "node:path";
import { z } from "zod";
import { ScanFailureError, errorMessage } from "../engine/errors.js";
import { toPosix } from "../utils/file-path.js";
import type { AbsolutePath, UnitLister, UnitMetadata } from "../engine/types.js";

/** Runs `go <args>` in `cwd` and returns stdout; throws on a non-zero exit */
export type GoCommandRunner = (args: string[], cwd: string) => string;

export interface GoListOptions {
  /** Count test files and test imports. Default false */
  includeTests?: boolean;
  /** Go binary. Default "go" */
  goBinary?: string;
  run?: GoCommandRunner;
}

const stringList = z.array(z.string()).nullish().transform((v) => v ?? []);

export const goListPackageSchema = z.object({
  Dir: z.string().default(""),
  ImportPath: z.string().min(1),
  Name: z.string().default(""),
  Standard: z.boolean().optional(),
  GoFiles: stringList,
  CgoFiles: stringList,
  TestGoFiles: stringList,
  XTestGoFiles: stringList,
  Imports: stringList,
  TestImports: stringList,
  XTestImports: stringList,
  Error: z.object({ Err: z.string() }).nullish(),
});

export type GoListPackage = z.infer<typeof goListPackageSchema>;

const GO_LIST_MAX_BUFFER = 256 * 1024 * 1024;
// Reported for directories without sources; those are simply not units
const NO_GO_FILES = /no (?:non-test )?Go files/;

/**
 * Split `go list -json` output (concatenated JSON objects, no array) into
 * one text per object.
 */
export function splitJsonStream(text: string): string[] {
  const objects: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (c === "\\") escaped = true;
      else if (c === '"') inString = false;
      continue;
    }
    if (c === '"') {
      inString = true;
    } else if (c === "{") {
      if (depth === 0) start = i;
      depth++;
    } else if (c === "}") {
      depth--;
      if (depth === 0 && start !== -1) {
        objects.push(text.slice(start, i + 1));
        start = -1;
      }
    }
  }
  if (depth !== 0) {
    throw new ScanFailureError("Truncated go list output");
  }
  return objects;
}

export function parseGoListOutput(text: string): GoListPackage[] {
  return splitJsonStream(text).map((raw) => {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new ScanFailureError(`Malformed go list output: ${errorMessage(e)}`, { cause: e });
    }
    const parsed = goListPackageSchema.safeParse(json);
    if (!parsed.success) {
      throw new ScanFailureError(`Unexpected go list package shape: ${parsed.error.message}`);
    }
    return parsed.data;
  });
}

function defaultRunner(goBinary: string): GoCommandRunner {
  return (args, cwd) =>
    execFileSync(goBinary, args, {
      cwd,
      encoding: "utf-8",
      maxBuffer: GO_LIST_MAX_BUFFER,
      stdio: ["ignore", "pipe", "pipe"],
    });
}

export class GoListUnitLister implements UnitLister {
  private readonly includeTests: boolean;
  private readonly run: GoCommandRunner;

  constructor(options: GoListOptions = {}) {
    this.includeTests = options.includeTests ?? false;
    this.run = options.run ?? defaultRunner(options.goBinary ?? "go");
  }

  listUnits(root: AbsolutePath): UnitMetadata[] {
    return this.list(root, "./...")
      .filter((pkg) => !pkg.Standard)
      .map((pkg) => this.toMetadata(pkg))
      .filter((unit) => unit.sourceFiles.length > 0 || unit.error !== undefined);
  }

  listUnit(root: AbsolutePath, dir: AbsolutePath): UnitMetadata | null {
    const rel = toPosix(path.relative(root, dir));
    const pattern = rel === "" ? "." : `./${rel}`;
    const pkg = this.list(root, pattern).find((p) => !p.Standard);
    if (!pkg) return null;
    const unit = this.toMetadata(pkg);
    return unit.sourceFiles.length > 0 || unit.error !== undefined ? unit : null;
  }

  toMetadata(pkg: GoListPackage): UnitMetadata {
    const sourceFiles = [...pkg.GoFiles, ...pkg.CgoFiles];
    const imports = [...pkg.Imports];
    if (this.includeTests) {
      sourceFiles.push(...pkg.TestGoFiles, ...pkg.XTestGoFiles);
      imports.push(...pkg.TestImports, ...pkg.XTestImports);
    }
    const unit: UnitMetadata = {
      id: pkg.ImportPath,
      dir: pkg.Dir,
      sourceFiles,
      imports: [...new Set(imports)].filter((imp) => imp !== pkg.ImportPath),
      isEntry: pkg.Name === "main",
    };
    if (pkg.Error && !NO_GO_FILES.test(pkg.Error.Err)) unit.error = pkg.Error.Err;
    return unit;
  }

  private list(root: AbsolutePath, pattern: string): GoListPackage[] {
    let out: string;
    try {
      out = this.run(["list", "-e", "-json", pattern], root);
    } catch (e) {
      throw new ScanFailureError(`go list ${pattern} failed: ${errorMessage(e)}`, { cause: e });
    }
    return parseGoListOutput(out);
  }
}
