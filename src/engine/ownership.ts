/**
 * Ownership Resolver
 *
 * Composes File Index + Dependency Graph + Entry Point Registry:
 * entry E owns file F when F is E's own handle file, or F's unit is
 * E's unit or reachable from it.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { InvalidInputError } from "./errors.js";
import { canonicalPath, hasDirectoryComponent, toPosix } from "../utils/file-path.js";
import type { DependencyGraph } from "./dependency-graph.js";
import type { EntryHandle, EntryPointRegistry } from "./entry-registry.js";
import type { FileIndex } from "./file-index.js";
import type { UnitIndex } from "./unit-index.js";
import type { AbsolutePath, UnitId } from "./types.js";

export interface OwnershipResolverOptions {
  basenameFallback: boolean;
}

/**
 * Turn a caller's entry handle into a canonical location.
 * Throws InvalidInputError for an empty handle or one that does not exist.
 */
export function toEntryHandle(raw: string, root: AbsolutePath): EntryHandle {
  if (!raw || !raw.trim()) {
    throw new InvalidInputError("Entry handle cannot be empty");
  }
  const location = canonicalPath(raw, root);
  let isDirectory: boolean;
  try {
    isDirectory = fs.statSync(location).isDirectory();
  } catch {
    throw new InvalidInputError(`Entry file does not exist: ${raw}`);
  }
  const dir = isDirectory ? location : path.dirname(location);
  const relativeDir = path.isAbsolute(raw)
    ? toPosix(path.relative(root, dir))
    : toPosix(isDirectory ? path.normalize(raw) : path.dirname(path.normalize(raw)));
  return { raw, location, dir, relativeDir };
}

/**
 * Canonical location of a changed file.
 * Throws InvalidInputError for an empty path or a bare file name.
 */
export function toChangedFile(raw: string, root: AbsolutePath): AbsolutePath {
  if (!raw || !raw.trim()) {
    throw new InvalidInputError("Changed file location cannot be empty");
  }
  if (!hasDirectoryComponent(raw)) {
    throw new InvalidInputError(
      `Changed file location must include its directory, not just a file name: ${raw}`
    );
  }
  return canonicalPath(raw, root);
}

export class OwnershipResolver {
  private readonly handleUnits = new Map<AbsolutePath, UnitId | null>();

  constructor(
    private readonly units: UnitIndex,
    private readonly files: FileIndex,
    private readonly graph: DependencyGraph,
    private readonly entries: EntryPointRegistry,
    private readonly options: OwnershipResolverOptions
  ) {}

  /** Entry unit for a handle; memoised until `invalidate()` */
  entryUnit(handle: EntryHandle): UnitId | undefined {
    const cached = this.handleUnits.get(handle.location);
    if (cached !== undefined) return cached ?? undefined;
    const unit = this.entries.entryPointMatchingHandle(handle, this.files, this.units);
    this.handleUnits.set(handle.location, unit ?? null);
    return unit;
  }

  ownedBy(changedFile: AbsolutePath, handle: EntryHandle): boolean {
    if (changedFile === handle.location) return true;

    const fileUnit = this.files.lookup(changedFile, {
      basenameFallback: this.options.basenameFallback,
    });
    if (fileUnit === undefined) return false;

    const entryUnit = this.entryUnit(handle);
    if (entryUnit === undefined) return false;
    return this.graph.reachable(entryUnit, fileUnit);
  }

  /** Entry units whose build includes any unit holding a file called `basename` */
  entriesOwning(basename: string): UnitId[] {
    const candidates = this.files.unitsNamed(basename);
    if (candidates.length === 0) return [];
    return this.entries
      .list()
      .filter((entry) => candidates.some((unit) => this.graph.reachable(entry, unit)));
  }

  /** Entry units whose build includes the unit owning `file` exactly */
  entriesOwningFile(file: AbsolutePath): UnitId[] {
    const unit = this.files.lookup(file);
    if (unit === undefined) return [];
    const affected = this.graph.importersClosure([unit]);
    return [...affected].filter((id) => this.entries.unitIsEntryPoint(id)).sort();
  }

  invalidate(): void {
    this.handleUnits.clear();
  }
}
