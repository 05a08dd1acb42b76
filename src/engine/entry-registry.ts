/**
 * Entry Point Registry
 *
 * The subset of units that produce executables, and the handle files
 * callers identify their entry points by.
 *
 * Handle resolution, in order:
 * 1. exact: the handle's location is a file of an entry unit
 * 2. the handle's directory is an entry unit's directory, or the unit's
 *    directory ends with the handle's relative directory
 * 3. the handle directory's base name equals the unit identifier's last segment
 * Steps 2 and 3 are heuristics; several candidates resolve to the smallest
 * unit identifier.
 */

import * as path from "node:path";
import { endsWithSegments, lastSegment } from "../utils/file-path.js";
import type { FileIndex } from "./file-index.js";
import type { UnitIndex } from "./unit-index.js";
import type { AbsolutePath, UnitId } from "./types.js";

export interface EntryHandle {
  /** Handle as the caller gave it (relative to the root, or absolute) */
  raw: string;
  /** Canonical location of the handle's file (or directory) */
  location: AbsolutePath;
  /** Directory the handle designates */
  dir: AbsolutePath;
  /** Root-relative form of `dir` */
  relativeDir: string;
}

export class EntryPointRegistry {
  private readonly entries = new Set<UnitId>();
  private readonly handleFiles = new Set<AbsolutePath>();

  rebuild(units: UnitIndex): void {
    this.entries.clear();
    for (const unit of units.values()) {
      if (unit.isEntry) this.entries.add(unit.id);
    }
  }

  add(unit: UnitId): void {
    this.entries.add(unit);
  }

  remove(unit: UnitId): void {
    this.entries.delete(unit);
  }

  unitIsEntryPoint(unit: UnitId): boolean {
    return this.entries.has(unit);
  }

  /** Entry unit identifiers, sorted */
  list(): UnitId[] {
    return [...this.entries].sort();
  }

  get size(): number {
    return this.entries.size;
  }

  entryPointMatchingHandle(
    handle: EntryHandle,
    files: FileIndex,
    units: UnitIndex
  ): UnitId | undefined {
    const exact = files.lookup(handle.location);
    if (exact !== undefined && this.entries.has(exact)) return exact;

    const byDir = this.list().filter((id) => {
      const unit = units.get(id);
      if (!unit) return false;
      return unit.dir === handle.dir || endsWithSegments(unit.dir, handle.relativeDir);
    });
    if (byDir.length > 0) return byDir[0];

    const base = path.basename(handle.dir);
    return this.list().find((id) => lastSegment(id) === base);
  }

  /** Remember a handle's own file so writes to it trigger a rebuild */
  registerHandle(file: AbsolutePath): void {
    this.handleFiles.add(file);
  }

  isHandleFile(file: AbsolutePath): boolean {
    return this.handleFiles.has(file);
  }

  clear(): void {
    this.entries.clear();
    this.handleFiles.clear();
  }
}
