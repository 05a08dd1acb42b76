/**
 * File Index
 *
 * Two mappings derived from the Unit Index:
 * - exact location -> owning unit (unique; a second claimant is rejected)
 * - basename -> owning units (name collisions across units, e.g. main.go)
 *
 * Basename resolution is opt-in. When several units share a basename the
 * lexicographically smallest unit identifier wins, independent of the
 * order units were discovered or created in.
 */

import * as path from "node:path";
import type { AbsolutePath, Unit, UnitId } from "./types.js";

export interface LookupOptions {
  /** Fall back to basename matching when the exact location is unknown */
  basenameFallback?: boolean;
}

export interface FileConflict {
  file: AbsolutePath;
  owner: UnitId;
  rejected: UnitId;
}

export class FileIndex {
  private readonly pathToUnit = new Map<AbsolutePath, UnitId>();
  private readonly basenameToUnits = new Map<string, Set<UnitId>>();
  private readonly unitFiles = new Map<UnitId, Set<AbsolutePath>>();

  /** Re-derive both maps from scratch; returns the files claimed twice */
  rebuild(units: Iterable<Unit>): FileConflict[] {
    this.clear();
    const conflicts: FileConflict[] = [];
    for (const unit of units) {
      conflicts.push(...this.insertUnit(unit));
    }
    return conflicts;
  }

  /** Index every file of one unit */
  insertUnit(unit: Unit): FileConflict[] {
    const conflicts: FileConflict[] = [];
    for (const file of unit.files) {
      const conflict = this.insert(file, unit.id);
      if (conflict) conflicts.push(conflict);
    }
    return conflicts;
  }

  /**
   * Attribute one file to `unit`. A file already owned by another unit
   * keeps its owner and the conflict is returned.
   */
  insert(file: AbsolutePath, unit: UnitId): FileConflict | null {
    const owner = this.pathToUnit.get(file);
    if (owner !== undefined && owner !== unit) {
      return { file, owner, rejected: unit };
    }
    this.pathToUnit.set(file, unit);

    const files = this.unitFiles.get(unit) ?? new Set<AbsolutePath>();
    files.add(file);
    this.unitFiles.set(unit, files);

    const name = path.basename(file);
    const owners = this.basenameToUnits.get(name) ?? new Set<UnitId>();
    owners.add(unit);
    this.basenameToUnits.set(name, owners);
    return null;
  }

  /** Drop one file; returns the unit that owned it */
  remove(file: AbsolutePath): UnitId | undefined {
    const unit = this.pathToUnit.get(file);
    if (unit === undefined) return undefined;
    this.pathToUnit.delete(file);

    const files = this.unitFiles.get(unit);
    files?.delete(file);
    if (files && files.size === 0) this.unitFiles.delete(unit);

    const name = path.basename(file);
    const stillNamed = [...(files ?? [])].some((f) => path.basename(f) === name);
    if (!stillNamed) {
      const owners = this.basenameToUnits.get(name);
      owners?.delete(unit);
      if (owners && owners.size === 0) this.basenameToUnits.delete(name);
    }
    return unit;
  }

  /** Drop every file of one unit */
  removeUnit(unit: UnitId): void {
    for (const file of [...(this.unitFiles.get(unit) ?? [])]) {
      this.remove(file);
    }
  }

  /** Owning unit of `file`: exact location first, then (opt-in) basename */
  lookup(file: AbsolutePath, options: LookupOptions = {}): UnitId | undefined {
    const exact = this.pathToUnit.get(file);
    if (exact !== undefined) return exact;
    if (!options.basenameFallback) return undefined;
    return this.unitsNamed(path.basename(file))[0];
  }

  /** Units holding a file called `basename`, smallest identifier first */
  unitsNamed(basename: string): UnitId[] {
    return [...(this.basenameToUnits.get(basename) ?? [])].sort();
  }

  filesOf(unit: UnitId): AbsolutePath[] {
    return [...(this.unitFiles.get(unit) ?? [])];
  }

  has(file: AbsolutePath): boolean {
    return this.pathToUnit.has(file);
  }

  get size(): number {
    return this.pathToUnit.size;
  }

  clear(): void {
    this.pathToUnit.clear();
    this.basenameToUnits.clear();
    this.unitFiles.clear();
  }
}
