/**
 * Unit Index
 *
 * Holds every known unit by identifier and by directory. Loaded from a
 * UnitLister; individual units are replaced when their directory is
 * rescanned and removed when their last source file goes away.
 */

import * as path from "node:path";
import { ScanFailureError, errorMessage } from "./errors.js";
import { canonicalPath } from "../utils/file-path.js";
import type { AbsolutePath, Unit, UnitId, UnitLister, UnitMetadata } from "./types.js";

export type ScanErrorHandler = (error: ScanFailureError) => void;

/**
 * Normalize lister output: absolute canonical directory and file locations,
 * de-duplicated files and imports in reported order.
 */
export function normalizeUnit(meta: UnitMetadata, root: AbsolutePath): Unit {
  if (!meta.id) {
    throw new ScanFailureError(`Unit in ${meta.dir || "<unknown dir>"} has no identifier`);
  }
  const dir = canonicalPath(meta.dir || ".", root);
  const files = [...new Set(meta.sourceFiles.map((f) => canonicalPath(f, dir)))];
  const imports = [...new Set(meta.imports)].filter((imp) => imp !== meta.id);
  return { id: meta.id, dir, files, imports, isEntry: meta.isEntry };
}

export class UnitIndex {
  private readonly units = new Map<UnitId, Unit>();
  private readonly byDir = new Map<AbsolutePath, UnitId>();
  private readonly stale = new Set<UnitId>();

  /**
   * Replace the whole index with a fresh listing of `root`.
   * A lister throw aborts with ScanFailureError; a unit that failed on its
   * own is reported through `onScanError` and left out.
   */
  load(lister: UnitLister, root: AbsolutePath, onScanError: ScanErrorHandler): Map<UnitId, Unit> {
    let listing: UnitMetadata[];
    try {
      listing = lister.listUnits(root);
    } catch (e) {
      if (e instanceof ScanFailureError) throw e;
      throw new ScanFailureError(`Failed to list units under ${root}: ${errorMessage(e)}`, {
        cause: e,
      });
    }

    this.clear();
    const sorted = [...listing].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    for (const meta of sorted) {
      const unit = this.accept(meta, root, onScanError);
      if (unit) this.replace(unit);
    }
    return new Map(this.units);
  }

  /** Normalize one listed unit, or report why it is left out */
  accept(meta: UnitMetadata, root: AbsolutePath, onScanError: ScanErrorHandler): Unit | null {
    if (meta.error) {
      onScanError(new ScanFailureError(meta.error, { unitId: meta.id }));
      return null;
    }
    try {
      const unit = normalizeUnit(meta, root);
      if (this.units.has(unit.id) && this.units.get(unit.id)?.dir !== unit.dir) {
        onScanError(
          new ScanFailureError(`Unit ${unit.id} listed twice (${unit.dir})`, { unitId: unit.id })
        );
        return null;
      }
      return unit;
    } catch (e) {
      onScanError(
        e instanceof ScanFailureError
          ? e
          : new ScanFailureError(errorMessage(e), { cause: e, unitId: meta.id })
      );
      return null;
    }
  }

  replace(unit: Unit): void {
    const previous = this.units.get(unit.id);
    if (previous && previous.dir !== unit.dir) this.byDir.delete(previous.dir);
    this.units.set(unit.id, unit);
    this.byDir.set(unit.dir, unit.id);
    this.stale.delete(unit.id);
  }

  remove(id: UnitId): Unit | undefined {
    const unit = this.units.get(id);
    if (!unit) return undefined;
    this.units.delete(id);
    if (this.byDir.get(unit.dir) === id) this.byDir.delete(unit.dir);
    this.stale.delete(id);
    return unit;
  }

  /** Drop one file from its unit's list; returns the updated unit */
  withoutFile(id: UnitId, file: AbsolutePath): Unit | undefined {
    const unit = this.units.get(id);
    if (!unit) return undefined;
    const updated: Unit = { ...unit, files: unit.files.filter((f) => f !== file) };
    this.units.set(id, updated);
    return updated;
  }

  get(id: UnitId): Unit | undefined {
    return this.units.get(id);
  }

  has(id: UnitId): boolean {
    return this.units.has(id);
  }

  findByDir(dir: AbsolutePath): Unit | undefined {
    const id = this.byDir.get(path.normalize(dir));
    return id === undefined ? undefined : this.units.get(id);
  }

  /** Units whose import list names `id` */
  importersOf(id: UnitId): UnitId[] {
    const result: UnitId[] = [];
    for (const unit of this.units.values()) {
      if (unit.imports.includes(id)) result.push(unit.id);
    }
    return result;
  }

  /** Forget a unit's scan metadata freshness; `refreshStale` rescans it later */
  markStale(id: UnitId): void {
    if (this.units.has(id)) this.stale.add(id);
  }

  isStale(id: UnitId): boolean {
    return this.stale.has(id);
  }

  staleIds(): UnitId[] {
    return [...this.stale].sort();
  }

  values(): IterableIterator<Unit> {
    return this.units.values();
  }

  get size(): number {
    return this.units.size;
  }

  clear(): void {
    this.units.clear();
    this.byDir.clear();
    this.stale.clear();
  }
}
