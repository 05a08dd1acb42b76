/**
 * Ownership Engine - TypeScript Implementation
 *
 * Cache lifecycle: the first query scans the whole tree; afterwards file
 * events are applied locally:
 * - create: rescan the file's directory alone
 * - remove: drop the file, and its unit once no file remains
 * - rename: remove then create
 * - write:  entry file -> full rebuild (its imports may reach units the
 *           index has never seen); unindexed file -> handled as a create;
 *           any other file -> mark its unit stale
 *
 * Full rebuilds are therefore bounded by edits to entry files.
 */

import * as path from "node:path";
import { resolveEngineOptions, type OwnershipEngineOptions, type ResolvedEngineOptions } from "../config.js";
import { DependencyGraph } from "./dependency-graph.js";
import { EntryPointRegistry } from "./entry-registry.js";
import { InvalidInputError, ScanFailureError, errorMessage } from "./errors.js";
import { FileIndex, type FileConflict } from "./file-index.js";
import { OwnershipResolver, toChangedFile, toEntryHandle } from "./ownership.js";
import { UnitIndex } from "./unit-index.js";
import { toPosix } from "../utils/file-path.js";
import type {
  AbsolutePath,
  EngineStats,
  FileEvent,
  LifecycleState,
  OwnershipEngine,
  Unit,
  UnitId,
  UnitMetadata,
} from "./types.js";

export class OwnershipEngineImpl implements OwnershipEngine {
  private readonly options: ResolvedEngineOptions;
  private readonly units = new UnitIndex();
  private readonly files = new FileIndex();
  private readonly graph = new DependencyGraph();
  private readonly entries = new EntryPointRegistry();
  private readonly resolver: OwnershipResolver;
  private lifecycle: LifecycleState = "uninitialized";
  private rebuilds = 0;

  constructor(options?: OwnershipEngineOptions | string) {
    this.options = resolveEngineOptions(options);
    this.resolver = new OwnershipResolver(this.units, this.files, this.graph, this.entries, {
      basenameFallback: this.options.basenameFallback,
    });
  }

  get state(): LifecycleState {
    return this.lifecycle;
  }

  get root(): AbsolutePath {
    return this.options.root;
  }

  ownedBy(entryHandle: string, changedFileLocation: string, event?: FileEvent): boolean {
    if (!changedFileLocation || !changedFileLocation.trim()) {
      throw new InvalidInputError("Changed file location cannot be empty");
    }
    if (!entryHandle || !entryHandle.trim()) {
      throw new InvalidInputError("Entry handle cannot be empty");
    }
    const handle = toEntryHandle(entryHandle, this.root);
    const changed = toChangedFile(changedFileLocation, this.root);

    this.ensureReady();
    if (handle.location !== handle.dir) this.entries.registerHandle(handle.location);
    if (event) this.apply(changed, event);

    return this.resolver.ownedBy(changed, handle);
  }

  entriesOwning(fileBasename: string): UnitId[] {
    if (!fileBasename || !fileBasename.trim()) {
      throw new InvalidInputError("File name cannot be empty");
    }
    this.ensureReady();
    return this.resolver.entriesOwning(path.basename(fileBasename));
  }

  entriesOwningFile(fileLocation: string): UnitId[] {
    const file = toChangedFile(fileLocation, this.root);
    this.ensureReady();
    return this.resolver.entriesOwningFile(file);
  }

  findReverseDeps(targets: readonly UnitId[]): UnitId[] {
    this.ensureReady();
    const known = targets.filter((id) => this.units.has(id));
    return [...this.graph.importersClosure(known)].filter((id) => this.units.has(id)).sort();
  }

  applyEvent(fileLocation: string, event: FileEvent, previousLocation?: string): void {
    const file = toChangedFile(fileLocation, this.root);
    const previous = previousLocation ? toChangedFile(previousLocation, this.root) : undefined;
    this.ensureReady();
    this.apply(file, event, previous);
  }

  registerEntry(entryHandle: string): UnitId | undefined {
    const handle = toEntryHandle(entryHandle, this.root);
    this.ensureReady();
    if (handle.location !== handle.dir) this.entries.registerHandle(handle.location);
    return this.resolver.entryUnit(handle);
  }

  rebuild(reason = "explicit rebuild"): void {
    this.units.load(this.options.lister, this.root, this.options.onScanError);
    this.reportConflicts(this.files.rebuild(this.units.values()));

    this.graph.clear();
    for (const unit of this.units.values()) {
      this.graph.setEdges(unit.id, unit.imports);
    }
    this.entries.rebuild(this.units);
    this.resolver.invalidate();

    this.lifecycle = "ready";
    this.rebuilds++;
    this.options.onRebuild(reason);
  }

  refreshStale(): UnitId[] {
    if (this.lifecycle !== "ready") return [];
    const refreshed = this.units.staleIds();
    for (const id of refreshed) {
      const unit = this.units.get(id);
      if (unit) this.rescanDir(unit.dir, id);
    }
    return refreshed;
  }

  reset(): void {
    this.units.clear();
    this.files.clear();
    this.graph.clear();
    this.entries.clear();
    this.resolver.invalidate();
    this.lifecycle = "uninitialized";
  }

  unit(id: UnitId): Unit | undefined {
    return this.units.get(id);
  }

  stats(): EngineStats {
    return {
      state: this.lifecycle,
      units: this.units.size,
      files: this.files.size,
      entries: this.entries.size,
      edges: this.graph.edgeCount,
      stale: this.units.staleIds().length,
      rebuilds: this.rebuilds,
    };
  }

  private ensureReady(): void {
    if (this.lifecycle === "uninitialized") this.rebuild("initial scan");
  }

  private apply(file: AbsolutePath, event: FileEvent, previous?: AbsolutePath): void {
    switch (event) {
      case "create":
        this.create(file);
        return;
      case "remove":
        this.remove(file);
        return;
      case "rename":
        this.remove(previous ?? file);
        this.create(file);
        return;
      case "write":
        this.write(file);
        return;
    }
  }

  private create(file: AbsolutePath): void {
    const owner = this.files.lookup(file);
    this.rescanDir(path.dirname(file), owner);
  }

  private remove(file: AbsolutePath): void {
    const unitId = this.files.remove(file);
    if (unitId === undefined) return;
    const unit = this.units.withoutFile(unitId, file);
    if (!unit || unit.files.length === 0) {
      this.dropUnit(unitId);
    } else {
      this.units.markStale(unitId);
    }
    this.resolver.invalidate();
  }

  private write(file: AbsolutePath): void {
    const unitId = this.files.lookup(file);
    const isEntryFile =
      this.entries.isHandleFile(file) ||
      (unitId !== undefined && this.entries.unitIsEntryPoint(unitId));
    if (isEntryFile) {
      this.rebuild(`entry file changed: ${toPosix(path.relative(this.root, file))}`);
      return;
    }
    if (unitId === undefined) {
      // Never indexed (its create was skipped or missed): index it now
      this.create(file);
      return;
    }
    this.units.markStale(unitId);
  }

  /**
   * Rescan one directory and index whatever unit it now holds.
   * Failures are reported for that unit only; the rest of the index stays.
   */
  private rescanDir(dir: AbsolutePath, knownId?: UnitId): void {
    let meta: UnitMetadata | null;
    try {
      meta = this.options.lister.listUnit(this.root, dir);
    } catch (e) {
      this.options.onScanError(
        new ScanFailureError(`Failed to rescan ${dir}: ${errorMessage(e)}`, {
          cause: e,
          unitId: knownId ?? this.units.findByDir(dir)?.id,
        })
      );
      return;
    }

    const previous = this.units.findByDir(dir);
    if (!meta) {
      if (previous) this.dropUnit(previous.id);
      return;
    }
    const unit = this.units.accept(meta, this.root, this.options.onScanError);
    if (!unit) return;
    if (previous && previous.id !== unit.id) this.dropUnit(previous.id);
    this.indexUnit(unit);
  }

  private indexUnit(unit: Unit): void {
    const isNew = !this.units.has(unit.id);
    if (!isNew) this.files.removeUnit(unit.id);

    this.units.replace(unit);
    this.reportConflicts(this.files.insertUnit(unit));
    this.graph.setEdges(unit.id, unit.imports);
    if (isNew) {
      for (const importer of this.units.importersOf(unit.id)) {
        this.graph.addEdge(importer, unit.id);
      }
    }
    if (unit.isEntry) this.entries.add(unit.id);
    else this.entries.remove(unit.id);
    this.resolver.invalidate();
  }

  private dropUnit(id: UnitId): void {
    this.units.remove(id);
    this.files.removeUnit(id);
    this.graph.removeUnit(id);
    this.entries.remove(id);
    this.resolver.invalidate();
  }

  private reportConflicts(conflicts: FileConflict[]): void {
    for (const c of conflicts) {
      this.options.onScanError(
        new ScanFailureError(`${c.file} already belongs to ${c.owner}`, { unitId: c.rejected })
      );
    }
  }
}

/** Engine rooted at `rootOrOptions`; nothing is scanned until the first query */
export function createOwnershipEngine(rootOrOptions?: OwnershipEngineOptions | string): OwnershipEngine {
  return new OwnershipEngineImpl(rootOrOptions);
}
