/**
 * Ownership Engine - Type Definitions
 *
 * A build unit is a Go package directory. An entry point is a unit that
 * links into its own executable (`package main`). Ownership is computed:
 * entry E owns file F when F's unit is E or is reachable from E.
 *
 * Unit discovery sits behind UnitLister so the engine never depends on
 * how metadata is obtained (`go list`, a source scan, a fake in tests).
 */

/** Unique unit identifier (Go import path, or root-relative dir without go.mod) */
export type UnitId = string;

/** Absolute, canonical file or directory location */
export type AbsolutePath = string;

/** File-system change kinds the engine reacts to */
export type FileEvent = "create" | "write" | "remove" | "rename";

export const FILE_EVENTS: readonly FileEvent[] = ["create", "write", "remove", "rename"];

/**
 * Raw per-unit metadata as reported by a UnitLister.
 * `dir` may be relative to the lister root; `sourceFiles` may be relative to `dir`.
 */
export interface UnitMetadata {
  id: UnitId;
  dir: string;
  sourceFiles: readonly string[];
  /** Direct dependency identifiers (imports), in declaration order */
  imports: readonly UnitId[];
  /** True for units that produce an executable */
  isEntry: boolean;
  /** Set when this unit alone failed to scan; the unit is then omitted */
  error?: string;
}

/** Normalised unit held by the Unit Index */
export interface Unit {
  id: UnitId;
  dir: AbsolutePath;
  files: readonly AbsolutePath[];
  imports: readonly UnitId[];
  isEntry: boolean;
}

/**
 * Unit discovery collaborator.
 *
 * Both methods are synchronous; a throw from `listUnits` fails the whole scan.
 */
export interface UnitLister {
  /** Every unit under `root` */
  listUnits(root: AbsolutePath): UnitMetadata[];
  /** The unit whose directory is exactly `dir`, or null when it holds no sources */
  listUnit(root: AbsolutePath, dir: AbsolutePath): UnitMetadata | null;
}

/**
 * Consulted by callers before an event reaches the engine, to skip files
 * that are mid-write or otherwise not worth a rescan.
 */
export interface ContentValidator {
  isProcessable(fileLocation: string): boolean;
}

export type LifecycleState = "uninitialized" | "ready";

/** Counts reported by `OwnershipEngine.stats()` */
export interface EngineStats {
  state: LifecycleState;
  units: number;
  files: number;
  entries: number;
  edges: number;
  stale: number;
  rebuilds: number;
}

/**
 * Ownership Engine Interface
 *
 * Lifecycle: "uninitialized" until the first query performs a full scan,
 * then "ready". Events mutate the indexes in place; only `rebuild()`, a write
 * to an entry file, or `reset()` start over.
 */
export interface OwnershipEngine {
  readonly state: LifecycleState;
  readonly root: AbsolutePath;

  /**
   * Does the build rooted at `entryHandle` include `changedFileLocation`?
   * With `event`, the change is applied to the cache before answering.
   */
  ownedBy(entryHandle: string, changedFileLocation: string, event?: FileEvent): boolean;

  /** Entry units whose build includes a file called `fileBasename` */
  entriesOwning(fileBasename: string): UnitId[];

  /** Entry units whose build includes the file at exactly `fileLocation` */
  entriesOwningFile(fileLocation: string): UnitId[];

  /** Units that transitively import any of `targets` (targets included) */
  findReverseDeps(targets: readonly UnitId[]): UnitId[];

  /** Apply a file-system event; `previousLocation` applies to renames */
  applyEvent(fileLocation: string, event: FileEvent, previousLocation?: string): void;

  /** Resolve and remember an entry handle; undefined when no entry unit matches */
  registerEntry(entryHandle: string): UnitId | undefined;

  /** Re-run unit discovery and re-derive every index */
  rebuild(reason?: string): void;

  /** Rescan each unit with stale metadata on its own; returns their identifiers */
  refreshStale(): UnitId[];

  /** Drop all state; the next query scans again */
  reset(): void;

  unit(id: UnitId): Unit | undefined;

  stats(): EngineStats;
}
