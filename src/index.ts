/**
 * entrygraph
 *
 * Which executables of a Go tree does a changed file belong to?
 * - Units (packages) and their files are indexed once, lazily
 * - Ownership = the entry's unit reaches the file's unit in the import graph
 * - File events update the indexes locally; only entry-file writes rescan all
 */

export { OwnershipEngineImpl, createOwnershipEngine } from "./engine/impl.js";
export type { OwnershipEngineOptions } from "./config.js";
export { EntryGraphError, InvalidInputError, ScanFailureError } from "./engine/errors.js";
export type { EntryGraphErrorCode } from "./engine/errors.js";
export { GoListUnitLister } from "./listers/go-list.js";
export type { GoListOptions, GoCommandRunner } from "./listers/go-list.js";
export { SourceScanUnitLister } from "./listers/source-scan.js";
export type { SourceScanOptions } from "./listers/source-scan.js";
export { GoSourceValidator } from "./validation/go-source-validator.js";
export { watchEntries, createEventDispatcher } from "./watch/watcher.js";
export type { EntryWatcher, WatchEntriesOptions, DispatchResult } from "./watch/watcher.js";
export { FILE_EVENTS } from "./engine/types.js";
export type {
  OwnershipEngine,
  UnitLister,
  UnitMetadata,
  Unit,
  UnitId,
  FileEvent,
  ContentValidator,
  EngineStats,
  LifecycleState,
} from "./engine/types.js";
